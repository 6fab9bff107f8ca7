import { z } from "zod";

import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_SUPPORTED_EXTENSIONS,
} from "../watcher/inboxHandler";
import { DEFAULT_DEBOUNCE_MS } from "../watcher/debounce";
import { DEFAULT_WRITE_STABILITY_MS } from "../watcher/inboxWatcher";
import { DEFAULT_SUMMARY_MODEL } from "../processing/summarizer";
import { DEFAULT_ACTIVITY_LIMIT } from "../stats/dashboard";

const trimString = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" ? value.trim() : value), schema);

const ExtensionSchema = trimString(
  z
    .string()
    .regex(/^\.[a-z0-9]+$/i, "拡張子は .txt のようにドットから始めてください")
    .transform((value) => value.toLowerCase())
);

const RetryConfigSchema = z.object({
  max_attempts: z.number().int().min(1).max(10).default(DEFAULT_MAX_ATTEMPTS),
  delay_ms: z.number().int().min(0).max(60_000).default(DEFAULT_RETRY_DELAY_MS),
});

const WatcherConfigSchema = z.object({
  debounce_ms: z.number().int().min(0).max(60_000).default(DEFAULT_DEBOUNCE_MS),
  max_file_size_bytes: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_FILE_SIZE_BYTES),
  supported_extensions: z
    .array(ExtensionSchema)
    .min(1, "対象の拡張子を 1 つ以上指定してください")
    .default([...DEFAULT_SUPPORTED_EXTENSIONS]),
  retry: RetryConfigSchema.default({}),
  use_polling: z.boolean().default(true),
  poll_interval_ms: z.number().int().min(100).max(60_000).default(1_000),
  reconcile_on_start: z.boolean().default(true),
  write_stability_ms: z.number().int().min(0).max(60_000).default(DEFAULT_WRITE_STABILITY_MS),
});

export const ConfigSchema = z.object({
  vault: z
    .object({
      path: trimString(z.string().min(1, "vault.path は空にできません")).default("./vault"),
    })
    .default({}),
  watcher: WatcherConfigSchema.default({}),
  processing: z
    .object({
      model: trimString(z.string().min(1)).default(DEFAULT_SUMMARY_MODEL),
    })
    .default({}),
  report: z
    .object({
      recent_activity_limit: z
        .number()
        .int()
        .min(1)
        .max(100)
        .default(DEFAULT_ACTIVITY_LIMIT),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof ConfigSchema>;
export type WatcherConfig = z.infer<typeof WatcherConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
