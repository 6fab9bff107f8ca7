import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Task } from "../tasks/task";
import type { Logger, LogLevel } from "../utils/logger";
import { resolveVaultLayout, type VaultLayout } from "../vault/paths";

export type RecordedLog = {
  level: LogLevel;
  message: string;
  meta?: unknown;
};

export type RecordingLogger = Logger & { entries: RecordedLog[] };

export const createRecordingLogger = (): RecordingLogger => {
  const entries: RecordedLog[] = [];
  const push = (level: LogLevel) => (message: string, meta?: unknown) => {
    entries.push({ level, message, meta });
  };

  return {
    entries,
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    debug: push("debug"),
  };
};

export const createTempVault = async (
  prefix = "inbox-vault-",
  relativeRoot = ""
): Promise<VaultLayout> => {
  const base = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const layout = resolveVaultLayout(path.join(base, relativeRoot));

  for (const directory of [layout.inboxDir, layout.pendingDir, layout.doneDir, layout.logsDir]) {
    await fs.mkdir(directory, { recursive: true });
  }

  return layout;
};

export const FIXED_NOW = new Date("2025-03-14T09:26:53.000Z");

export const buildTask = (overrides: Partial<Task> = {}): Task => ({
  id: "task-20250314-092653-abc123",
  status: "pending",
  createdAt: FIXED_NOW.toISOString(),
  originalFile: {
    name: "meeting-notes.txt",
    extension: ".txt",
    sizeBytes: 42,
    discoveredAt: FIXED_NOW.toISOString(),
  },
  content: {
    originalBody: "Discuss the quarterly budget.",
    analysisBody: null,
  },
  processing: null,
  analysisType: null,
  error: null,
  flags: [],
  ...overrides,
});

export const listFiles = async (directory: string) => {
  try {
    return (await fs.readdir(directory)).sort();
  } catch {
    return [];
  }
};
