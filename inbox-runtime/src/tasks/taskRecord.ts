import { z } from "zod";

import {
  decodeFrontmatter,
  encodeFrontmatter,
  type FrontmatterDocument,
  type FrontmatterFields,
} from "../vault/frontmatter";
import { ANALYSIS_PLACEHOLDER, TASK_STATUSES, type Task } from "./task";

export const TASK_RECORD_TYPE = "inbox_task";

const ORIGINAL_CONTENT_HEADING = "## Original Content";
const ANALYSIS_HEADING = "## AI Analysis";

const TaskFieldsSchema = z
  .object({
    id: z.string().min(1),
    status: z.enum(TASK_STATUSES),
    created_at: z.string().min(1),
    original_file: z.object({
      name: z.string().min(1),
      extension: z.string(),
      size_bytes: z.number().int().nonnegative(),
      discovered_at: z.string().min(1),
    }),
    processing: z
      .object({
        model: z.string(),
        duration_seconds: z.number().nonnegative(),
        tokens: z.number().int().nonnegative(),
      })
      .nullish(),
    analysis_type: z.string().nullish(),
    error: z.string().nullish(),
    flags: z.array(z.string()).nullish(),
  })
  .passthrough();

export class TaskRecordError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TaskRecordError";
  }
}

export const isTaskRecordError = (error: unknown): error is TaskRecordError =>
  error instanceof TaskRecordError;

export const taskFilename = (taskId: string) => `${taskId}.md`;

const buildFields = (task: Task): FrontmatterFields => {
  const fields: FrontmatterFields = {
    id: task.id,
    type: TASK_RECORD_TYPE,
    status: task.status,
    created_at: task.createdAt,
    original_file: {
      name: task.originalFile.name,
      extension: task.originalFile.extension,
      size_bytes: task.originalFile.sizeBytes,
      discovered_at: task.originalFile.discoveredAt,
    },
  };

  if (task.processing) {
    fields.processing = {
      model: task.processing.model,
      duration_seconds: task.processing.durationSeconds,
      tokens: task.processing.tokenCount,
    };
  }

  if (task.analysisType) {
    fields.analysis_type = task.analysisType;
  }

  if (task.error) {
    fields.error = task.error;
  }

  if (task.flags.length > 0) {
    fields.flags = [...task.flags];
  }

  return fields;
};

const buildBody = (task: Task) =>
  [
    `# ${task.originalFile.name}`,
    "",
    ORIGINAL_CONTENT_HEADING,
    "",
    task.content.originalBody.trim(),
    "",
    ANALYSIS_HEADING,
    "",
    (task.content.analysisBody ?? ANALYSIS_PLACEHOLDER).trim(),
    "",
  ].join("\n");

export const serializeTask = (task: Task) =>
  encodeFrontmatter(buildFields(task), buildBody(task));

const splitSections = (body: string) => {
  const originalIndex = body.indexOf(`${ORIGINAL_CONTENT_HEADING}\n`);
  const analysisIndex = body.lastIndexOf(`\n${ANALYSIS_HEADING}`);

  if (originalIndex === -1 || analysisIndex === -1 || analysisIndex < originalIndex) {
    throw new TaskRecordError("本文に Original Content / AI Analysis セクションがありません。");
  }

  const originalBody = body
    .slice(originalIndex + ORIGINAL_CONTENT_HEADING.length + 1, analysisIndex)
    .trim();
  const analysisRaw = body.slice(analysisIndex + ANALYSIS_HEADING.length + 1).trim();

  return {
    originalBody,
    analysisBody:
      analysisRaw.length === 0 || analysisRaw === ANALYSIS_PLACEHOLDER ? null : analysisRaw,
  };
};

/**
 * タスクファイルを読み込む。構造化フィールドや本文が壊れている場合は TaskRecordError。
 */
export const parseTaskRecord = (raw: string): Task => {
  let document: FrontmatterDocument;
  try {
    document = decodeFrontmatter(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TaskRecordError(`タスクファイルを解析できませんでした: ${message}`, {
      cause: error,
    });
  }

  const parsed = TaskFieldsSchema.safeParse(document.fields);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join(", ");
    throw new TaskRecordError(`タスクのフィールドが不正です: ${detail}`, {
      cause: parsed.error,
    });
  }

  const fields = parsed.data;
  const sections = splitSections(document.body);

  return {
    id: fields.id,
    status: fields.status,
    createdAt: fields.created_at,
    originalFile: {
      name: fields.original_file.name,
      extension: fields.original_file.extension,
      sizeBytes: fields.original_file.size_bytes,
      discoveredAt: fields.original_file.discovered_at,
    },
    content: sections,
    processing: fields.processing
      ? {
          model: fields.processing.model,
          durationSeconds: fields.processing.duration_seconds,
          tokenCount: fields.processing.tokens,
        }
      : null,
    analysisType: fields.analysis_type ?? null,
    error: fields.error ?? null,
    flags: fields.flags ?? [],
  };
};
