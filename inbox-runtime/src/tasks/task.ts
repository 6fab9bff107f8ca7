import { randomUUID } from "crypto";

export const TASK_STATUSES = ["pending", "processing", "completed", "failed"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export type OriginalFileInfo = {
  name: string;
  extension: string;
  sizeBytes: number;
  discoveredAt: string;
};

export type TaskContent = {
  originalBody: string;
  analysisBody: string | null;
};

export type ProcessingMetadata = {
  model: string;
  durationSeconds: number;
  tokenCount: number;
};

export type Task = {
  readonly id: string;
  status: TaskStatus;
  createdAt: string;
  originalFile: OriginalFileInfo;
  content: TaskContent;
  processing: ProcessingMetadata | null;
  analysisType: string | null;
  error: string | null;
  flags: string[];
};

export const ANALYSIS_PLACEHOLDER = "[To be generated by AI processing]";

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export class TaskTransitionError extends Error {
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(`タスク ${taskId} を ${from} から ${to} へ遷移させることはできません。`);
    this.name = "TaskTransitionError";
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

export const isTaskTransitionError = (error: unknown): error is TaskTransitionError =>
  error instanceof TaskTransitionError;

export const canTransition = (from: TaskStatus, to: TaskStatus) =>
  ALLOWED_TRANSITIONS[from].includes(to);

const pad = (value: number) => String(value).padStart(2, "0");

export const generateTaskId = (now: Date = new Date(), suffix = randomUUID()) => {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const random = suffix.replace(/[^a-f0-9]/gi, "").slice(0, 6).toLowerCase();
  return `task-${date}-${time}-${random}`;
};

export const cloneTask = (task: Task): Task => ({
  ...task,
  originalFile: { ...task.originalFile },
  content: { ...task.content },
  processing: task.processing ? { ...task.processing } : null,
  flags: [...task.flags],
});

/**
 * 状態遷移は pending → processing → completed / failed の一方向のみ。
 * それ以外は TaskTransitionError。
 */
export const transitionTask = (task: Task, next: TaskStatus): Task => {
  if (!canTransition(task.status, next)) {
    throw new TaskTransitionError(task.id, task.status, next);
  }

  return { ...cloneTask(task), status: next };
};

export const completeTask = (
  task: Task,
  analysisBody: string,
  processing: ProcessingMetadata,
  analysisType: string | null = null
): Task => {
  const next = transitionTask(task, "completed");
  return {
    ...next,
    content: { ...next.content, analysisBody },
    processing: { ...processing },
    analysisType: analysisType ?? next.analysisType,
    error: null,
  };
};

export const failTask = (task: Task, error: string): Task => {
  const next = transitionTask(task, "failed");
  return { ...next, error: error.trim() || "Processing failed" };
};

/**
 * 外部からの明示的な操作でのみ使う、failed → pending の再投入。
 */
export const requeueTask = (task: Task): Task => {
  if (task.status !== "failed") {
    throw new TaskTransitionError(task.id, task.status, "pending");
  }

  return { ...cloneTask(task), status: "pending", error: null };
};

/**
 * フラグは順序付き集合として末尾に追加するのみで、既存のものは消さない。
 */
export const appendFlags = (task: Task, flags: readonly string[]): Task => {
  const merged = [...task.flags];
  for (const flag of flags) {
    const trimmed = flag.trim();
    if (trimmed.length > 0 && !merged.includes(trimmed)) {
      merged.push(trimmed);
    }
  }
  return { ...cloneTask(task), flags: merged };
};
