import path from "path";

import type { ErrorRecorder } from "../vault/errorRecords";
import { createLogger, describeError, type Logger } from "../utils/logger";
import {
  completeTask,
  failTask,
  requeueTask,
  transitionTask,
  type ProcessingMetadata,
} from "./task";
import type { StoredTask, TaskRepository } from "./taskRepository";

export type TaskCompletionInput = {
  analysisBody: string;
  processing: ProcessingMetadata;
  analysisType?: string | null;
};

export type TaskCompletionOutcome = {
  stored: StoredTask;
  relocated: boolean;
};

export type TaskLifecycleOptions = {
  errorRecorder: ErrorRecorder;
  logger?: Logger;
};

/**
 * タスクの状態遷移と、それに伴う保存場所の移動をまとめて扱う。
 *
 * - processing: 意図を記録するだけで移動しない。
 * - completed: レコードを書き換えてから Done/ へ移動する。移動に失敗しても
 *   completed のまま Needs_Action/ に残し、警告のみ出す。
 * - failed: その場で書き換え、移動しない。
 * - 破損したレコードは遷移させず隔離する。
 */
export class TaskLifecycle {
  private readonly repository: TaskRepository;
  private readonly errorRecorder: ErrorRecorder;
  private readonly logger: Logger;

  constructor(repository: TaskRepository, options: TaskLifecycleOptions) {
    this.repository = repository;
    this.errorRecorder = options.errorRecorder;
    this.logger = options.logger ?? createLogger("lifecycle");
  }

  async beginProcessing(stored: StoredTask): Promise<StoredTask> {
    const task = transitionTask(stored.task, "processing");
    return this.repository.save({ ...stored, task });
  }

  async complete(
    stored: StoredTask,
    input: TaskCompletionInput
  ): Promise<TaskCompletionOutcome> {
    const task = completeTask(
      stored.task,
      input.analysisBody,
      input.processing,
      input.analysisType ?? null
    );
    const saved = await this.repository.save({ ...stored, task });

    try {
      const moved = await this.repository.moveToDone(saved);
      this.logger.info("タスクを Done/ へ移動しました", { taskId: task.id });
      return { stored: moved, relocated: true };
    } catch (error) {
      this.logger.warn("タスクは完了しましたが Done/ へ移動できませんでした。手動で移動してください", {
        taskId: task.id,
        filePath: saved.filePath,
        error: describeError(error),
      });
      return { stored: saved, relocated: false };
    }
  }

  async fail(stored: StoredTask, message: string): Promise<StoredTask> {
    const task = failTask(stored.task, message);
    const saved = await this.repository.save({ ...stored, task });
    this.logger.warn("タスクを failed にしました", { taskId: task.id, error: task.error });
    return saved;
  }

  async requeue(stored: StoredTask): Promise<StoredTask> {
    const task = requeueTask(stored.task);
    const saved = await this.repository.save({ ...stored, task });
    this.logger.info("failed のタスクを pending へ戻しました", { taskId: task.id });
    return saved;
  }

  /**
   * 破損したタスクファイルを Logs/failed/ へ移し、エラーレコードを 1 件残す。
   */
  async quarantine(filePath: string, error: Error): Promise<string | null> {
    let destination: string | null = null;

    try {
      destination = await this.repository.quarantine(filePath);
      this.logger.info("破損したタスクファイルを隔離しました", {
        file: path.basename(filePath),
        destination,
      });
    } catch (moveError) {
      this.logger.error("破損したタスクファイルを隔離できませんでした", {
        file: filePath,
        error: describeError(moveError),
      });
    }

    await this.errorRecorder.record(error, `Corrupted task file: ${filePath}`);
    return destination;
  }
}
