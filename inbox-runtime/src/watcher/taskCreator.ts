import { promises as fs } from "fs";
import path from "path";

import type { LedgerStore } from "../ledger/ledgerStore";
import { extractOriginalBody } from "../tasks/content";
import { generateTaskId, type Task } from "../tasks/task";
import type { StoredTask, TaskRepository } from "../tasks/taskRepository";
import { createLogger, describeError, type Logger } from "../utils/logger";
import {
  classifyFileError,
  success,
  toError,
  transient,
  type OperationResult,
} from "../utils/results";

export type TaskCreation =
  | { status: "created"; task: Task; filePath: string }
  | { status: "already_processed"; taskId: string };

export type TaskCreatorPort = {
  createFromFile: (filePath: string) => Promise<OperationResult<TaskCreation>>;
};

export type TaskCreatorOptions = {
  logger?: Logger;
  now?: () => Date;
  generateId?: (now: Date) => string;
};

/**
 * 新しい Task と台帳を書き込む唯一のコンポーネント。
 *
 * ファイル名を冪等キーとして台帳を参照し、登録済みであれば何もしない。
 * 元のタスクが後から削除・移動されていても再作成はしない。
 */
export class TaskCreator implements TaskCreatorPort {
  private readonly ledger: LedgerStore;
  private readonly repository: TaskRepository;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: (now: Date) => string;
  private lock: Promise<void> = Promise.resolve();

  constructor(ledger: LedgerStore, repository: TaskRepository, options: TaskCreatorOptions = {}) {
    this.ledger = ledger;
    this.repository = repository;
    this.logger = options.logger ?? createLogger("task-creator");
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? ((now) => generateTaskId(now));
  }

  async createFromFile(filePath: string): Promise<OperationResult<TaskCreation>> {
    return this.withLock(() => this.createLocked(filePath));
  }

  /**
   * pendingTaskIds から取り除く。含まれていない ID なら何もしない。
   */
  async markCompleted(taskId: string): Promise<void> {
    const removed = await this.ledger.markCompleted(taskId);
    if (removed) {
      this.logger.debug("台帳の pendingTaskIds から削除しました", { taskId });
    }
  }

  private async createLocked(filePath: string): Promise<OperationResult<TaskCreation>> {
    const filename = path.basename(filePath);

    try {
      await this.ledger.flush();
    } catch (error) {
      this.logger.error("未保存の台帳を書き込めませんでした", {
        error: describeError(error),
      });
      return transient(toError(error));
    }

    const existing = await this.ledger.findEntry(filename);
    if (existing) {
      this.logger.info("取り込み済みのファイルのためスキップします", {
        filename,
        taskId: existing.taskId,
      });
      return success({ status: "already_processed", taskId: existing.taskId });
    }

    let sizeBytes: number;
    let originalBody: string;
    const extension = path.extname(filename).toLowerCase();

    try {
      const stats = await fs.stat(filePath);
      sizeBytes = stats.size;
      originalBody = await extractOriginalBody(filePath, extension, sizeBytes);
    } catch (error) {
      return classifyFileError(error);
    }

    const now = this.now();
    const timestamp = now.toISOString();
    const task: Task = {
      id: this.generateId(now),
      status: "pending",
      createdAt: timestamp,
      originalFile: {
        name: filename,
        extension,
        sizeBytes,
        discoveredAt: timestamp,
      },
      content: {
        originalBody,
        analysisBody: null,
      },
      processing: null,
      analysisType: null,
      error: null,
      flags: [],
    };

    let stored: StoredTask;
    try {
      stored = await this.repository.writeNew(task);
    } catch (error) {
      return classifyFileError(error);
    }

    try {
      await this.ledger.recordCreation({
        filename,
        processedAt: timestamp,
        taskId: task.id,
      });
    } catch (error) {
      // タスクファイルは書き込み済みのまま。台帳はメモリ上に保持され次回 flush される。
      this.logger.error("タスクは書き込みましたが台帳を保存できませんでした", {
        taskId: task.id,
        filename,
        error: describeError(error),
      });
      return transient(toError(error));
    }

    this.logger.info("タスクを作成しました", { taskId: task.id, filename });
    return success({ status: "created", task, filePath: stored.filePath });
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.lock;
    let release: (() => void) | undefined;

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;

    try {
      return await fn();
    } finally {
      release?.();
    }
  }
}
