import { promises as fs } from "fs";
import path from "path";
import { setTimeout as sleepWithTimeout } from "node:timers/promises";

import type { ErrorRecorder } from "../vault/errorRecords";
import { createLogger, describeError, type Logger } from "../utils/logger";
import {
  isNotFoundError,
  isPermissionError,
  toError,
  transient,
  type OperationResult,
} from "../utils/results";
import { PathDebouncer } from "./debounce";
import type { TaskCreation, TaskCreatorPort } from "./taskCreator";

export const DEFAULT_SUPPORTED_EXTENSIONS = [
  ".txt",
  ".md",
  ".pdf",
  ".png",
  ".jpg",
  ".jpeg",
] as const;
export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 2_000;

export type InboxNotification = {
  path: string;
  isDirectory?: boolean;
};

export type InboxOutcome =
  | "ignored_directory"
  | "debounced"
  | "missing"
  | "unsupported"
  | "too_large"
  | "permission_denied"
  | "unreadable"
  | "created"
  | "already_processed"
  | "failed";

const formatMegabytes = (bytes: number) => {
  const megabytes = bytes / (1024 * 1024);
  return `${Number.isInteger(megabytes) ? megabytes : megabytes.toFixed(1)}MB`;
};

export class FileTooLargeError extends Error {
  readonly sizeBytes: number;
  readonly limitBytes: number;

  constructor(filename: string, sizeBytes: number, limitBytes: number) {
    super(`File exceeds ${formatMegabytes(limitBytes)} size limit: ${filename}`);
    this.name = "FileTooLargeError";
    this.sizeBytes = sizeBytes;
    this.limitBytes = limitBytes;
  }
}

export type InboxEventHandlerOptions = {
  taskCreator: TaskCreatorPort;
  errorRecorder: ErrorRecorder;
  logger?: Logger;
  debouncer?: PathDebouncer;
  supportedExtensions?: readonly string[];
  maxFileSizeBytes?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  checkReadable?: (filePath: string) => Promise<void>;
};

const readFirstByte = async (filePath: string) => {
  const handle = await fs.open(filePath, "r");
  try {
    await handle.read(Buffer.alloc(1), 0, 1, 0);
  } finally {
    await handle.close();
  }
};

/**
 * Inbox の作成通知 1 件を、最大 1 回のタスク作成処理に変換する。
 *
 * ディレクトリ除外 → デバウンス → 存在確認 → 拡張子 → サイズ → 読み取り確認 →
 * 一時的な失敗のみ再試行するタスク作成、の順に判定する。
 * どの経路でも例外は投げず、結果を InboxOutcome で返す。
 */
export class InboxEventHandler {
  private readonly taskCreator: TaskCreatorPort;
  private readonly errorRecorder: ErrorRecorder;
  private readonly logger: Logger;
  private readonly debouncer: PathDebouncer;
  private readonly supportedExtensions: Set<string>;
  private readonly maxFileSizeBytes: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly checkReadable: (filePath: string) => Promise<void>;

  constructor(options: InboxEventHandlerOptions) {
    this.taskCreator = options.taskCreator;
    this.errorRecorder = options.errorRecorder;
    this.logger = options.logger ?? createLogger("inbox");
    this.debouncer = options.debouncer ?? new PathDebouncer();
    this.supportedExtensions = new Set(
      (options.supportedExtensions ?? DEFAULT_SUPPORTED_EXTENSIONS).map((ext) =>
        ext.toLowerCase()
      )
    );
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? ((ms) => sleepWithTimeout(ms));
    this.checkReadable = options.checkReadable ?? readFirstByte;
  }

  get supportedExtensionList() {
    return [...this.supportedExtensions];
  }

  async handleCreated(notification: InboxNotification): Promise<InboxOutcome> {
    const filePath = notification.path;

    if (notification.isDirectory) {
      return "ignored_directory";
    }

    if (!this.debouncer.accept(filePath)) {
      this.logger.debug("重複した通知を破棄しました", { filePath });
      return "debounced";
    }

    let sizeBytes: number;
    try {
      const stats = await fs.stat(filePath);
      if (stats.isDirectory()) {
        return "ignored_directory";
      }
      sizeBytes = stats.size;
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.warn("ファイルが既に存在しません", { filePath });
        return "missing";
      }
      this.logger.error("ファイル情報を取得できませんでした", {
        filePath,
        error: describeError(error),
      });
      return "unreadable";
    }

    const extension = path.extname(filePath).toLowerCase();
    if (!this.supportedExtensions.has(extension)) {
      this.logger.info("対象外の拡張子のためスキップします", { filePath, extension });
      return "unsupported";
    }

    if (sizeBytes > this.maxFileSizeBytes) {
      this.logger.warn("ファイルサイズが上限を超えています", {
        filePath,
        sizeBytes,
        limitBytes: this.maxFileSizeBytes,
      });
      await this.errorRecorder.record(
        new FileTooLargeError(path.basename(filePath), sizeBytes, this.maxFileSizeBytes),
        `File too large to process: ${filePath}`
      );
      return "too_large";
    }

    try {
      await this.checkReadable(filePath);
    } catch (error) {
      if (isPermissionError(error)) {
        this.logger.error("ファイルを読み取る権限がありません", { filePath });
        await this.errorRecorder.record(error, `Permission denied: ${filePath}`);
        return "permission_denied";
      }
      this.logger.error("ファイルを読み取れませんでした", {
        filePath,
        error: describeError(error),
      });
      return "unreadable";
    }

    return this.createWithRetry(filePath);
  }

  private async createWithRetry(filePath: string): Promise<InboxOutcome> {
    const filename = path.basename(filePath);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      this.logger.info(`新しいファイルを検知しました (試行 ${attempt}/${this.maxAttempts})`, {
        filename,
      });

      const result = await this.invokeCreator(filePath);

      switch (result.kind) {
        case "success":
          return result.value.status === "created" ? "created" : "already_processed";
        case "permanent":
          if (result.reason === "not_found") {
            this.logger.error("処理中にファイルが削除されました", { filePath });
            await this.errorRecorder.record(
              result.error,
              `File disappeared during processing: ${filePath}`
            );
            return "missing";
          }
          if (result.reason === "permission_denied") {
            this.logger.error("タスク作成中に権限エラーが発生しました", {
              filePath,
              error: result.error.message,
            });
            await this.errorRecorder.record(result.error, `Permission denied: ${filePath}`);
            return "permission_denied";
          }
          await this.errorRecorder.record(
            result.error,
            `Failed to create task from file: ${filePath}`
          );
          return "failed";
        case "corrupted":
          await this.errorRecorder.record(
            result.error,
            `Failed to create task from file: ${filePath}`
          );
          return "failed";
        case "transient":
          this.logger.error(
            `タスクの作成に失敗しました (試行 ${attempt}/${this.maxAttempts})`,
            { filePath, error: result.error.message }
          );

          if (attempt < this.maxAttempts) {
            this.logger.info(`${this.retryDelayMs}ms 後に再試行します`, { filename });
            await this.sleep(this.retryDelayMs);
            continue;
          }

          this.logger.error(`${this.maxAttempts} 回試行してもタスクを作成できませんでした`, {
            filePath,
          });
          await this.errorRecorder.record(
            result.error,
            `Failed to create task from file after ${this.maxAttempts} attempts: ${filePath}`
          );
          return "failed";
      }
    }

    return "failed";
  }

  private async invokeCreator(filePath: string): Promise<OperationResult<TaskCreation>> {
    try {
      return await this.taskCreator.createFromFile(filePath);
    } catch (error) {
      return transient(toError(error));
    }
  }
}
