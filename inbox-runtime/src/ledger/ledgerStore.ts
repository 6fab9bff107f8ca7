import { promises as fs } from "fs";
import { z } from "zod";

import { writeFileAtomic } from "../vault/atomicWrite";
import { createLogger, describeError, type Logger } from "../utils/logger";
import { errorCode } from "../utils/results";

export const LEDGER_VERSION = "2.0.0";

const LedgerEntrySchema = z.object({
  filename: z.string().min(1),
  processedAt: z.string().min(1),
  taskId: z.string().min(1),
});

const LedgerFileSchema = z.object({
  lastScanTimestamp: z.string(),
  processedFiles: z.array(LedgerEntrySchema),
  pendingTaskIds: z.array(z.string().min(1)),
  version: z.string(),
});

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export type LedgerState = z.infer<typeof LedgerFileSchema>;

export class LedgerStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerStoreError";
  }
}

export const isLedgerStoreError = (error: unknown): error is LedgerStoreError =>
  error instanceof LedgerStoreError;

/**
 * 台帳ファイルが無い・壊れている場合に、タスクファイルから復元した内容。
 */
export type LedgerRebuild = {
  processedFiles: LedgerEntry[];
  pendingTaskIds: string[];
};

export type LedgerStoreOptions = {
  logger?: Logger;
  now?: () => Date;
  rebuild?: () => Promise<LedgerRebuild>;
};

const cloneState = (state: LedgerState): LedgerState => ({
  lastScanTimestamp: state.lastScanTimestamp,
  processedFiles: state.processedFiles.map((entry) => ({ ...entry })),
  pendingTaskIds: [...state.pendingTaskIds],
  version: state.version,
});

/**
 * 取り込み済みファイルとタスク ID の対応を保持する台帳。
 *
 * - 起動時に一度だけ全体を読み込み、メモリ上で変更し、変更のたびにファイル全体を
 *   一時ファイル + rename で書き換える。
 * - 台帳が無い・壊れている場合は空の台帳から始め、`rebuild` が渡されていれば
 *   タスクファイルから復元して書き戻す。
 * - 書き込みに失敗した場合はメモリ上の変更を保持したまま dirty とし、次の操作の前に
 *   `flush()` で再度書き込む。
 */
export class LedgerStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly rebuild: (() => Promise<LedgerRebuild>) | null;
  private state: LedgerState;
  private loaded = false;
  private loadPromise: Promise<void> | null = null;
  private dirty = false;
  private writeLock: Promise<void> = Promise.resolve();

  constructor(filePath: string, options: LedgerStoreOptions = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? createLogger("ledger");
    this.now = options.now ?? (() => new Date());
    this.rebuild = options.rebuild ?? null;
    this.state = this.buildEmptyState();
  }

  get path() {
    return this.filePath;
  }

  get isDirty() {
    return this.dirty;
  }

  async load() {
    if (this.loaded) {
      return;
    }

    if (!this.loadPromise) {
      this.loadPromise = this.performLoad();
    }

    await this.loadPromise;
  }

  async snapshot(): Promise<LedgerState> {
    await this.load();
    return cloneState(this.state);
  }

  async findEntry(filename: string): Promise<LedgerEntry | null> {
    await this.load();
    const entry = this.state.processedFiles.find((item) => item.filename === filename);
    return entry ? { ...entry } : null;
  }

  async pendingTaskIds(): Promise<string[]> {
    await this.load();
    return [...this.state.pendingTaskIds];
  }

  /**
   * メモリ上の状態を変更してから台帳全体を書き換える。
   * 書き込みに失敗すると LedgerStoreError を投げるが、変更自体は取り消さない。
   */
  async mutate(mutator: (state: LedgerState) => void): Promise<void> {
    await this.load();
    await this.withWriteLock(async () => {
      mutator(this.state);
      this.dirty = true;
      await this.commitLocked();
    });
  }

  async commitAtomically(): Promise<void> {
    await this.load();
    await this.withWriteLock(() => this.commitLocked());
  }

  /**
   * 以前の書き込みが失敗して未保存の変更がある場合のみ書き込む。
   */
  async flush(): Promise<void> {
    await this.load();
    if (!this.dirty) {
      return;
    }
    await this.withWriteLock(async () => {
      if (this.dirty) {
        await this.commitLocked();
      }
    });
  }

  async recordCreation(entry: LedgerEntry): Promise<void> {
    await this.mutate((state) => {
      if (state.processedFiles.some((item) => item.filename === entry.filename)) {
        throw new LedgerStoreError(`${entry.filename} は既に台帳に登録されています。`);
      }

      state.processedFiles.push({ ...entry });
      if (!state.pendingTaskIds.includes(entry.taskId)) {
        state.pendingTaskIds.push(entry.taskId);
      }
      state.lastScanTimestamp = this.now().toISOString();
    });
  }

  async markCompleted(taskId: string): Promise<boolean> {
    await this.load();
    if (!this.state.pendingTaskIds.includes(taskId)) {
      return false;
    }

    await this.mutate((state) => {
      state.pendingTaskIds = state.pendingTaskIds.filter((id) => id !== taskId);
    });
    return true;
  }

  async markPending(taskId: string): Promise<void> {
    await this.load();
    if (this.state.pendingTaskIds.includes(taskId)) {
      return;
    }

    await this.mutate((state) => {
      state.pendingTaskIds.push(taskId);
    });
  }

  private buildEmptyState(): LedgerState {
    return {
      lastScanTimestamp: this.now().toISOString(),
      processedFiles: [],
      pendingTaskIds: [],
      version: LEDGER_VERSION,
    };
  }

  private async performLoad() {
    let recovered = false;

    try {
      const raw = await fs.readFile(this.filePath, "utf-8");
      const parsed = LedgerFileSchema.safeParse(JSON.parse(raw));

      if (!parsed.success) {
        this.logger.warn("台帳の形式が不正なため、空の台帳として扱います", {
          path: this.filePath,
          issues: parsed.error.issues.map((issue) => issue.message),
        });
        this.state = this.buildEmptyState();
      } else {
        this.state = cloneState(parsed.data);
        recovered = true;
      }
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        this.logger.warn("台帳を読み込めなかったため、空の台帳として扱います", {
          path: this.filePath,
          error: describeError(error),
        });
      }
      this.state = this.buildEmptyState();
    }

    if (!recovered) {
      await this.rebuildFromRecords();
    }

    this.loaded = true;
  }

  private async rebuildFromRecords() {
    if (!this.rebuild) {
      return;
    }

    let rebuilt: LedgerRebuild;
    try {
      rebuilt = await this.rebuild();
    } catch (error) {
      this.logger.warn("タスクファイルから台帳を再構築できませんでした", {
        error: describeError(error),
      });
      return;
    }

    if (rebuilt.processedFiles.length === 0 && rebuilt.pendingTaskIds.length === 0) {
      return;
    }

    this.state = {
      ...this.buildEmptyState(),
      processedFiles: rebuilt.processedFiles.map((entry) => ({ ...entry })),
      pendingTaskIds: [...rebuilt.pendingTaskIds],
    };
    this.dirty = true;
    this.logger.info("タスクファイルから台帳を再構築しました", {
      processedFiles: rebuilt.processedFiles.length,
      pendingTaskIds: rebuilt.pendingTaskIds.length,
    });

    try {
      await this.withWriteLock(() => this.commitLocked());
    } catch (error) {
      this.logger.warn("再構築した台帳を保存できませんでした。次の操作で再度書き込みます", {
        error: describeError(error),
      });
    }
  }

  private async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.writeLock;
    let release: (() => void) | undefined;

    this.writeLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;

    try {
      return await fn();
    } finally {
      release?.();
    }
  }

  private async commitLocked() {
    const payload: LedgerState = {
      ...cloneState(this.state),
      version: LEDGER_VERSION,
    };

    try {
      await writeFileAtomic(this.filePath, `${JSON.stringify(payload, null, 2)}\n`);
      this.dirty = false;
    } catch (error) {
      this.dirty = true;
      throw new LedgerStoreError("台帳の保存に失敗しました。", { cause: error });
    }
  }
}
