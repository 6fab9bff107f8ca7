import path from "path";

import { renderProcessingContext, type RuleLoader, type RuleSet } from "../rules/handbook";
import { evaluateFlags } from "../rules/flags";
import type { StatisticsAggregator } from "../stats/dashboard";
import type { TaskLifecycle } from "../tasks/lifecycle";
import { appendFlags } from "../tasks/task";
import type { StoredTask, TaskRepository } from "../tasks/taskRepository";
import type { ErrorRecorder } from "../vault/errorRecords";
import { createLogger, describeError, type Logger } from "../utils/logger";
import { toError, type OperationFailure } from "../utils/results";
import type { Summarizer, SummaryResult } from "./summarizer";

export type BatchSummary = {
  succeeded: number;
  failed: number;
};

export type TaskOutcome = "completed" | "failed" | "skipped";

/**
 * 台帳の pendingTaskIds を更新する窓口。TaskCreator が実装する。
 */
export type CompletionLedger = {
  markCompleted: (taskId: string) => Promise<void>;
};

export type TaskProcessorOptions = {
  repository: TaskRepository;
  lifecycle: TaskLifecycle;
  statistics: StatisticsAggregator;
  errorRecorder: ErrorRecorder;
  ledger: CompletionLedger;
  loadRules: RuleLoader;
  summarize: Summarizer;
  logger?: Logger;
  now?: () => Date;
  clock?: () => number;
};

const FAILURE_SUMMARY_LENGTH = 30;

const roundSeconds = (ms: number) => Math.round(ms / 10) / 100;

/**
 * Needs_Action/ のタスクを 1 件ずつ順番に処理するバッチ。
 *
 * 1 件の失敗はそのタスクの範囲で回収し、バッチ全体は止めない。
 * 最後に必ずレポートを再計算して書き出す。
 */
export class TaskProcessor {
  private readonly repository: TaskRepository;
  private readonly lifecycle: TaskLifecycle;
  private readonly statistics: StatisticsAggregator;
  private readonly errorRecorder: ErrorRecorder;
  private readonly ledger: CompletionLedger;
  private readonly loadRules: RuleLoader;
  private readonly summarize: Summarizer;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly clock: () => number;
  private running = false;

  constructor(options: TaskProcessorOptions) {
    this.repository = options.repository;
    this.lifecycle = options.lifecycle;
    this.statistics = options.statistics;
    this.errorRecorder = options.errorRecorder;
    this.ledger = options.ledger;
    this.loadRules = options.loadRules;
    this.summarize = options.summarize;
    this.logger = options.logger ?? createLogger("processor");
    this.now = options.now ?? (() => new Date());
    this.clock = options.clock ?? Date.now;
  }

  async processBatch(): Promise<BatchSummary> {
    const summary: BatchSummary = { succeeded: 0, failed: 0 };

    if (this.running) {
      this.logger.warn("バッチ処理が既に実行中のためスキップします");
      return summary;
    }

    this.running = true;
    try {
      await this.runBatch(summary);
    } catch (error) {
      this.logger.error("バッチ処理中に予期しないエラーが発生しました", {
        error: describeError(error),
      });
      await this.errorRecorder.record(error, "Unexpected error during batch processing");
    } finally {
      this.running = false;
      await this.persistReport();
    }

    this.logger.info("バッチ処理が完了しました", summary);
    return summary;
  }

  private async runBatch(summary: BatchSummary) {
    await this.statistics.load();

    const files = await this.repository.listPendingFiles();
    this.logger.info(`${files.length} 件のタスクファイルを確認します`);

    for (const filePath of files) {
      const outcome = await this.processFile(filePath);
      if (outcome === "completed") {
        summary.succeeded += 1;
      } else if (outcome === "failed") {
        summary.failed += 1;
      }
    }
  }

  async processFile(filePath: string): Promise<TaskOutcome> {
    const loaded = await this.repository.load(filePath);
    if (loaded.kind !== "success") {
      return this.handleLoadFailure(filePath, loaded);
    }

    const stored = loaded.value;
    const status = stored.task.status;
    if (status !== "pending" && status !== "processing") {
      return "skipped";
    }

    try {
      return await this.processTask(stored);
    } catch (error) {
      return this.handleUnexpected(stored, error);
    }
  }

  private async handleLoadFailure(
    filePath: string,
    failure: OperationFailure
  ): Promise<TaskOutcome> {
    switch (failure.kind) {
      case "corrupted":
        this.logger.error("タスクファイルを解析できないため隔離します", {
          file: path.basename(filePath),
          error: failure.error.message,
        });
        await this.lifecycle.quarantine(filePath, failure.error);
        return "failed";
      case "permanent":
        if (failure.reason === "not_found") {
          this.logger.debug("タスクファイルが既に移動されています", { filePath });
          return "skipped";
        }
        await this.errorRecorder.record(failure.error, `Failed to read task file: ${filePath}`);
        return "failed";
      case "transient":
        await this.errorRecorder.record(failure.error, `Failed to read task file: ${filePath}`);
        return "failed";
    }
  }

  private async processTask(initial: StoredTask): Promise<TaskOutcome> {
    const taskId = initial.task.id;
    this.logger.info("タスクを処理します", {
      taskId,
      file: initial.task.originalFile.name,
    });

    // クラッシュで processing のまま残ったものは要約から再開する。
    let stored =
      initial.task.status === "pending"
        ? await this.lifecycle.beginProcessing(initial)
        : initial;

    let rules: RuleSet;
    try {
      rules = await this.loadRules();
    } catch (error) {
      return this.failTask(stored, toError(error), `Failed to load processing rules for ${taskId}`);
    }

    const content = stored.task.content.originalBody;
    const flags = evaluateFlags(rules, content, this.now());
    if (flags.length > 0) {
      stored = { ...stored, task: appendFlags(stored.task, flags) };
    }

    const startedAt = this.clock();
    let result: SummaryResult;
    try {
      result = await this.summarize({
        task: stored.task,
        content,
        rules,
        context: renderProcessingContext(rules),
        flags,
      });
    } catch (error) {
      return this.failTask(stored, toError(error), `Summarization failed for task ${taskId}`);
    }
    const durationSeconds = roundSeconds(this.clock() - startedAt);

    if (result.flags && result.flags.length > 0) {
      stored = { ...stored, task: appendFlags(stored.task, result.flags) };
    }

    const { stored: completed } = await this.lifecycle.complete(stored, {
      analysisBody: result.text,
      processing: {
        model: result.model,
        durationSeconds,
        tokenCount: result.tokenCount,
      },
      analysisType: result.category ?? null,
    });

    await this.markLedgerCompleted(taskId);

    this.statistics.bump("completed");
    this.statistics.recordActivity({
      taskId,
      displayName: completed.task.originalFile.name,
      status: "completed",
      summary: "タスクが完了しました",
    });

    this.logger.info("タスクが完了しました", { taskId, durationSeconds });
    return "completed";
  }

  private async failTask(stored: StoredTask, error: Error, context: string): Promise<TaskOutcome> {
    const taskId = stored.task.id;
    const message = error.message || error.name;

    const failed = await this.lifecycle.fail(stored, message);
    await this.errorRecorder.record(error, context);

    this.statistics.bump("failed");
    this.statistics.recordActivity({
      taskId,
      displayName: failed.task.originalFile.name,
      status: "failed",
      summary: `失敗: ${Array.from(message).slice(0, FAILURE_SUMMARY_LENGTH).join("")}`,
    });

    return "failed";
  }

  private async handleUnexpected(stored: StoredTask, error: unknown): Promise<TaskOutcome> {
    const taskId = stored.task.id;
    const normalized = toError(error);

    this.logger.error("タスクの処理中に予期しないエラーが発生しました", {
      taskId,
      error: describeError(error),
    });
    await this.errorRecorder.record(normalized, `Unexpected error while processing task ${taskId}`);

    try {
      const current = await this.repository.load(stored.filePath);
      if (current.kind === "success" && current.value.task.status === "processing") {
        await this.lifecycle.fail(current.value, normalized.message || normalized.name);
      }
    } catch (markError) {
      this.logger.error("タスクを failed にできませんでした", {
        taskId,
        error: describeError(markError),
      });
    }

    this.statistics.recordActivity({
      taskId,
      displayName: stored.task.originalFile.name,
      status: "failed",
      summary: `失敗: ${Array.from(normalized.message).slice(0, FAILURE_SUMMARY_LENGTH).join("")}`,
    });
    return "failed";
  }

  private async markLedgerCompleted(taskId: string) {
    try {
      await this.ledger.markCompleted(taskId);
    } catch (error) {
      this.logger.warn("台帳の pendingTaskIds を更新できませんでした", {
        taskId,
        error: describeError(error),
      });
    }
  }

  private async persistReport() {
    try {
      await this.statistics.recompute();
      await this.statistics.write();
    } catch (error) {
      this.logger.error("Dashboard.md を更新できませんでした", {
        error: describeError(error),
      });
    }
  }
}
