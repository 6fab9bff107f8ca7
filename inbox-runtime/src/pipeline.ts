import type { PipelineConfig } from "./config";
import { LedgerStore } from "./ledger/ledgerStore";
import { createLedgerRebuilder } from "./ledger/rebuild";
import { InboxCleaner } from "./maintenance/inboxCleanup";
import { TaskProcessor } from "./processing/orchestrator";
import { createPlaceholderSummarizer, type Summarizer } from "./processing/summarizer";
import { createHandbookRuleLoader, type RuleLoader } from "./rules/handbook";
import { StatisticsAggregator } from "./stats/dashboard";
import { TaskLifecycle } from "./tasks/lifecycle";
import type { StoredTask } from "./tasks/taskRepository";
import { TaskRepository } from "./tasks/taskRepository";
import { ErrorRecorder } from "./vault/errorRecords";
import { resolveVaultLayout, type VaultLayout } from "./vault/paths";
import { PathDebouncer } from "./watcher/debounce";
import { InboxEventHandler } from "./watcher/inboxHandler";
import { InboxWatcher } from "./watcher/inboxWatcher";
import { TaskCreator } from "./watcher/taskCreator";
import { createLogger, type Logger } from "./utils/logger";
import { permanent, type OperationResult, success } from "./utils/results";

export type PipelineOverrides = {
  summarize?: Summarizer;
  loadRules?: RuleLoader;
  loggerFactory?: (scope: string) => Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type Pipeline = {
  layout: VaultLayout;
  ledger: LedgerStore;
  repository: TaskRepository;
  errorRecorder: ErrorRecorder;
  lifecycle: TaskLifecycle;
  taskCreator: TaskCreator;
  statistics: StatisticsAggregator;
  handler: InboxEventHandler;
  processor: TaskProcessor;
  cleaner: InboxCleaner;
  createWatcher: () => InboxWatcher;
  requeue: (taskId: string) => Promise<OperationResult<StoredTask>>;
};

/**
 * 設定から各コンポーネントを組み立てる。ロガーはコンポーネントごとに生成して渡す。
 */
export const createPipeline = (
  config: PipelineConfig,
  overrides: PipelineOverrides = {}
): Pipeline => {
  const loggerFor = overrides.loggerFactory ?? ((scope: string) => createLogger(scope));
  const now = overrides.now ?? (() => new Date());
  const layout = resolveVaultLayout(config.vault.path);

  const repository = new TaskRepository(layout);
  const ledger = new LedgerStore(layout.ledgerFile, {
    logger: loggerFor("ledger"),
    now,
    rebuild: createLedgerRebuilder(repository),
  });
  const errorRecorder = new ErrorRecorder(layout.logsDir, {
    logger: loggerFor("error-records"),
    now,
  });
  const lifecycle = new TaskLifecycle(repository, {
    errorRecorder,
    logger: loggerFor("lifecycle"),
  });
  const taskCreator = new TaskCreator(ledger, repository, {
    logger: loggerFor("task-creator"),
    now,
  });
  const statistics = new StatisticsAggregator(layout, {
    logger: loggerFor("statistics"),
    now,
    activityLimit: config.report.recent_activity_limit,
  });

  const handler = new InboxEventHandler({
    taskCreator,
    errorRecorder,
    logger: loggerFor("inbox"),
    debouncer: new PathDebouncer({ windowMs: config.watcher.debounce_ms }),
    supportedExtensions: config.watcher.supported_extensions,
    maxFileSizeBytes: config.watcher.max_file_size_bytes,
    maxAttempts: config.watcher.retry.max_attempts,
    retryDelayMs: config.watcher.retry.delay_ms,
    sleep: overrides.sleep,
  });

  const processor = new TaskProcessor({
    repository,
    lifecycle,
    statistics,
    errorRecorder,
    ledger: taskCreator,
    loadRules: overrides.loadRules ?? createHandbookRuleLoader(layout.handbookFile),
    summarize: overrides.summarize ?? createPlaceholderSummarizer(config.processing.model),
    logger: loggerFor("processor"),
    now,
  });

  const cleaner = new InboxCleaner(layout.inboxDir, ledger, repository, {
    logger: loggerFor("inbox-cleanup"),
  });

  const createWatcher = () =>
    new InboxWatcher(layout.inboxDir, {
      handler,
      logger: loggerFor("watcher"),
      usePolling: config.watcher.use_polling,
      pollIntervalMs: config.watcher.poll_interval_ms,
      reconcileOnStart: config.watcher.reconcile_on_start,
      writeStabilityMs: config.watcher.write_stability_ms,
    });

  const requeue = async (taskId: string): Promise<OperationResult<StoredTask>> => {
    const found = await repository.findById(taskId);
    if (found.kind !== "success") {
      return found;
    }

    if (found.value.location !== "pending" || found.value.task.status !== "failed") {
      return permanent(
        "unsupported",
        new Error(`failed 状態のタスクのみ再投入できます: ${taskId} (${found.value.task.status})`)
      );
    }

    const requeued = await lifecycle.requeue(found.value);
    await ledger.markPending(taskId);
    return success(requeued);
  };

  return {
    layout,
    ledger,
    repository,
    errorRecorder,
    lifecycle,
    taskCreator,
    statistics,
    handler,
    processor,
    cleaner,
    createWatcher,
    requeue,
  };
};
