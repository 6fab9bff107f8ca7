#!/usr/bin/env node
import { exit, stdin, stdout } from "process";
import { createInterface } from "readline/promises";
import dotenv from "dotenv";

import { applyEnvironmentOverrides, loadConfig, type PipelineConfig } from "../config";
import { formatCleanupReport } from "../maintenance/inboxCleanup";
import { createPipeline, type Pipeline } from "../pipeline";
import { isTaskTransitionError } from "../tasks/task";
import { createLogger } from "../utils/logger";
import { assertVaultLayout, isVaultLayoutError, resolveVaultLayout } from "../vault/paths";
import { scaffoldVault } from "../vault/scaffold";

dotenv.config();

const usage = `Inbox-to-Task パイプライン

使用方法:
  npm run vault -- init
  npm run vault -- watch
  npm run vault -- process
  npm run vault -- rebuild-dashboard
  npm run vault -- status
  npm run vault -- requeue <task-id>
  npm run vault -- cleanup-inbox [--execute] [--yes]

環境変数:
  PIPELINE_CONFIG_PATH  設定ファイルのパス (既定: config/pipeline.yaml)
  VAULT_PATH            vault.path の上書き
`;

const logger = createLogger("cli");

const logError = (message: string) => {
  console.error(`⚠️ ${message}`);
};

const logInfo = (message: string) => {
  console.log(`ℹ️ ${message}`);
};

const readConfig = async (): Promise<PipelineConfig> => {
  const result = await loadConfig(process.env.PIPELINE_CONFIG_PATH, { logSuccess: false });
  if (!result.ok) {
    throw new Error(`設定ファイルを読み込めませんでした: ${result.path}`);
  }
  return applyEnvironmentOverrides(result.config);
};

const openPipeline = async (config: PipelineConfig): Promise<Pipeline> => {
  const pipeline = createPipeline(config);
  await assertVaultLayout(pipeline.layout);
  return pipeline;
};

const runInit = async (config: PipelineConfig) => {
  const layout = resolveVaultLayout(config.vault.path);
  const result = await scaffoldVault(layout);

  console.log(`Vault: ${layout.root}`);
  for (const directory of result.createdDirectories) {
    console.log(`  + ${directory}/`);
  }
  for (const file of result.createdFiles) {
    console.log(`  + ${file}`);
  }
  if (result.createdDirectories.length === 0 && result.createdFiles.length === 0) {
    logInfo("Vault は既に初期化されています。");
  }
};

const runWatch = async (config: PipelineConfig) => {
  const pipeline = await openPipeline(config);
  await pipeline.ledger.load();

  const watcher = pipeline.createWatcher();
  await watcher.start();
  logInfo("Inbox を監視しています。Ctrl+C で終了します。");

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
      watcher
        .stop()
        .catch((error) => {
          logger.error("監視の停止に失敗しました", { error });
        })
        .finally(resolve);
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
};

const runProcess = async (config: PipelineConfig) => {
  const pipeline = await openPipeline(config);
  const summary = await pipeline.processor.processBatch();

  console.log(`処理完了: 成功 ${summary.succeeded} 件 / 失敗 ${summary.failed} 件`);
};

const printReport = (pipeline: Pipeline, title: string) => {
  const report = pipeline.statistics.current;

  console.log(title);
  console.log("----------------------------------------");
  console.log(`  ✅ Completed : ${report.completedToday}`);
  console.log(`  ⏳ Pending   : ${report.pendingToday}`);
  console.log(`  ❌ Failed    : ${report.failedToday}`);
  console.log(`  平均処理時間 : ${report.averageDurationSeconds}s`);
  console.log(`  成功率       : ${report.successRatePercent.toFixed(1)}%`);
  console.log(`  最多の種別   : ${report.mostCommonAnalysisType}`);
};

const runRebuildDashboard = async (config: PipelineConfig) => {
  const pipeline = await openPipeline(config);
  await pipeline.statistics.load();
  await pipeline.statistics.recompute();
  await pipeline.statistics.write();

  printReport(pipeline, "Dashboard.md を再生成しました。");
};

const runStatus = async (config: PipelineConfig) => {
  const pipeline = await openPipeline(config);
  await pipeline.statistics.recompute();

  printReport(pipeline, `Vault: ${pipeline.layout.root}`);
};

const runRequeue = async (config: PipelineConfig, taskId: string | undefined) => {
  if (!taskId) {
    logError("requeue コマンドにはタスク ID が必要です。");
    console.log(usage);
    exit(1);
  }

  const pipeline = await openPipeline(config);

  try {
    const result = await pipeline.requeue(taskId);
    if (result.kind !== "success") {
      logError(
        result.kind === "permanent" && result.reason === "not_found"
          ? `タスクが見つかりません: ${taskId}`
          : result.error.message
      );
      exit(1);
    }
    logInfo(`${taskId} を pending に戻しました。次回の process で再処理されます。`);
  } catch (error) {
    if (isTaskTransitionError(error)) {
      logError(error.message);
      exit(1);
    }
    throw error;
  }
};

const confirm = async (question: string) => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    const answer = await rl.question(question);
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
};

const runCleanupInbox = async (config: PipelineConfig, args: string[]) => {
  const execute = args.includes("--execute");
  const assumeYes = args.includes("--yes");
  const pipeline = await openPipeline(config);

  if (execute && !assumeYes) {
    const candidates = await pipeline.cleaner.findCandidates();
    if (candidates.length === 0) {
      logInfo("削除できるファイルはありません。");
      return;
    }
    const accepted = await confirm(
      `${candidates.length} 件のファイルを Inbox から削除します。よろしいですか? [y/N] `
    );
    if (!accepted) {
      logInfo("中止しました。");
      return;
    }
  }

  const report = await pipeline.cleaner.cleanup({ dryRun: !execute });
  console.log(formatCleanupReport(report));

  if (report.failed.length > 0) {
    exit(1);
  }
};

const main = async () => {
  const command = process.argv[2];

  if (command === undefined || command === "help") {
    console.log(usage);
    return;
  }

  const config = await readConfig();

  switch (command) {
    case "init":
      await runInit(config);
      break;
    case "watch":
      await runWatch(config);
      break;
    case "process":
      await runProcess(config);
      break;
    case "rebuild-dashboard":
      await runRebuildDashboard(config);
      break;
    case "status":
      await runStatus(config);
      break;
    case "requeue":
      await runRequeue(config, process.argv[3]);
      break;
    case "cleanup-inbox":
      await runCleanupInbox(config, process.argv.slice(3));
      break;
    default:
      logError(`不明なコマンドです: ${command}`);
      console.log(usage);
      exit(1);
  }
};

main().catch((error) => {
  if (isVaultLayoutError(error)) {
    logError(error.message);
    logError("先に `npm run vault -- init` を実行してください。");
    exit(1);
  }

  logError(
    error instanceof Error ? error.message : "コマンドの実行中に不明なエラーが発生しました。"
  );
  exit(1);
});
