import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";

import { writeFileAtomic } from "../vault/atomicWrite";
import { countErrorRecords } from "../vault/errorRecords";
import { decodeFrontmatter, encodeFrontmatter } from "../vault/frontmatter";
import { listMarkdownFiles, type VaultLayout } from "../vault/paths";
import { parseTaskRecord } from "../tasks/taskRecord";
import type { Task } from "../tasks/task";
import { createLogger, describeError, type Logger } from "../utils/logger";
import { errorCode } from "../utils/results";

export const DEFAULT_ACTIVITY_LIMIT = 10;
export const ACTIVITY_SUMMARY_LIMIT = 50;
export const NO_ANALYSIS_TYPE = "N/A";

export const ACTIVITY_GLYPHS = {
  completed: "✅",
  failed: "❌",
} as const;

export type ActivityStatus = keyof typeof ACTIVITY_GLYPHS;

export type ActivityEntry = {
  time: string;
  taskId: string;
  displayName: string;
  statusGlyph: string;
  summary: string;
};

export type ActivityInput = {
  taskId: string;
  displayName: string;
  status: ActivityStatus;
  summary: string;
};

export type ReportCounts = {
  completedToday: number;
  pendingToday: number;
  failedToday: number;
  totalProcessed: number;
};

export type Report = ReportCounts & {
  averageDurationSeconds: number;
  successRatePercent: number;
  mostCommonAnalysisType: string;
  lastUpdated: string;
  recentActivity: ActivityEntry[];
};

const ActivitySchema = z.object({
  time: z.string(),
  task_id: z.string(),
  display_name: z.string(),
  status: z.string(),
  summary: z.string(),
});

const DashboardFieldsSchema = z.object({
  type: z.literal("dashboard"),
  last_updated: z.string(),
  stats: z.object({
    completed_today: z.number().int().nonnegative(),
    pending_today: z.number().int().nonnegative(),
    failed_today: z.number().int().nonnegative(),
    total_processed: z.number().int().nonnegative(),
    average_duration_seconds: z.number().nonnegative(),
    success_rate_percent: z.number().min(0).max(100),
    most_common_analysis_type: z.string(),
  }),
  recent_activity: z.array(ActivitySchema),
});

export type StatisticsAggregatorOptions = {
  logger?: Logger;
  now?: () => Date;
  activityLimit?: number;
};

type StoreLayout = Pick<VaultLayout, "pendingDir" | "doneDir" | "logsDir" | "dashboardFile">;

export const computeSuccessRate = (completed: number, failed: number) => {
  const total = completed + failed;
  return total === 0 ? 100 : (completed / total) * 100;
};

export const formatAnalysisType = (value: string) =>
  value
    .split(/[_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");

/**
 * 件数が同じ場合は先に現れたものを採用する。
 */
export const pickMostCommon = (values: readonly string[]) => {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let winner: string | null = null;
  let best = 0;
  for (const [value, count] of counts) {
    if (count > best) {
      best = count;
      winner = value;
    }
  }

  return winner;
};

export const truncateSummary = (summary: string, limit = ACTIVITY_SUMMARY_LIMIT) =>
  Array.from(summary.trim()).slice(0, limit).join("");

const pad = (value: number) => String(value).padStart(2, "0");

const formatActivityTime = (date: Date) =>
  `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;

const escapeTableCell = (value: string) => value.replace(/\|/g, "\\|").replace(/\n/g, " ");

const buildEmptyReport = (now: Date): Report => ({
  completedToday: 0,
  pendingToday: 0,
  failedToday: 0,
  totalProcessed: 0,
  averageDurationSeconds: 0,
  successRatePercent: 100,
  mostCommonAnalysisType: NO_ANALYSIS_TYPE,
  lastUpdated: now.toISOString(),
  recentActivity: [],
});

const cloneReport = (report: Report): Report => ({
  ...report,
  recentActivity: report.recentActivity.map((entry) => ({ ...entry })),
});

/**
 * Dashboard.md に書き出す統計を管理する。
 *
 * 件数は常にファイルシステムから再計算できる（Needs_Action / Done / Logs の
 * ファイル数）。`bump` はバッチ中の途中経過を反映するためだけに使い、
 * バッチの最後に必ず `recompute` で上書きする。
 */
export class StatisticsAggregator {
  private readonly layout: StoreLayout;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly activityLimit: number;
  private report: Report;

  constructor(layout: StoreLayout, options: StatisticsAggregatorOptions = {}) {
    this.layout = layout;
    this.logger = options.logger ?? createLogger("statistics");
    this.now = options.now ?? (() => new Date());
    this.activityLimit = Math.max(1, options.activityLimit ?? DEFAULT_ACTIVITY_LIMIT);
    this.report = buildEmptyReport(this.now());
  }

  get current(): Report {
    return cloneReport(this.report);
  }

  /**
   * 既存の Dashboard.md から最近のアクティビティを復元する。
   * 壊れている場合は空のレポートから始める。
   */
  async load(): Promise<Report> {
    let raw: string;
    try {
      raw = await fs.readFile(this.layout.dashboardFile, "utf-8");
    } catch (error) {
      if (errorCode(error) !== "ENOENT") {
        this.logger.warn("Dashboard.md を読み込めませんでした", {
          error: describeError(error),
        });
      }
      return this.current;
    }

    try {
      const { fields } = decodeFrontmatter(raw);
      const parsed = DashboardFieldsSchema.parse(fields);
      this.report = {
        completedToday: parsed.stats.completed_today,
        pendingToday: parsed.stats.pending_today,
        failedToday: parsed.stats.failed_today,
        totalProcessed: parsed.stats.total_processed,
        averageDurationSeconds: parsed.stats.average_duration_seconds,
        successRatePercent: parsed.stats.success_rate_percent,
        mostCommonAnalysisType: parsed.stats.most_common_analysis_type,
        lastUpdated: parsed.last_updated,
        recentActivity: parsed.recent_activity.slice(0, this.activityLimit).map((entry) => ({
          time: entry.time,
          taskId: entry.task_id,
          displayName: entry.display_name,
          statusGlyph: entry.status,
          summary: entry.summary,
        })),
      };
    } catch (error) {
      this.logger.warn("Dashboard.md の形式が不正なため、空のレポートとして扱います", {
        error: describeError(error),
      });
      this.report = buildEmptyReport(this.now());
    }

    return this.current;
  }

  async recompute(): Promise<Report> {
    const pendingTasks = await this.readTasks(this.layout.pendingDir);
    const doneTasks = await this.readTasks(this.layout.doneDir);
    const failedToday = await countErrorRecords(this.layout.logsDir);

    // 完了済みだが Done/ へ移動できなかったものは完了として数える。
    const stranded = pendingTasks.filter((entry) => entry.task?.status === "completed");
    const pendingToday = pendingTasks.filter(
      (entry) =>
        entry.task === null ||
        entry.task.status === "pending" ||
        entry.task.status === "processing"
    ).length;

    const completedEntries = [...doneTasks, ...stranded];
    const completedToday = completedEntries.length;
    const completedTasks = completedEntries.flatMap((entry) => (entry.task ? [entry.task] : []));

    const durations = completedTasks.flatMap((task) =>
      task.processing ? [task.processing.durationSeconds] : []
    );
    const averageDurationSeconds =
      durations.length === 0
        ? 0
        : Math.round((durations.reduce((sum, value) => sum + value, 0) / durations.length) * 10) /
          10;

    const winner = pickMostCommon(
      completedTasks.flatMap((task) => (task.analysisType ? [task.analysisType] : []))
    );

    this.report = {
      ...this.report,
      completedToday,
      pendingToday,
      failedToday,
      totalProcessed: completedToday,
      averageDurationSeconds,
      successRatePercent: computeSuccessRate(completedToday, failedToday),
      mostCommonAnalysisType: winner ? formatAnalysisType(winner) : NO_ANALYSIS_TYPE,
      lastUpdated: this.now().toISOString(),
    };

    return this.current;
  }

  bump(status: ActivityStatus) {
    const next = { ...this.report };
    if (status === "completed") {
      next.completedToday += 1;
      next.totalProcessed += 1;
    } else {
      next.failedToday += 1;
    }
    next.pendingToday = Math.max(0, next.pendingToday - 1);
    next.successRatePercent = computeSuccessRate(next.completedToday, next.failedToday);
    next.lastUpdated = this.now().toISOString();
    this.report = next;
  }

  recordActivity(input: ActivityInput) {
    const entry: ActivityEntry = {
      time: formatActivityTime(this.now()),
      taskId: input.taskId,
      displayName: input.displayName.trim() || "Unknown",
      statusGlyph: ACTIVITY_GLYPHS[input.status],
      summary: truncateSummary(input.summary) || "No summary available",
    };

    this.report = {
      ...this.report,
      recentActivity: [entry, ...this.report.recentActivity].slice(0, this.activityLimit),
    };
  }

  render(): string {
    const report = this.report;
    const fields = {
      type: "dashboard",
      last_updated: report.lastUpdated,
      stats: {
        completed_today: report.completedToday,
        pending_today: report.pendingToday,
        failed_today: report.failedToday,
        total_processed: report.totalProcessed,
        average_duration_seconds: report.averageDurationSeconds,
        success_rate_percent: report.successRatePercent,
        most_common_analysis_type: report.mostCommonAnalysisType,
      },
      recent_activity: report.recentActivity.map((entry) => ({
        time: entry.time,
        task_id: entry.taskId,
        display_name: entry.displayName,
        status: entry.statusGlyph,
        summary: entry.summary,
      })),
    };

    const activityRows =
      report.recentActivity.length === 0
        ? ["| -- | No activity yet | -- | Drop files in Inbox/ to get started |"]
        : report.recentActivity.map(
            (entry) =>
              `| ${entry.time} | [[${entry.taskId}\\|${escapeTableCell(entry.displayName)}]] | ${
                entry.statusGlyph
              } | ${escapeTableCell(entry.summary)} |`
          );

    const body = [
      "# AI Assistant Dashboard",
      "",
      `**Last Updated**: ${report.lastUpdated}`,
      "",
      "## Today's Summary",
      "",
      `- ✅ Completed: ${report.completedToday} tasks`,
      `- ⏳ Pending: ${report.pendingToday} tasks`,
      `- ❌ Failed: ${report.failedToday} tasks`,
      "",
      "## Recent Activity",
      "",
      "| Time | File | Status | Summary |",
      "|------|------|--------|---------|",
      ...activityRows,
      "",
      "## Statistics",
      "",
      `- **Total tasks processed**: ${report.totalProcessed}`,
      `- **Average processing time**: ${report.averageDurationSeconds}s`,
      `- **Success rate**: ${report.successRatePercent.toFixed(1)}%`,
      `- **Most common type**: ${report.mostCommonAnalysisType}`,
      "",
      "## Quick Links",
      "",
      "- [[Company_Handbook]] - Edit processing rules",
      "- [[Needs_Action/]] - View pending tasks",
      "- [[Done/]] - View completed tasks",
      "- [[Logs/]] - View error logs",
    ].join("\n");

    return encodeFrontmatter(fields, body);
  }

  async write(): Promise<void> {
    await writeFileAtomic(this.layout.dashboardFile, this.render());
    this.logger.debug("Dashboard.md を更新しました", {
      file: path.basename(this.layout.dashboardFile),
    });
  }

  private async readTasks(directory: string): Promise<Array<{ file: string; task: Task | null }>> {
    const names = await listMarkdownFiles(directory);
    const entries: Array<{ file: string; task: Task | null }> = [];

    for (const name of names) {
      const filePath = path.join(directory, name);
      try {
        const raw = await fs.readFile(filePath, "utf-8");
        entries.push({ file: name, task: parseTaskRecord(raw) });
      } catch (error) {
        if (errorCode(error) === "ENOENT") {
          continue;
        }
        this.logger.debug("統計用にタスクを読み込めませんでした", {
          file: name,
          error: describeError(error),
        });
        entries.push({ file: name, task: null });
      }
    }

    return entries;
  }
}
