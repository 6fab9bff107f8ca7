import { promises as fs } from "fs";
import path from "path";

import type { LedgerStore } from "../ledger/ledgerStore";
import type { TaskRepository } from "../tasks/taskRepository";
import { createLogger, describeError, type Logger } from "../utils/logger";

export type CleanupCandidate = {
  filename: string;
  filePath: string;
  taskId: string;
};

export type CleanupFailure = {
  filename: string;
  message: string;
};

export type CleanupReport = {
  dryRun: boolean;
  total: number;
  deleted: string[];
  failed: CleanupFailure[];
};

export type InboxCleanerOptions = {
  logger?: Logger;
};

/**
 * 台帳に登録済みで、かつ対応するタスクが Done/ にある Inbox のファイルだけを消す。
 */
export class InboxCleaner {
  private readonly inboxDir: string;
  private readonly ledger: LedgerStore;
  private readonly repository: TaskRepository;
  private readonly logger: Logger;

  constructor(
    inboxDir: string,
    ledger: LedgerStore,
    repository: TaskRepository,
    options: InboxCleanerOptions = {}
  ) {
    this.inboxDir = inboxDir;
    this.ledger = ledger;
    this.repository = repository;
    this.logger = options.logger ?? createLogger("inbox-cleanup");
  }

  async findCandidates(): Promise<CleanupCandidate[]> {
    const doneNames = await this.completedSourceNames();
    const entries = await fs.readdir(this.inboxDir, { withFileTypes: true });
    const candidates: CleanupCandidate[] = [];

    const files = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));

    for (const filename of files) {
      const ledgerEntry = await this.ledger.findEntry(filename);
      if (!ledgerEntry) {
        continue;
      }

      if (!doneNames.has(filename)) {
        this.logger.warn("取り込み済みですがタスクが Done/ にありません", { filename });
        continue;
      }

      candidates.push({
        filename,
        filePath: path.join(this.inboxDir, filename),
        taskId: ledgerEntry.taskId,
      });
    }

    return candidates;
  }

  async cleanup(options: { dryRun: boolean }): Promise<CleanupReport> {
    const candidates = await this.findCandidates();
    const report: CleanupReport = {
      dryRun: options.dryRun,
      total: candidates.length,
      deleted: [],
      failed: [],
    };

    for (const candidate of candidates) {
      if (options.dryRun) {
        this.logger.info("[DRY RUN] 削除対象です", { filename: candidate.filename });
        report.deleted.push(candidate.filename);
        continue;
      }

      try {
        await fs.unlink(candidate.filePath);
        this.logger.info("Inbox から削除しました", { filename: candidate.filename });
        report.deleted.push(candidate.filename);
      } catch (error) {
        this.logger.error("Inbox のファイルを削除できませんでした", {
          filename: candidate.filename,
          error: describeError(error),
        });
        report.failed.push({ filename: candidate.filename, message: describeError(error) });
      }
    }

    return report;
  }

  private async completedSourceNames(): Promise<Set<string>> {
    const names = new Set<string>();

    for (const filePath of await this.repository.listDoneFiles()) {
      const loaded = await this.repository.load(filePath);
      if (loaded.kind === "success") {
        names.add(loaded.value.task.originalFile.name);
      } else {
        this.logger.warn("Done/ のタスクを読み込めませんでした", {
          file: path.basename(filePath),
          error: loaded.error.message,
        });
      }
    }

    return names;
  }
}

export const formatCleanupReport = (report: CleanupReport) => {
  const lines = ["=".repeat(60), "INBOX CLEANUP REPORT", "=".repeat(60)];

  if (report.dryRun) {
    lines.push("", "⚠️  DRY RUN MODE - No files were actually deleted");
  }

  lines.push(
    "",
    `Total files found: ${report.total}`,
    `Successfully deleted: ${report.deleted.length}`,
    `Failed: ${report.failed.length}`
  );

  if (report.deleted.length > 0) {
    lines.push("", "Deleted files:");
    const label = report.dryRun ? "[WOULD DELETE]" : "[DELETED]";
    for (const filename of report.deleted) {
      lines.push(`  ${label} ${filename}`);
    }
  }

  if (report.failed.length > 0) {
    lines.push("", "Failed to delete:");
    for (const failure of report.failed) {
      lines.push(`  ❌ ${failure.filename}: ${failure.message}`);
    }
  }

  lines.push("", "=".repeat(60));
  return lines.join("\n");
};
