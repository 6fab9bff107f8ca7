import { promises as fs } from "fs";
import path from "path";

import { errorCode } from "../utils/results";

export const INBOX_DIR_NAME = "Inbox";
export const PENDING_DIR_NAME = "Needs_Action";
export const DONE_DIR_NAME = "Done";
export const LOGS_DIR_NAME = "Logs";
export const QUARANTINE_DIR_NAME = "failed";
export const APPROVAL_DIR_NAME = "Pending_Approval";
export const LEDGER_FILENAME = ".watcher-state.json";
export const DASHBOARD_FILENAME = "Dashboard.md";
export const HANDBOOK_FILENAME = "Company_Handbook.md";

export type VaultLayout = {
  root: string;
  inboxDir: string;
  pendingDir: string;
  doneDir: string;
  logsDir: string;
  quarantineDir: string;
  approvalDir: string;
  ledgerFile: string;
  dashboardFile: string;
  handbookFile: string;
};

export class VaultLayoutError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super(message);
    this.name = "VaultLayoutError";
    this.missing = missing;
  }
}

export const isVaultLayoutError = (error: unknown): error is VaultLayoutError =>
  error instanceof VaultLayoutError;

export const resolveVaultLayout = (root: string): VaultLayout => {
  const resolvedRoot = path.resolve(root);
  const logsDir = path.join(resolvedRoot, LOGS_DIR_NAME);

  return {
    root: resolvedRoot,
    inboxDir: path.join(resolvedRoot, INBOX_DIR_NAME),
    pendingDir: path.join(resolvedRoot, PENDING_DIR_NAME),
    doneDir: path.join(resolvedRoot, DONE_DIR_NAME),
    logsDir,
    quarantineDir: path.join(logsDir, QUARANTINE_DIR_NAME),
    approvalDir: path.join(resolvedRoot, APPROVAL_DIR_NAME),
    ledgerFile: path.join(resolvedRoot, LEDGER_FILENAME),
    dashboardFile: path.join(resolvedRoot, DASHBOARD_FILENAME),
    handbookFile: path.join(resolvedRoot, HANDBOOK_FILENAME),
  };
};

const isDirectory = async (target: string) => {
  try {
    const stats = await fs.stat(target);
    return stats.isDirectory();
  } catch {
    return false;
  }
};

/**
 * watch / process の起動前提となるディレクトリを検査する。
 * 欠けている場合は VaultLayoutError を投げ、プロセス全体を失敗させる。
 */
export const assertVaultLayout = async (layout: VaultLayout) => {
  if (!(await isDirectory(layout.root))) {
    throw new VaultLayoutError(`Vault が見つかりません: ${layout.root}`, [layout.root]);
  }

  const required = [layout.inboxDir, layout.pendingDir, layout.doneDir, layout.logsDir];
  const missing: string[] = [];

  for (const directory of required) {
    if (!(await isDirectory(directory))) {
      missing.push(directory);
    }
  }

  if (missing.length > 0) {
    throw new VaultLayoutError(
      `Vault に必要なフォルダがありません: ${missing
        .map((directory) => path.relative(layout.root, directory))
        .join(", ")}`,
      missing
    );
  }
};

export const listMarkdownFiles = async (directory: string): Promise<string[]> => {
  try {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b));
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }
};
