import { promises as fs } from "fs";
import path from "path";

import { DEFAULT_HANDBOOK_TEMPLATE } from "../rules/handbook";
import { StatisticsAggregator } from "../stats/dashboard";
import { createLogger, type Logger } from "../utils/logger";
import { errorCode } from "../utils/results";
import { writeFileAtomic } from "./atomicWrite";
import type { VaultLayout } from "./paths";

export type ScaffoldResult = {
  createdDirectories: string[];
  createdFiles: string[];
};

const GITKEEP = ".gitkeep";

const exists = async (target: string) => {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
};

/**
 * Vault のフォルダと初期ファイルを作成する。既存のものには触れない。
 */
export const scaffoldVault = async (
  layout: VaultLayout,
  options: { logger?: Logger; now?: () => Date } = {}
): Promise<ScaffoldResult> => {
  const logger = options.logger ?? createLogger("scaffold");
  const result: ScaffoldResult = { createdDirectories: [], createdFiles: [] };

  const directories = [
    layout.inboxDir,
    layout.pendingDir,
    layout.doneDir,
    layout.logsDir,
    layout.quarantineDir,
    layout.approvalDir,
  ];

  for (const directory of directories) {
    if (!(await exists(directory))) {
      await fs.mkdir(directory, { recursive: true });
      result.createdDirectories.push(path.relative(layout.root, directory));
    }

    const keep = path.join(directory, GITKEEP);
    if (!(await exists(keep))) {
      await fs.writeFile(keep, "");
    }
  }

  if (!(await exists(layout.dashboardFile))) {
    const statistics = new StatisticsAggregator(layout, { logger, now: options.now });
    await statistics.write();
    result.createdFiles.push(path.basename(layout.dashboardFile));
  }

  if (!(await exists(layout.handbookFile))) {
    await writeFileAtomic(layout.handbookFile, DEFAULT_HANDBOOK_TEMPLATE);
    result.createdFiles.push(path.basename(layout.handbookFile));
  }

  logger.info("Vault を初期化しました", {
    root: layout.root,
    directories: result.createdDirectories.length,
    files: result.createdFiles,
  });

  return result;
};
