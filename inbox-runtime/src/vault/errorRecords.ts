import { promises as fs } from "fs";
import path from "path";

import { createLogger, describeError, type Logger } from "../utils/logger";
import { errorCode, toError } from "../utils/results";

const ERROR_RECORD_PREFIX = "error-";
const ERROR_RECORD_SUFFIX = ".md";
const MAX_NAME_ATTEMPTS = 1000;

export type ErrorRecorderOptions = {
  logger?: Logger;
  now?: () => Date;
};

export type ErrorRecord = {
  timestamp: string;
  context: string;
  errorType: string;
  message: string;
  stack: string | null;
};

const pad = (value: number) => String(value).padStart(2, "0");

export const formatRecordTimestamp = (date: Date) =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

export const isErrorRecordFilename = (filename: string) =>
  filename.startsWith(ERROR_RECORD_PREFIX) && filename.endsWith(ERROR_RECORD_SUFFIX);

export const renderErrorRecord = (record: ErrorRecord) => `# Error Log

**Timestamp**: ${record.timestamp}
**Context**: ${record.context}

## Error Details

**Type**: ${record.errorType}
**Message**: ${record.message}

## Stack Trace

\`\`\`
${record.stack ?? "No traceback available"}
\`\`\`
`;

export const countErrorRecords = async (logsDir: string) => {
  try {
    const entries = await fs.readdir(logsDir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile() && isErrorRecordFilename(entry.name))
      .length;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return 0;
    }
    throw error;
  }
};

/**
 * 失敗 1 件につき 1 ファイルのエラーレコードを Logs/ に残す。
 */
export class ErrorRecorder {
  private readonly logsDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(logsDir: string, options: ErrorRecorderOptions = {}) {
    this.logsDir = logsDir;
    this.logger = options.logger ?? createLogger("error-records");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * 書き込みに失敗しても例外は投げず、ログに残して null を返す。
   */
  async record(error: unknown, context: string): Promise<string | null> {
    const normalized = toError(error);
    const date = this.now();
    const content = renderErrorRecord({
      timestamp: date.toISOString(),
      context,
      errorType: normalized.name,
      message: normalized.message,
      stack: normalized.stack ?? null,
    });

    try {
      await fs.mkdir(this.logsDir, { recursive: true });
      const filePath = await this.writeUnique(formatRecordTimestamp(date), content);
      this.logger.info("エラーレコードを作成しました", {
        file: path.basename(filePath),
        context,
      });
      return filePath;
    } catch (writeError) {
      this.logger.error("エラーレコードの書き込みに失敗しました", {
        context,
        error: describeError(writeError),
      });
      return null;
    }
  }

  private async writeUnique(stamp: string, content: string) {
    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt += 1) {
      const suffix = attempt === 1 ? "" : `-${attempt}`;
      const filePath = path.join(
        this.logsDir,
        `${ERROR_RECORD_PREFIX}${stamp}${suffix}${ERROR_RECORD_SUFFIX}`
      );

      try {
        await fs.writeFile(filePath, content, { encoding: "utf-8", flag: "wx" });
        return filePath;
      } catch (error) {
        if (errorCode(error) === "EEXIST") {
          continue;
        }
        throw error;
      }
    }

    throw new Error(`エラーレコードのファイル名を確保できませんでした: ${stamp}`);
  }
}
