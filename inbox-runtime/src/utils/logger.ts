export type LogLevel = "info" | "warn" | "error" | "debug";

export type Logger = {
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
  debug: (message: string, meta?: unknown) => void;
};

export type LoggerOptions = {
  debug?: boolean;
  write?: (line: string, meta?: unknown) => void;
};

const levelLabels: Record<LogLevel, string> = {
  info: "INFO",
  warn: "WARN",
  error: "ERROR",
  debug: "DEBUG",
};

const levelPrefixes: Record<LogLevel, string> = {
  info: "\u001b[36m", // cyan
  warn: "\u001b[33m", // yellow
  error: "\u001b[31m", // red
  debug: "\u001b[90m", // gray
};

const LEVEL_RESET = "\u001b[0m";

const isDebugEnabled = () => process.env.NODE_ENV !== "production";

const writeToConsole = (line: string, meta?: unknown) => {
  if (meta) {
    console.log(line, meta);
  } else {
    console.log(line);
  }
};

/**
 * コンポーネント単位のロガーを生成する。
 *
 * 名前をキーにしたグローバルなロガー登録は持たず、生成したインスタンスを
 * 各コンポーネントのコンストラクタへ渡して使う。
 */
export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
  const write = options.write ?? writeToConsole;
  const debugEnabled = options.debug ?? isDebugEnabled();

  const log = (level: LogLevel, message: string, meta?: unknown) => {
    if (level === "debug" && !debugEnabled) {
      return;
    }

    const color = levelPrefixes[level];
    const label = levelLabels[level];
    const timestamp = new Date().toISOString();
    const prefix = `${color}[${timestamp}] [${label}]${LEVEL_RESET} [${scope}]`;

    write(`${prefix} ${message}`, meta);
  };

  return {
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    debug: (message, meta) => log("debug", message, meta),
  };
};

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
