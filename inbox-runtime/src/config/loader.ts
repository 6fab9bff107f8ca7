import { promises as fs } from "fs";
import path from "path";
import yaml from "js-yaml";
import { ZodError, type ZodIssue } from "zod";

import { createLogger, type Logger } from "../utils/logger";
import { errorCode } from "../utils/results";
import { ConfigSchema, type PipelineConfig } from "./schema";

export type ConfigLoadSuccess = {
  ok: true;
  path: string;
  config: PipelineConfig;
};

export type ConfigLoadFailure = {
  ok: false;
  path: string;
  message: string;
  issues?: ZodIssue[];
};

export type ConfigLoadResult = ConfigLoadSuccess | ConfigLoadFailure;

export type ConfigLoadOptions = {
  cwd?: string;
  logger?: Logger;
  logSuccess?: boolean;
};

export const DEFAULT_CONFIG_RELATIVE_PATH = path.join("config", "pipeline.yaml");

class ConfigFileMissingError extends Error {
  constructor(filePath: string) {
    super(`設定ファイルが見つかりません: ${filePath}`);
    this.name = "ConfigFileMissingError";
  }
}

const readFile = async (filePath: string): Promise<string> => {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new ConfigFileMissingError(filePath);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`設定ファイルの読み込みに失敗しました: ${message}`);
  }
};

const parseYaml = (raw: string) => {
  try {
    return yaml.load(raw, { json: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`YAMLのパースに失敗しました: ${message}`);
  }
};

const validateConfig = (data: unknown): PipelineConfig =>
  ConfigSchema.parse(data === null || data === undefined ? {} : data);

export const loadConfig = async (
  customPath?: string,
  options: ConfigLoadOptions = {}
): Promise<ConfigLoadResult> => {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? createLogger("config");
  const filePath = customPath
    ? path.resolve(cwd, customPath)
    : path.resolve(cwd, DEFAULT_CONFIG_RELATIVE_PATH);

  try {
    let rawConfig: unknown = {};
    try {
      rawConfig = parseYaml(await readFile(filePath));
    } catch (error) {
      // 既定パスのファイルが無い場合のみスキーマの既定値で動かす。
      if (!(error instanceof ConfigFileMissingError) || customPath) {
        throw error;
      }
      logger.debug("設定ファイルが無いため既定値を使用します", { path: filePath });
    }

    const config = validateConfig(rawConfig);

    if (options.logSuccess ?? true) {
      logger.info("設定ファイルを読み込みました", {
        path: filePath,
      });
    }

    return { ok: true, path: filePath, config } satisfies ConfigLoadSuccess;
  } catch (error) {
    const isZodError = error instanceof ZodError;
    const message = error instanceof Error ? error.message : String(error);
    const issues = isZodError ? error.issues : undefined;

    logger.error("設定ファイルの読み込みに失敗しました", {
      path: filePath,
      message,
      issues,
    });

    const failure: ConfigLoadFailure = {
      ok: false,
      path: filePath,
      message,
    };

    if (issues) {
      failure.issues = issues;
    }

    return failure;
  }
};

/**
 * VAULT_PATH が設定されていれば vault.path を上書きする。
 */
export const applyEnvironmentOverrides = (
  config: PipelineConfig,
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig => {
  const vaultPath = env.VAULT_PATH?.trim();
  if (!vaultPath) {
    return config;
  }
  return { ...config, vault: { ...config.vault, path: vaultPath } };
};
