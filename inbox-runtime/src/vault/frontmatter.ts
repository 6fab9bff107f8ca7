import { dump as dumpYaml, load as loadYaml, JSON_SCHEMA } from "js-yaml";

const FRONT_MATTER_PATTERN = /^---\n([\s\S]*?)\n---\n?([\s\S]*)$/;

export type FrontmatterFields = Record<string, unknown>;

export type FrontmatterDocument = {
  fields: FrontmatterFields;
  body: string;
};

export class FrontmatterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FrontmatterError";
  }
}

export const isFrontmatterError = (error: unknown): error is FrontmatterError =>
  error instanceof FrontmatterError;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeLineEndings = (value: string) => value.replace(/\r\n/g, "\n");

export const encodeFrontmatter = (fields: FrontmatterFields, body: string) => {
  const header = dumpYaml(fields, {
    lineWidth: 120,
    noRefs: true,
    schema: JSON_SCHEMA,
  }).trimEnd();
  let content = `---\n${header}\n---\n\n${body.replace(/^\n+/, "")}`;
  if (!content.endsWith("\n")) {
    content += "\n";
  }
  return content;
};

/**
 * 日時などはタイムスタンプ型に変換せず文字列のまま扱うため JSON スキーマで読む。
 *
 * `---` で囲まれた YAML ヘッダーと本文に分解する。
 * ヘッダーが無い・YAML として壊れている・マッピングでない場合は FrontmatterError。
 */
export const decodeFrontmatter = (raw: string): FrontmatterDocument => {
  const match = normalizeLineEndings(raw).match(FRONT_MATTER_PATTERN);

  if (!match) {
    throw new FrontmatterError("フロントマターが見つかりません。");
  }

  const [, header, body] = match;

  let parsed: unknown;
  try {
    parsed = loadYaml(header ?? "", { schema: JSON_SCHEMA });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FrontmatterError(`フロントマターの YAML を解析できませんでした: ${message}`, {
      cause: error,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new FrontmatterError("フロントマターがマッピング形式ではありません。");
  }

  return {
    fields: parsed,
    body: (body ?? "").replace(/^\n+/, ""),
  };
};
