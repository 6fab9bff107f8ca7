import { promises as fs } from "fs";

const TEXT_EXTENSIONS = new Set([".txt", ".md"]);
const IMAGE_EXTENSIONS = new Set([".png", ".jpg", ".jpeg"]);

const MIME_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
};

export const mimeTypeFor = (extension: string) =>
  MIME_TYPES[extension.toLowerCase()] ?? "application/octet-stream";

/**
 * タスク本文の Original Content に入れるテキストを取り出す。
 * バイナリ（PDF・画像）の中身の解釈は要約側に任せ、ここでは種別とサイズのみ記す。
 * 読み込みエラーは呼び出し元で分類するためそのまま投げる。
 */
export const extractOriginalBody = async (
  filePath: string,
  extension: string,
  sizeBytes: number
): Promise<string> => {
  const normalized = extension.toLowerCase();

  if (TEXT_EXTENSIONS.has(normalized)) {
    const content = await fs.readFile(filePath, "utf-8");
    return content.replace(/\r\n/g, "\n");
  }

  if (normalized === ".pdf") {
    return `[PDF document: ${sizeBytes} bytes, ${mimeTypeFor(normalized)}]`;
  }

  if (IMAGE_EXTENSIONS.has(normalized)) {
    const format = normalized === ".jpg" ? "JPEG" : normalized.slice(1).toUpperCase();
    return `[Image file: ${format}, ${sizeBytes} bytes]`;
  }

  return "[Unsupported file type]";
};
