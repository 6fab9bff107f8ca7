import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";

/**
 * 一時ファイルへ書き込んでから rename で置き換える。
 * 途中でプロセスが落ちても元のファイルは壊れない。
 */
export const writeFileAtomic = async (filePath: string, content: string) => {
  const directory = path.dirname(filePath);
  const tmpPath = `${filePath}.${randomUUID().slice(0, 8)}.tmp`;

  await fs.mkdir(directory, { recursive: true });

  try {
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw error;
  }
};
