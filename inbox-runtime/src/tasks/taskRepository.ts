import { promises as fs } from "fs";
import path from "path";

import { writeFileAtomic } from "../vault/atomicWrite";
import { listMarkdownFiles, type VaultLayout } from "../vault/paths";
import {
  classifyFileError,
  corrupted,
  errorCode,
  success,
  toError,
  type OperationResult,
} from "../utils/results";
import type { Task } from "./task";
import { parseTaskRecord, serializeTask, taskFilename } from "./taskRecord";

export type TaskLocation = "pending" | "done";

export type StoredTask = {
  task: Task;
  filePath: string;
  location: TaskLocation;
};

/**
 * Vault 上のタスクファイル（Needs_Action / Done / 隔離先）の読み書きを担う。
 * 状態遷移の判断は持たず、TaskLifecycle から呼ばれる。
 */
export class TaskRepository {
  private readonly layout: VaultLayout;

  constructor(layout: VaultLayout) {
    this.layout = layout;
  }

  directoryFor(location: TaskLocation) {
    return location === "pending" ? this.layout.pendingDir : this.layout.doneDir;
  }

  pathFor(taskId: string, location: TaskLocation) {
    return path.join(this.directoryFor(location), taskFilename(taskId));
  }

  async writeNew(task: Task): Promise<StoredTask> {
    const filePath = this.pathFor(task.id, "pending");
    await writeFileAtomic(filePath, serializeTask(task));
    return { task, filePath, location: "pending" };
  }

  async save(stored: StoredTask): Promise<StoredTask> {
    await writeFileAtomic(stored.filePath, serializeTask(stored.task));
    return stored;
  }

  async load(filePath: string): Promise<OperationResult<StoredTask>> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      return classifyFileError(error);
    }

    try {
      const task = parseTaskRecord(raw);
      return success({ task, filePath, location: this.locationOf(filePath) });
    } catch (error) {
      return corrupted(toError(error));
    }
  }

  async listPendingFiles(): Promise<string[]> {
    const names = await listMarkdownFiles(this.layout.pendingDir);
    return names.map((name) => path.join(this.layout.pendingDir, name));
  }

  async listDoneFiles(): Promise<string[]> {
    const names = await listMarkdownFiles(this.layout.doneDir);
    return names.map((name) => path.join(this.layout.doneDir, name));
  }

  async findById(taskId: string): Promise<OperationResult<StoredTask>> {
    const pending = await this.load(this.pathFor(taskId, "pending"));
    if (pending.kind === "permanent" && pending.reason === "not_found") {
      return this.load(this.pathFor(taskId, "done"));
    }
    return pending;
  }

  /**
   * 同一ファイルシステム内の rename で移動するため、読み手から見て
   * 両方に存在する・どちらにも存在しない状態は rename 呼び出しの間だけ。
   */
  async moveToDone(stored: StoredTask): Promise<StoredTask> {
    const destination = this.pathFor(stored.task.id, "done");
    await fs.mkdir(this.layout.doneDir, { recursive: true });
    await fs.rename(stored.filePath, destination);
    return { ...stored, filePath: destination, location: "done" };
  }

  async quarantine(filePath: string): Promise<string> {
    await fs.mkdir(this.layout.quarantineDir, { recursive: true });

    const parsed = path.parse(filePath);
    let destination = path.join(this.layout.quarantineDir, parsed.base);

    if (await this.exists(destination)) {
      const stamp = new Date().toISOString().replace(/[.:]/g, "-");
      destination = path.join(this.layout.quarantineDir, `${parsed.name}-${stamp}${parsed.ext}`);
    }

    await fs.rename(filePath, destination);
    return destination;
  }

  private locationOf(filePath: string): TaskLocation {
    return path.resolve(path.dirname(filePath)) === path.resolve(this.layout.doneDir)
      ? "done"
      : "pending";
  }

  private async exists(target: string) {
    try {
      await fs.access(target);
      return true;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return false;
      }
      throw error;
    }
  }
}
