import type { TaskRepository } from "../tasks/taskRepository";
import type { LedgerEntry, LedgerRebuild } from "./ledgerStore";

/**
 * Needs_Action/ と Done/ のタスクファイルから台帳の内容を組み立てる。
 * 読み込めないファイルは飛ばす（バッチ処理で隔離される）。
 * completed 以外のタスクは pendingTaskIds に戻す。
 */
export const createLedgerRebuilder =
  (repository: TaskRepository) => async (): Promise<LedgerRebuild> => {
    const files = [
      ...(await repository.listPendingFiles()),
      ...(await repository.listDoneFiles()),
    ];
    const entries = new Map<string, LedgerEntry>();
    const pendingTaskIds: string[] = [];

    for (const filePath of files) {
      const loaded = await repository.load(filePath);
      if (loaded.kind !== "success") {
        continue;
      }

      const { task } = loaded.value;
      if (!entries.has(task.originalFile.name)) {
        entries.set(task.originalFile.name, {
          filename: task.originalFile.name,
          processedAt: task.originalFile.discoveredAt,
          taskId: task.id,
        });
      }
      if (task.status !== "completed" && !pendingTaskIds.includes(task.id)) {
        pendingTaskIds.push(task.id);
      }
    }

    const processedFiles = [...entries.values()].sort((a, b) =>
      a.processedAt === b.processedAt
        ? a.filename.localeCompare(b.filename)
        : a.processedAt.localeCompare(b.processedAt)
    );

    return { processedFiles, pendingTaskIds };
  };
