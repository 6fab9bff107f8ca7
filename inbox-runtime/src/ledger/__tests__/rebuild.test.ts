import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";

import { TaskRepository } from "../../tasks/taskRepository";
import {
  buildTask,
  createRecordingLogger,
  createTempVault,
  FIXED_NOW,
  listFiles,
} from "../../testing/fixtures";
import { TaskCreator } from "../../watcher/taskCreator";
import type { VaultLayout } from "../../vault/paths";
import { LedgerStore } from "../ledgerStore";
import { createLedgerRebuilder } from "../rebuild";

const openCreator = (layout: VaultLayout, taskId: string) => {
  const logger = createRecordingLogger();
  const repository = new TaskRepository(layout);
  const ledger = new LedgerStore(layout.ledgerFile, {
    logger,
    now: () => FIXED_NOW,
    rebuild: createLedgerRebuilder(repository),
  });
  const creator = new TaskCreator(ledger, repository, {
    logger,
    now: () => FIXED_NOW,
    generateId: () => taskId,
  });
  return { ledger, creator, logger };
};

const fileInfo = (name: string, discoveredAt: string) => ({
  name,
  extension: path.extname(name),
  sizeBytes: 10,
  discoveredAt,
});

test("台帳が壊れていても既存タスクから復元し、同じファイルを再登録しない", async () => {
  const layout = await createTempVault("ledger-rebuild-");
  const inboxFile = path.join(layout.inboxDir, "invoice.txt");
  await fs.writeFile(inboxFile, "total: 120");

  const first = openCreator(layout, "task-20250314-092653-000001");
  const created = await first.creator.createFromFile(inboxFile);
  assert.ok(created.kind === "success" && created.value.status === "created");

  await fs.writeFile(layout.ledgerFile, "{ truncated");

  const second = openCreator(layout, "task-20250314-092653-000002");
  const result = await second.creator.createFromFile(inboxFile);

  assert.deepEqual(result, {
    kind: "success",
    value: { status: "already_processed", taskId: "task-20250314-092653-000001" },
  });
  assert.deepEqual(await listFiles(layout.pendingDir), ["task-20250314-092653-000001.md"]);

  const persisted = JSON.parse(await fs.readFile(layout.ledgerFile, "utf-8"));
  assert.deepEqual(persisted.processedFiles, [
    {
      filename: "invoice.txt",
      processedAt: FIXED_NOW.toISOString(),
      taskId: "task-20250314-092653-000001",
    },
  ]);
  assert.deepEqual(persisted.pendingTaskIds, ["task-20250314-092653-000001"]);
  assert.equal(
    second.logger.entries.filter((item) => item.message === "タスクファイルから台帳を再構築しました")
      .length,
    1
  );
});

test("台帳が無い場合は Needs_Action と Done のタスクから発見順に復元する", async () => {
  const layout = await createTempVault("ledger-rebuild-");
  const repository = new TaskRepository(layout);

  await repository.writeNew(
    buildTask({
      id: "task-b",
      originalFile: fileInfo("b.md", "2025-03-14T10:00:00.000Z"),
    })
  );
  await repository.writeNew(
    buildTask({
      id: "task-c",
      status: "failed",
      error: "timeout",
      originalFile: fileInfo("c.pdf", "2025-03-14T11:00:00.000Z"),
    })
  );
  const done = await repository.writeNew(
    buildTask({
      id: "task-a",
      status: "completed",
      content: { originalBody: "body", analysisBody: "## Summary" },
      processing: { model: "test-model", durationSeconds: 1, tokenCount: 10 },
      originalFile: fileInfo("a.txt", "2025-03-14T09:00:00.000Z"),
    })
  );
  await repository.moveToDone(done);
  await fs.writeFile(path.join(layout.pendingDir, "task-broken.md"), "no frontmatter\n");

  const ledger = new LedgerStore(layout.ledgerFile, {
    logger: createRecordingLogger(),
    now: () => FIXED_NOW,
    rebuild: createLedgerRebuilder(repository),
  });
  const state = await ledger.snapshot();

  assert.deepEqual(state.processedFiles, [
    { filename: "a.txt", processedAt: "2025-03-14T09:00:00.000Z", taskId: "task-a" },
    { filename: "b.md", processedAt: "2025-03-14T10:00:00.000Z", taskId: "task-b" },
    { filename: "c.pdf", processedAt: "2025-03-14T11:00:00.000Z", taskId: "task-c" },
  ]);
  assert.deepEqual([...state.pendingTaskIds].sort(), ["task-b", "task-c"]);
  assert.equal(ledger.isDirty, false);
});

test("タスクが一つも無ければ台帳ファイルは作らない", async () => {
  const layout = await createTempVault("ledger-rebuild-");
  const logger = createRecordingLogger();
  const ledger = new LedgerStore(layout.ledgerFile, {
    logger,
    now: () => FIXED_NOW,
    rebuild: createLedgerRebuilder(new TaskRepository(layout)),
  });

  assert.deepEqual((await ledger.snapshot()).processedFiles, []);
  await assert.rejects(fs.access(layout.ledgerFile));
  assert.equal(logger.entries.length, 0);
});
