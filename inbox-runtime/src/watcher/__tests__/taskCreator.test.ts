import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";

import { LedgerStore } from "../../ledger/ledgerStore";
import { parseTaskRecord } from "../../tasks/taskRecord";
import { TaskRepository } from "../../tasks/taskRepository";
import { createRecordingLogger, createTempVault, FIXED_NOW, listFiles } from "../../testing/fixtures";
import { TaskCreator } from "../taskCreator";

const setup = async (ledgerFile?: string) => {
  const layout = await createTempVault("task-creator-");
  const logger = createRecordingLogger();
  const ledger = new LedgerStore(ledgerFile ?? layout.ledgerFile, { logger, now: () => FIXED_NOW });
  const repository = new TaskRepository(layout);
  let sequence = 0;
  const creator = new TaskCreator(ledger, repository, {
    logger,
    now: () => FIXED_NOW,
    generateId: () => {
      sequence += 1;
      return `task-20250314-092653-00000${sequence}`;
    },
  });
  return { layout, ledger, repository, creator, logger };
};

const dropFile = async (inboxDir: string, name: string, content: string) => {
  const filePath = path.join(inboxDir, name);
  await fs.writeFile(filePath, content);
  return filePath;
};

test("createFromFile は pending のタスクと台帳の記録を書く", async () => {
  const { layout, ledger, creator } = await setup();
  const filePath = await dropFile(layout.inboxDir, "notes.txt", "line one\r\nline two");

  const result = await creator.createFromFile(filePath);

  assert.equal(result.kind, "success");
  assert.ok(result.kind === "success" && result.value.status === "created");
  assert.equal(result.value.task.id, "task-20250314-092653-000001");

  const raw = await fs.readFile(result.value.filePath, "utf-8");
  const task = parseTaskRecord(raw);
  assert.equal(task.status, "pending");
  assert.deepEqual(task.originalFile, {
    name: "notes.txt",
    extension: ".txt",
    sizeBytes: 18,
    discoveredAt: FIXED_NOW.toISOString(),
  });
  assert.equal(task.content.originalBody, "line one\nline two");
  assert.equal(task.content.analysisBody, null);

  assert.deepEqual(await ledger.findEntry("notes.txt"), {
    filename: "notes.txt",
    processedAt: FIXED_NOW.toISOString(),
    taskId: "task-20250314-092653-000001",
  });
  assert.deepEqual(await ledger.pendingTaskIds(), ["task-20250314-092653-000001"]);
});

test("同じファイル名から二度作成してもタスクと記録は一件ずつ", async () => {
  const { layout, ledger, creator } = await setup();
  const filePath = await dropFile(layout.inboxDir, "invoice.md", "# Invoice");

  const first = await creator.createFromFile(filePath);
  const second = await creator.createFromFile(filePath);

  assert.ok(first.kind === "success" && first.value.status === "created");
  assert.deepEqual(second, {
    kind: "success",
    value: { status: "already_processed", taskId: "task-20250314-092653-000001" },
  });
  assert.deepEqual(await listFiles(layout.pendingDir), ["task-20250314-092653-000001.md"]);
  assert.equal((await ledger.snapshot()).processedFiles.length, 1);
});

test("同じファイルを同時に作成してもタスクは一件だけ", async () => {
  const { layout, creator } = await setup();
  const filePath = await dropFile(layout.inboxDir, "photo.png", "fake-png");

  const results = await Promise.all([
    creator.createFromFile(filePath),
    creator.createFromFile(filePath),
  ]);

  const statuses = results.map((result) =>
    result.kind === "success" ? result.value.status : result.kind
  );
  assert.deepEqual(statuses, ["created", "already_processed"]);
  assert.deepEqual(await listFiles(layout.pendingDir), ["task-20250314-092653-000001.md"]);
});

test("台帳は再起動後も残り、削除したタスクは作り直さない", async () => {
  const { layout, creator } = await setup();
  const filePath = await dropFile(layout.inboxDir, "memo.txt", "memo");
  await creator.createFromFile(filePath);
  await fs.rm(path.join(layout.pendingDir, "task-20250314-092653-000001.md"));

  const restartedLedger = new LedgerStore(layout.ledgerFile, { logger: createRecordingLogger() });
  const restarted = new TaskCreator(restartedLedger, new TaskRepository(layout), {
    logger: createRecordingLogger(),
  });
  const result = await restarted.createFromFile(filePath);

  assert.ok(result.kind === "success" && result.value.status === "already_processed");
  assert.deepEqual(await listFiles(layout.pendingDir), []);
});

test("元ファイルが無い場合は恒久的な not_found の失敗になる", async () => {
  const { layout, creator } = await setup();

  const result = await creator.createFromFile(path.join(layout.inboxDir, "gone.txt"));

  assert.equal(result.kind, "permanent");
  assert.ok(result.kind === "permanent" && result.reason === "not_found");
});

test("バイナリファイルには説明文を元の内容として入れる", async () => {
  const { layout, creator } = await setup();
  const filePath = await dropFile(layout.inboxDir, "scan.pdf", "%PDF-1.4");

  const result = await creator.createFromFile(filePath);

  assert.ok(result.kind === "success" && result.value.status === "created");
  assert.equal(
    result.value.task.content.originalBody,
    "[PDF document: 8 bytes, application/pdf]"
  );
});

test("台帳の書き込み失敗は一時的な失敗で、後の再試行でもタスクは重複しない", async () => {
  const base = await createTempVault("task-creator-ledger-");
  const blocker = path.join(base.root, "state");
  await fs.writeFile(blocker, "not a directory");
  const { layout, creator } = await setup(path.join(blocker, "ledger.json"));
  const filePath = await dropFile(layout.inboxDir, "contract.txt", "terms");

  const first = await creator.createFromFile(filePath);
  assert.equal(first.kind, "transient");
  assert.deepEqual(await listFiles(layout.pendingDir), ["task-20250314-092653-000001.md"]);

  await fs.rm(blocker);
  await fs.mkdir(blocker);

  const retried = await creator.createFromFile(filePath);
  assert.deepEqual(retried, {
    kind: "success",
    value: { status: "already_processed", taskId: "task-20250314-092653-000001" },
  });
  assert.deepEqual(await listFiles(layout.pendingDir), ["task-20250314-092653-000001.md"]);
});

test("markCompleted は pendingTaskIds から ID を取り除く", async () => {
  const { layout, ledger, creator } = await setup();
  await creator.createFromFile(await dropFile(layout.inboxDir, "a.txt", "a"));

  await creator.markCompleted("task-20250314-092653-000001");
  await creator.markCompleted("task-20250314-092653-000001");

  assert.deepEqual(await ledger.pendingTaskIds(), []);
});
