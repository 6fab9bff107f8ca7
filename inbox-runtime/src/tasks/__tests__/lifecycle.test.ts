import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";

import { buildTask, createRecordingLogger, createTempVault, listFiles } from "../../testing/fixtures";
import { countErrorRecords, ErrorRecorder } from "../../vault/errorRecords";
import { TaskLifecycle } from "../lifecycle";
import { parseTaskRecord } from "../taskRecord";
import { TaskRepository } from "../taskRepository";

const setup = async () => {
  const layout = await createTempVault("lifecycle-");
  const logger = createRecordingLogger();
  const repository = new TaskRepository(layout);
  const errorRecorder = new ErrorRecorder(layout.logsDir, { logger });
  const lifecycle = new TaskLifecycle(repository, { errorRecorder, logger });
  return { layout, logger, repository, lifecycle };
};

const processing = { model: "test-model", durationSeconds: 3, tokenCount: 12 };

test("beginProcessing はタスクファイルをその場で書き換える", async () => {
  const { layout, repository, lifecycle } = await setup();
  const stored = await repository.writeNew(buildTask());

  const running = await lifecycle.beginProcessing(stored);

  assert.equal(running.filePath, stored.filePath);
  assert.equal(running.location, "pending");
  assert.deepEqual(await listFiles(layout.pendingDir), ["task-20250314-092653-abc123.md"]);
  const raw = await fs.readFile(stored.filePath, "utf-8");
  assert.equal(parseTaskRecord(raw).status, "processing");
});

test("complete は分析結果を保存して Done に移動する", async () => {
  const { layout, repository, lifecycle } = await setup();
  const running = await lifecycle.beginProcessing(await repository.writeNew(buildTask()));

  const outcome = await lifecycle.complete(running, {
    analysisBody: "### Summary",
    processing,
    analysisType: "meeting_notes",
  });

  assert.equal(outcome.relocated, true);
  assert.equal(outcome.stored.location, "done");
  assert.deepEqual(await listFiles(layout.pendingDir), []);
  assert.deepEqual(await listFiles(layout.doneDir), ["task-20250314-092653-abc123.md"]);

  const task = parseTaskRecord(await fs.readFile(outcome.stored.filePath, "utf-8"));
  assert.equal(task.status, "completed");
  assert.equal(task.content.analysisBody, "### Summary");
  assert.deepEqual(task.processing, processing);
  assert.equal(task.analysisType, "meeting_notes");
});

test("移動に失敗した場合は completed のままその場に残す", async () => {
  const { layout, logger, repository, lifecycle } = await setup();
  const running = await lifecycle.beginProcessing(await repository.writeNew(buildTask()));
  await fs.rm(layout.doneDir, { recursive: true });
  await fs.writeFile(layout.doneDir, "blocking file");

  const outcome = await lifecycle.complete(running, { analysisBody: "done", processing });

  assert.equal(outcome.relocated, false);
  assert.equal(outcome.stored.filePath, running.filePath);
  const task = parseTaskRecord(await fs.readFile(running.filePath, "utf-8"));
  assert.equal(task.status, "completed");
  assert.equal(logger.entries.filter((entry) => entry.level === "warn").length, 1);
});

test("fail はエラーを記録してその場で書き換える", async () => {
  const { layout, repository, lifecycle } = await setup();
  const running = await lifecycle.beginProcessing(await repository.writeNew(buildTask()));

  const failed = await lifecycle.fail(running, "summarizer unavailable");

  assert.equal(failed.filePath, running.filePath);
  assert.deepEqual(await listFiles(layout.doneDir), []);
  const task = parseTaskRecord(await fs.readFile(failed.filePath, "utf-8"));
  assert.equal(task.status, "failed");
  assert.equal(task.error, "summarizer unavailable");
});

test("requeue は failed のタスクを pending に戻す", async () => {
  const { repository, lifecycle } = await setup();
  const running = await lifecycle.beginProcessing(await repository.writeNew(buildTask()));
  const failed = await lifecycle.fail(running, "boom");

  const requeued = await lifecycle.requeue(failed);

  const task = parseTaskRecord(await fs.readFile(requeued.filePath, "utf-8"));
  assert.equal(task.status, "pending");
  assert.equal(task.error, null);
});

test("壊れたタスクファイルを隔離し、エラーレコードをちょうど一件書く", async () => {
  const { layout, lifecycle } = await setup();
  const broken = path.join(layout.pendingDir, "task-broken.md");
  await fs.writeFile(broken, "---\nid: [\n---\n");

  const destination = await lifecycle.quarantine(broken, new Error("unparseable"));

  assert.equal(destination, path.join(layout.quarantineDir, "task-broken.md"));
  assert.deepEqual(await listFiles(layout.pendingDir), []);
  assert.deepEqual(await listFiles(layout.quarantineDir), ["task-broken.md"]);
  assert.equal(await countErrorRecords(layout.logsDir), 1);
});

test("隔離先に同名ファイルがあっても両方を残す", async () => {
  const { layout, lifecycle } = await setup();
  await fs.mkdir(layout.quarantineDir, { recursive: true });
  await fs.writeFile(path.join(layout.quarantineDir, "task-broken.md"), "older");
  const broken = path.join(layout.pendingDir, "task-broken.md");
  await fs.writeFile(broken, "garbage");

  const destination = await lifecycle.quarantine(broken, new Error("unparseable"));

  assert.notEqual(destination, path.join(layout.quarantineDir, "task-broken.md"));
  assert.equal((await listFiles(layout.quarantineDir)).length, 2);
});
