import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { createRecordingLogger, FIXED_NOW } from "../../testing/fixtures";
import {
  countErrorRecords,
  ErrorRecorder,
  formatRecordTimestamp,
  renderErrorRecord,
} from "../errorRecords";

const createLogsDir = async () => fs.mkdtemp(path.join(os.tmpdir(), "error-records-"));

test("formatRecordTimestamp は UTC の日時を使う", () => {
  assert.equal(formatRecordTimestamp(FIXED_NOW), "20250314-092653");
});

test("スタックが無い場合 renderErrorRecord は既定の文言を使う", () => {
  const rendered = renderErrorRecord({
    timestamp: "2025-03-14T09:26:53.000Z",
    context: "Permission denied: /vault/Inbox/a.txt",
    errorType: "Error",
    message: "EACCES",
    stack: null,
  });

  assert.equal(
    rendered,
    [
      "# Error Log",
      "",
      "**Timestamp**: 2025-03-14T09:26:53.000Z",
      "**Context**: Permission denied: /vault/Inbox/a.txt",
      "",
      "## Error Details",
      "",
      "**Type**: Error",
      "**Message**: EACCES",
      "",
      "## Stack Trace",
      "",
      "```",
      "No traceback available",
      "```",
      "",
    ].join("\n")
  );
});

test("ErrorRecorder は失敗ごとに一ファイル書き、名前が衝突したら接尾辞を付ける", async () => {
  const logsDir = await createLogsDir();
  const recorder = new ErrorRecorder(logsDir, {
    logger: createRecordingLogger(),
    now: () => FIXED_NOW,
  });

  const first = await recorder.record(new Error("first"), "context one");
  const second = await recorder.record(new TypeError("second"), "context two");

  assert.equal(first, path.join(logsDir, "error-20250314-092653.md"));
  assert.equal(second, path.join(logsDir, "error-20250314-092653-2.md"));

  const content = await fs.readFile(path.join(logsDir, "error-20250314-092653-2.md"), "utf-8");
  assert.ok(content.includes("**Context**: context two\n"));
  assert.ok(content.includes("**Type**: TypeError\n"));
  assert.ok(content.includes("**Message**: second\n"));
  assert.equal(await countErrorRecords(logsDir), 2);
});

test("countErrorRecords は他のファイルとディレクトリを数えない", async () => {
  const logsDir = await createLogsDir();
  await fs.writeFile(path.join(logsDir, "error-20250101-000000.md"), "x");
  await fs.writeFile(path.join(logsDir, "watcher.log"), "x");
  await fs.mkdir(path.join(logsDir, "failed"));
  await fs.writeFile(path.join(logsDir, "failed", "error-20250101-000001.md"), "x");

  assert.equal(await countErrorRecords(logsDir), 1);
  assert.equal(await countErrorRecords(path.join(logsDir, "missing")), 0);
});

test("書き込みに失敗した場合 ErrorRecorder は例外を投げずに null を返す", async () => {
  const base = await createLogsDir();
  const blocker = path.join(base, "blocker");
  await fs.writeFile(blocker, "not a directory");
  const logger = createRecordingLogger();
  const recorder = new ErrorRecorder(path.join(blocker, "Logs"), { logger, now: () => FIXED_NOW });

  const result = await recorder.record(new Error("boom"), "context");

  assert.equal(result, null);
  assert.equal(logger.entries.filter((entry) => entry.level === "error").length, 1);
});
