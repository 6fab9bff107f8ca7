import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { applyEnvironmentOverrides, loadConfig } from "../loader";
import { createRecordingLogger } from "../../testing/fixtures";

const makeProject = async (files: Record<string, string> = {}) => {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-config-"));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(cwd, relative);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf-8");
  }
  return cwd;
};

test("既定の設定ファイルが無い場合は既定値を使う", async () => {
  const cwd = await makeProject();
  const result = await loadConfig(undefined, { cwd, logger: createRecordingLogger() });

  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.config.vault.path, "./vault");
  assert.equal(result.config.watcher.debounce_ms, 1_000);
  assert.equal(result.config.watcher.max_file_size_bytes, 10 * 1024 * 1024);
  assert.deepEqual(result.config.watcher.supported_extensions, [
    ".txt",
    ".md",
    ".pdf",
    ".png",
    ".jpg",
    ".jpeg",
  ]);
  assert.deepEqual(result.config.watcher.retry, { max_attempts: 3, delay_ms: 2_000 });
  assert.equal(result.config.watcher.write_stability_ms, 2_000);
  assert.equal(result.config.report.recent_activity_limit, 10);
});

test("明示的に指定した設定ファイルは存在しなければならない", async () => {
  const cwd = await makeProject();
  const result = await loadConfig("custom.yaml", { cwd, logger: createRecordingLogger() });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.path, path.join(cwd, "custom.yaml"));
  assert.equal(result.message, `設定ファイルが見つかりません: ${path.join(cwd, "custom.yaml")}`);
});

test("一部だけの設定は既定値で補い、拡張子を正規化する", async () => {
  const cwd = await makeProject({
    "config/pipeline.yaml": [
      "vault:",
      "  path: ' /srv/vault '",
      "watcher:",
      "  supported_extensions: ['.TXT', '.csv']",
      "  retry:",
      "    delay_ms: 50",
    ].join("\n"),
  });

  const result = await loadConfig(undefined, { cwd, logger: createRecordingLogger() });

  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.config.vault.path, "/srv/vault");
  assert.deepEqual(result.config.watcher.supported_extensions, [".txt", ".csv"]);
  assert.deepEqual(result.config.watcher.retry, { max_attempts: 3, delay_ms: 50 });
  assert.equal(result.config.watcher.use_polling, true);
});

test("空の設定ファイルからは既定値を得る", async () => {
  const cwd = await makeProject({ "config/pipeline.yaml": "" });
  const result = await loadConfig(undefined, { cwd, logger: createRecordingLogger() });

  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.config.processing.model, "placeholder-summarizer");
});

test("不正な値はそのパス付きで報告する", async () => {
  const cwd = await makeProject({
    "config/pipeline.yaml": "watcher:\n  retry:\n    max_attempts: 0\n",
  });
  const logger = createRecordingLogger();

  const result = await loadConfig(undefined, { cwd, logger });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.deepEqual(
    result.issues?.map((issue) => issue.path.join(".")),
    ["watcher.retry.max_attempts"]
  );
  assert.equal(logger.entries.filter((entry) => entry.level === "error").length, 1);
});

test("壊れた YAML は失敗として報告する", async () => {
  const cwd = await makeProject({ "config/pipeline.yaml": "vault: [unclosed\n" });
  const result = await loadConfig(undefined, { cwd, logger: createRecordingLogger() });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.ok(result.message.startsWith("YAMLのパースに失敗しました: "));
  assert.equal(result.issues, undefined);
});

test("VAULT_PATH は設定ファイルの vault パスより優先される", async () => {
  const cwd = await makeProject();
  const result = await loadConfig(undefined, { cwd, logger: createRecordingLogger() });
  assert.equal(result.ok, true);
  if (!result.ok) return;

  assert.equal(
    applyEnvironmentOverrides(result.config, { VAULT_PATH: "/data/vault" }).vault.path,
    "/data/vault"
  );
  assert.equal(applyEnvironmentOverrides(result.config, { VAULT_PATH: "  " }).vault.path, "./vault");
});
