import path from "path";
import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";

import { createLogger, describeError, type Logger } from "../utils/logger";
import type { InboxEventHandler, InboxNotification, InboxOutcome } from "./inboxHandler";

export type InboxWatcherOptions = {
  handler: InboxEventHandler;
  logger?: Logger;
  usePolling?: boolean;
  pollIntervalMs?: number;
  reconcileOnStart?: boolean;
  writeStabilityMs?: number;
};

export const DEFAULT_WRITE_STABILITY_MS = 2_000;

/**
 * Inbox 直下（非再帰）の作成通知を InboxEventHandler へ渡す。
 *
 * reconcileOnStart が有効な場合は起動時に既存ファイルも通知として流す。
 * 台帳に登録済みのファイルは TaskCreator 側で何もせずに終わる。
 * 停止時に処理中の通知は待たない。
 */
export class InboxWatcher {
  private readonly inboxDir: string;
  private readonly handler: InboxEventHandler;
  private readonly logger: Logger;
  private readonly usePolling: boolean;
  private readonly pollIntervalMs: number;
  private readonly reconcileOnStart: boolean;
  private readonly writeStabilityMs: number;
  private watcher: FSWatcher | null = null;
  private readonly inFlight = new Set<Promise<InboxOutcome>>();

  constructor(inboxDir: string, options: InboxWatcherOptions) {
    this.inboxDir = path.resolve(inboxDir);
    this.handler = options.handler;
    this.logger = options.logger ?? createLogger("watcher");
    this.usePolling = options.usePolling ?? true;
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
    this.reconcileOnStart = options.reconcileOnStart ?? true;
    this.writeStabilityMs = Math.max(0, options.writeStabilityMs ?? DEFAULT_WRITE_STABILITY_MS);
  }

  get isRunning() {
    return this.watcher !== null;
  }

  get pendingNotifications() {
    return this.inFlight.size;
  }

  async start(): Promise<void> {
    if (this.watcher) {
      return;
    }

    const watcher = chokidar.watch(this.inboxDir, {
      depth: 0,
      ignoreInitial: !this.reconcileOnStart,
      // 祖先ディレクトリ名は見ず、Inbox 直下のドットファイルだけを除外する。
      ignored: (candidate: string) => this.isHiddenEntry(candidate),
      usePolling: this.usePolling,
      interval: this.pollIntervalMs,
      // コピー途中のファイルはサイズが落ち着くまで add を遅らせる。
      awaitWriteFinish:
        this.writeStabilityMs > 0
          ? {
              stabilityThreshold: this.writeStabilityMs,
              pollInterval: Math.min(100, this.writeStabilityMs),
            }
          : false,
    });
    this.watcher = watcher;

    watcher.on("add", (filePath) => {
      this.dispatch({ path: filePath, isDirectory: false });
    });

    watcher.on("addDir", (dirPath) => {
      if (path.resolve(dirPath) !== this.inboxDir) {
        this.dispatch({ path: dirPath, isDirectory: true });
      }
    });

    watcher.on("error", (error) => {
      this.logger.warn("Inbox 監視でエラーが発生しました", {
        error: describeError(error),
      });
    });

    await new Promise<void>((resolve) => {
      watcher.once("ready", () => resolve());
    });

    this.logger.info("Inbox の監視を開始しました", {
      inbox: this.inboxDir,
      extensions: this.handler.supportedExtensionList,
      reconcileOnStart: this.reconcileOnStart,
      writeStabilityMs: this.writeStabilityMs,
    });
  }

  async stop(): Promise<void> {
    const watcher = this.watcher;
    if (!watcher) {
      return;
    }

    this.watcher = null;
    await watcher.close();

    if (this.inFlight.size > 0) {
      this.logger.warn("処理中の通知を破棄して監視を停止しました", {
        dropped: this.inFlight.size,
      });
    } else {
      this.logger.info("Inbox の監視を停止しました");
    }
  }

  private isHiddenEntry(candidate: string) {
    const resolved = path.resolve(candidate);
    return resolved !== this.inboxDir && path.basename(resolved).startsWith(".");
  }

  dispatch(notification: InboxNotification) {
    const pending = this.handler.handleCreated(notification);
    this.inFlight.add(pending);

    void pending
      .catch((error) => {
        this.logger.error("通知の処理中に予期しないエラーが発生しました", {
          path: notification.path,
          error: describeError(error),
        });
        return "failed" as const;
      })
      .finally(() => {
        this.inFlight.delete(pending);
      });
  }
}
