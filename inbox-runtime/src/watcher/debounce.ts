export const DEFAULT_DEBOUNCE_MS = 1_000;

export type PathDebouncerOptions = {
  windowMs?: number;
  now?: () => number;
};

/**
 * 同じパスへの通知が windowMs 以内に重なった場合に後続を捨てる。
 * 捨てた通知では最終受付時刻を更新しない。
 */
export class PathDebouncer {
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly lastAccepted = new Map<string, number>();

  constructor(options: PathDebouncerOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_DEBOUNCE_MS;
    this.now = options.now ?? Date.now;
  }

  accept(filePath: string): boolean {
    const now = this.now();
    this.prune(now);

    const previous = this.lastAccepted.get(filePath);
    if (previous !== undefined && now - previous < this.windowMs) {
      return false;
    }

    this.lastAccepted.set(filePath, now);
    return true;
  }

  get size() {
    return this.lastAccepted.size;
  }

  private prune(now: number) {
    for (const [filePath, acceptedAt] of this.lastAccepted) {
      if (now - acceptedAt >= this.windowMs) {
        this.lastAccepted.delete(filePath);
      }
    }
  }
}
