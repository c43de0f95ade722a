import { normalizePathKey } from '../utils/filesystem.js';

/**
 * Suppresses repeat events for the same file inside a trailing window.
 *
 * One download often surfaces as several raw events (create, rename, flush).
 * The gate sits after pattern matching, so only files that would actually be
 * processed occupy the cache. An entry means "already queued within the
 * window", not "processed".
 *
 * `admit` is synchronous: prune, membership check and insert complete
 * without yielding to the event loop, so concurrent producers cannot
 * interleave between them.
 */
export class DedupGate {
  private readonly seen = new Map<string, number>();
  private readonly ttlMs: number;

  constructor(
    ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {
    this.ttlMs = ttlSeconds * 1000;
  }

  /**
   * Returns true when the path should be queued, false for a duplicate.
   */
  public admit(filePath: string): boolean {
    const key = normalizePathKey(filePath);
    const current = this.now();

    this.prune(current);

    if (this.seen.has(key)) {
      return false;
    }
    this.seen.set(key, current);
    return true;
  }

  public get size(): number {
    return this.seen.size;
  }

  private prune(current: number): void {
    for (const [key, seenAt] of this.seen) {
      if (current - seenAt >= this.ttlMs) {
        this.seen.delete(key);
      }
    }
  }
}
