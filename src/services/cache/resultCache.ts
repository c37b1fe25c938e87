/**
 * @fileoverview Per-session memory of the identifiers last found for each
 * author, used to page through earlier results without searching again.
 *
 * Bounded: at capacity the least recently used entry is evicted, and
 * entries older than the optional time-to-live are dropped on access.
 * @module src/services/cache/resultCache
 */

import { config } from "../../config/index.js";

export interface ResultCacheOptions {
  /** Maximum number of author entries. */
  maxEntries?: number;
  /** Entry lifetime in milliseconds; 0 disables expiry. */
  ttlMs?: number;
  /** Clock used for expiry. */
  now?: () => number;
}

interface CacheEntry {
  ids: string[];
  storedAt: number;
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? config.resultCacheMaxEntries);
    this.ttlMs = Math.max(0, options.ttlMs ?? config.resultCacheTtlMs);
    this.now = options.now ?? Date.now;
  }

  /**
   * Stores `ids` under `authorKey`, replacing any previous list.
   */
  public remember(authorKey: string, ids: readonly string[]): void {
    this.entries.delete(authorKey);
    this.entries.set(authorKey, { ids: [...ids], storedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) break;
      this.entries.delete(oldestKey);
    }
  }

  /**
   * The list stored for `authorKey`, or `[]` if there is none.
   */
  public recall(authorKey: string): string[] {
    const entry = this.getLive(authorKey);
    if (!entry) {
      return [];
    }
    // Refresh recency.
    this.entries.delete(authorKey);
    this.entries.set(authorKey, entry);
    return [...entry.ids];
  }

  public has(authorKey: string): boolean {
    return this.getLive(authorKey) !== undefined;
  }

  public get size(): number {
    return this.entries.size;
  }

  public clear(): void {
    this.entries.clear();
  }

  private getLive(authorKey: string): CacheEntry | undefined {
    const entry = this.entries.get(authorKey);
    if (!entry) {
      return undefined;
    }
    if (this.ttlMs > 0 && this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(authorKey);
      return undefined;
    }
    return entry;
  }
}
