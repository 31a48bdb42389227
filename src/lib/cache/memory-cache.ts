/**
 * In-process LRU tier.
 *
 * Backed by a Map whose insertion order doubles as recency order: a read
 * moves the entry to the back, eviction takes from the front. An expired
 * entry found on read is removed and counted as an eviction. All methods are
 * synchronous so a `set` (evict then insert) is never observed half done.
 *
 * @module cache/memory-cache
 */

import type { CacheEntry } from "./cache-types";

export type MemoryLookup =
  | { status: "hit"; entry: CacheEntry }
  | { status: "expired" }
  | { status: "miss" };

export class MemoryLruCache {
  private readonly entries = new Map<string, CacheEntry>();
  private evictionCount = 0;
  private expirationCount = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Memory cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get evictions(): number {
    return this.evictionCount;
  }

  get expirations(): number {
    return this.expirationCount;
  }

  get(key: string, now: number): MemoryLookup {
    const entry = this.entries.get(key);
    if (!entry) return { status: "miss" };

    if (entry.expiresAt <= now) {
      this.entries.delete(key);
      this.expirationCount++;
      this.evictionCount++;
      return { status: "expired" };
    }

    this.entries.delete(key);
    const touched: CacheEntry = { ...entry, accessCount: entry.accessCount + 1, lastAccessed: now };
    this.entries.set(key, touched);
    return { status: "hit", entry: touched };
  }

  /** Read without touching recency or access counters. */
  peek(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  set(entry: CacheEntry): void {
    if (this.entries.has(entry.key)) {
      this.entries.delete(entry.key);
    }
    while (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictionCount++;
    }
    this.entries.set(entry.key, entry);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  deleteMatching(substring: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.includes(substring)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  cleanupExpired(now: number): number {
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.expirationCount += removed;
    return removed;
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
