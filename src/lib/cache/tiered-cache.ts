/**
 * Tiered Cache
 *
 * Lookup order: in-process LRU → local persistent store → remote store.
 * A hit at a slower tier is copied into every faster tier. Writes go to all
 * tiers; the memory write happens synchronously before any I/O so readers in
 * the same process see the new value immediately.
 *
 * The remote tier is best effort: its failures are logged and counted, and
 * the cache keeps serving from the local tiers.
 *
 * @module cache/tiered-cache
 */

import type { ZodType, ZodTypeDef } from "zod";
import { errorMessage } from "../errors";
import { MemoryLruCache } from "./memory-cache";
import type {
  CacheEntry,
  CacheEntryInfo,
  CacheLookup,
  CacheMetrics,
  PersistentCacheStore,
  RemoteCacheStore,
} from "./cache-types";

export interface TieredCacheOptions {
  memoryCapacity: number;
  defaultTtlSec: number;
  persistent?: PersistentCacheStore | null;
  remote?: RemoteCacheStore | null;
  now?: () => number;
}

export class TieredCache {
  private readonly memory: MemoryLruCache;
  private readonly persistent: PersistentCacheStore | null;
  private readonly remote: RemoteCacheStore | null;
  private readonly defaultTtlSec: number;
  private readonly now: () => number;

  private counters = {
    hits: 0,
    misses: 0,
    memoryHits: 0,
    persistentHits: 0,
    remoteHits: 0,
    remoteErrors: 0,
    totalRequests: 0,
  };

  constructor(options: TieredCacheOptions) {
    this.memory = new MemoryLruCache(options.memoryCapacity);
    this.persistent = options.persistent ?? null;
    this.remote = options.remote ?? null;
    this.defaultTtlSec = options.defaultTtlSec;
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // READ
  // ==========================================================================

  async get(key: string): Promise<CacheLookup> {
    this.counters.totalRequests++;
    const now = this.now();

    const memoryLookup = this.memory.get(key, now);
    if (memoryLookup.status === "hit") {
      this.counters.hits++;
      this.counters.memoryHits++;
      return { value: memoryLookup.entry.value, found: true };
    }

    if (this.persistent) {
      const entry = await this.persistent.get(key, now);
      if (entry) {
        this.counters.hits++;
        this.counters.persistentHits++;
        this.memory.set(entry);
        return { value: entry.value, found: true };
      }
    }

    if (this.remote) {
      try {
        const remoteValue = await this.remote.get(key);
        if (remoteValue) {
          const expiresAt = remoteValue.expiresAt ?? now + this.defaultTtlSec * 1000;
          if (expiresAt > now) {
            this.counters.hits++;
            this.counters.remoteHits++;
            const entry = this.buildEntry(key, remoteValue.value, now, expiresAt, { tier: "remote" });
            this.memory.set(entry);
            await this.persistent?.set(entry);
            return { value: entry.value, found: true };
          }
        }
      } catch (err) {
        this.recordRemoteError("get", key, err);
      }
    }

    this.counters.misses++;
    return { value: undefined, found: false };
  }

  /**
   * Typed read. A cached value that no longer matches the schema is treated
   * as a miss and removed.
   */
  async getParsed<T>(key: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | undefined> {
    const lookup = await this.get(key);
    if (!lookup.found) return undefined;

    const parsed = schema.safeParse(lookup.value);
    if (!parsed.success) {
      console.warn(`[Tiered-Cache] Discarding entry ${key}: cached value does not match expected shape`);
      await this.delete(key);
      return undefined;
    }
    return parsed.data;
  }

  /** Entry timestamps without counting a request (status lookups). */
  async describe(key: string): Promise<CacheEntryInfo | null> {
    const now = this.now();
    const inMemory = this.memory.peek(key);
    if (inMemory && inMemory.expiresAt > now) {
      return {
        key,
        tier: "memory",
        createdAt: inMemory.createdAt,
        expiresAt: inMemory.expiresAt,
        accessCount: inMemory.accessCount,
        metadata: inMemory.metadata,
      };
    }
    const persisted = this.persistent ? await this.persistent.get(key, now) : null;
    if (persisted) {
      return {
        key,
        tier: "persistent",
        createdAt: persisted.createdAt,
        expiresAt: persisted.expiresAt,
        accessCount: persisted.accessCount,
        metadata: persisted.metadata,
      };
    }
    return null;
  }

  // ==========================================================================
  // WRITE
  // ==========================================================================

  async set(key: string, value: unknown, ttlSec: number = this.defaultTtlSec, metadata: Record<string, unknown> = {}): Promise<void> {
    if (!(ttlSec > 0)) {
      throw new RangeError(`Cache TTL must be positive, got ${ttlSec}`);
    }
    const now = this.now();
    const entry = this.buildEntry(key, value, now, now + ttlSec * 1000, metadata);

    this.memory.set(entry);

    await this.persistent?.set(entry);
    if (this.remote) {
      try {
        await this.remote.set(key, value, ttlSec);
      } catch (err) {
        this.recordRemoteError("set", key, err);
      }
    }
  }

  async delete(key: string): Promise<boolean> {
    let removed = this.memory.delete(key);
    if (this.persistent) {
      removed = (await this.persistent.delete(key)) || removed;
    }
    if (this.remote) {
      try {
        await this.remote.delete(key);
      } catch (err) {
        this.recordRemoteError("delete", key, err);
      }
    }
    return removed;
  }

  /**
   * Remove every key containing `substring` from every tier. Returns the
   * number of distinct local entries removed plus remote keys deleted.
   */
  async invalidatePattern(substring: string): Promise<number> {
    let count = this.memory.deleteMatching(substring);
    if (this.persistent) {
      count = Math.max(count, await this.persistent.deleteMatching(substring));
    }

    if (this.remote?.keys) {
      try {
        const remoteKeys = await this.remote.keys(substring);
        for (const key of remoteKeys) {
          await this.remote.delete(key);
        }
        count = Math.max(count, remoteKeys.length);
      } catch (err) {
        this.recordRemoteError("invalidate", substring, err);
      }
    }

    if (count > 0) {
      console.log(`[Tiered-Cache] Invalidated ${count} entries matching "${substring}"`);
    }
    return count;
  }

  async clear(): Promise<void> {
    this.memory.clear();
    await this.persistent?.clear();
    if (this.remote?.keys) {
      try {
        for (const key of await this.remote.keys("")) {
          await this.remote.delete(key);
        }
      } catch (err) {
        this.recordRemoteError("clear", "*", err);
      }
    }
  }

  async cleanupExpired(): Promise<number> {
    const now = this.now();
    const fromMemory = this.memory.cleanupExpired(now);
    const fromDisk = this.persistent ? await this.persistent.cleanupExpired(now) : 0;
    return fromMemory + fromDisk;
  }

  listKeys(): string[] {
    const now = this.now();
    return this.memory.keys().filter((key) => {
      const entry = this.memory.peek(key);
      return entry !== undefined && entry.expiresAt > now;
    });
  }

  // ==========================================================================
  // METRICS
  // ==========================================================================

  getMetrics(): CacheMetrics {
    const { hits, totalRequests } = this.counters;
    return {
      ...this.counters,
      evictions: this.memory.evictions,
      expirations: this.memory.expirations,
      hitRate: totalRequests > 0 ? hits / totalRequests : 0,
      memoryEntries: this.memory.size,
    };
  }

  resetMetrics(): void {
    this.counters = {
      hits: 0,
      misses: 0,
      memoryHits: 0,
      persistentHits: 0,
      remoteHits: 0,
      remoteErrors: 0,
      totalRequests: 0,
    };
  }

  async close(): Promise<void> {
    await this.persistent?.close();
  }

  private buildEntry(
    key: string,
    value: unknown,
    now: number,
    expiresAt: number,
    metadata: Record<string, unknown>,
  ): CacheEntry {
    return {
      key,
      value,
      createdAt: now,
      expiresAt: Math.max(expiresAt, now + 1),
      accessCount: 0,
      lastAccessed: now,
      metadata,
    };
  }

  private recordRemoteError(operation: string, key: string, err: unknown): void {
    this.counters.remoteErrors++;
    console.warn(`[Tiered-Cache] Remote ${operation} failed for ${key}, continuing with local tiers: ${errorMessage(err)}`);
  }
}
