/**
 * Shared cache types: entry shape, tier contracts and metrics.
 *
 * @module cache/cache-types
 */

export interface CacheEntry {
  key: string;
  value: unknown;
  /** epoch ms */
  createdAt: number;
  /** epoch ms, always > createdAt */
  expiresAt: number;
  accessCount: number;
  lastAccessed: number;
  metadata: Record<string, unknown>;
}

export interface CacheLookup {
  value: unknown;
  found: boolean;
}

export type CacheTier = "memory" | "persistent" | "remote";

/** Local persistent tier (sqlite in production). */
export interface PersistentCacheStore {
  get(key: string, now: number): Promise<CacheEntry | null>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<boolean>;
  deleteMatching(substring: string): Promise<number>;
  clear(): Promise<number>;
  cleanupExpired(now: number): Promise<number>;
  close(): Promise<void>;
}

export interface RemoteCacheValue {
  value: unknown;
  expiresAt?: number | null;
}

/**
 * External key-value store. Assumed atomic per operation; `keys` is optional
 * because not every backend can enumerate.
 */
export interface RemoteCacheStore {
  get(key: string): Promise<RemoteCacheValue | null>;
  set(key: string, value: unknown, ttlSec: number): Promise<void>;
  delete(key: string): Promise<void>;
  keys?(substring: string): Promise<string[]>;
}

export interface CacheMetrics {
  hits: number;
  misses: number;
  memoryHits: number;
  persistentHits: number;
  remoteHits: number;
  evictions: number;
  expirations: number;
  remoteErrors: number;
  totalRequests: number;
  hitRate: number;
  memoryEntries: number;
}

export interface CacheEntryInfo {
  key: string;
  tier: CacheTier;
  createdAt: number;
  expiresAt: number;
  accessCount: number;
  metadata: Record<string, unknown>;
}
