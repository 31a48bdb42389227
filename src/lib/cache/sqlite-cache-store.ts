/**
 * SQLite Cache Store
 *
 * Local persistent tier of the tiered cache. One row per key with the value
 * serialized as JSON and TTL-based expiry. A read that finds an expired row
 * deletes it and reports a miss.
 *
 * @module cache/sqlite-cache-store
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import * as fs from "fs";
import * as path from "path";
import type { CacheEntry, PersistentCacheStore } from "./cache-types";

// ============================================================================
// TYPES
// ============================================================================

interface CacheRow {
  cache_key: string;
  value_json: string;
  metadata_json: string | null;
  created_at: number;
  expires_at: number;
  access_count: number;
  last_accessed: number;
}

export interface SqliteCacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  oldestEntry: number | null;
  newestEntry: number | null;
  dbSizeBytes: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// STORE
// ============================================================================

export class SqliteCacheStore implements PersistentCacheStore {
  private db: Database | null = null;
  private dbPromise: Promise<Database> | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = path.resolve(dbPath);
  }

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;
    if (!this.dbPromise) {
      this.dbPromise = (async () => {
        console.log(`[Sqlite-Cache] Opening database at ${this.dbPath}`);

        const instance = await open({
          filename: this.dbPath,
          driver: sqlite3.Database,
        });

        await instance.exec("PRAGMA journal_mode=WAL");
        await instance.exec(`
          CREATE TABLE IF NOT EXISTS cache_entries (
            cache_key TEXT PRIMARY KEY,
            value_json TEXT NOT NULL,
            metadata_json TEXT,
            created_at INTEGER NOT NULL,
            expires_at INTEGER NOT NULL,
            access_count INTEGER NOT NULL DEFAULT 0,
            last_accessed INTEGER NOT NULL
          );

          CREATE INDEX IF NOT EXISTS idx_cache_entries_expires ON cache_entries(expires_at);
        `);

        this.db = instance;
        return instance;
      })();
      this.dbPromise.catch(() => {
        this.dbPromise = null;
      });
    }
    return this.dbPromise;
  }

  async get(key: string, now: number): Promise<CacheEntry | null> {
    try {
      const database = await this.getDb();
      const row = await database.get<CacheRow>(`SELECT * FROM cache_entries WHERE cache_key = ?`, [key]);
      if (!row) return null;

      if (row.expires_at <= now) {
        await database.run("DELETE FROM cache_entries WHERE cache_key = ?", [key]);
        return null;
      }

      await database.run(
        "UPDATE cache_entries SET access_count = access_count + 1, last_accessed = ? WHERE cache_key = ?",
        [now, key],
      );

      const metadata: unknown = row.metadata_json ? JSON.parse(row.metadata_json) : {};
      return {
        key: row.cache_key,
        value: JSON.parse(row.value_json),
        createdAt: row.created_at,
        expiresAt: row.expires_at,
        accessCount: row.access_count + 1,
        lastAccessed: now,
        metadata: isRecord(metadata) ? metadata : {},
      };
    } catch (err) {
      console.error("[Sqlite-Cache] Error reading cache:", err);
      return null;
    }
  }

  async set(entry: CacheEntry): Promise<void> {
    try {
      const database = await this.getDb();
      await database.run(
        `INSERT OR REPLACE INTO cache_entries
         (cache_key, value_json, metadata_json, created_at, expires_at, access_count, last_accessed)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          entry.key,
          JSON.stringify(entry.value),
          JSON.stringify(entry.metadata),
          entry.createdAt,
          entry.expiresAt,
          entry.accessCount,
          entry.lastAccessed,
        ],
      );
    } catch (err) {
      console.error("[Sqlite-Cache] Error writing cache:", err);
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const database = await this.getDb();
      const result = await database.run("DELETE FROM cache_entries WHERE cache_key = ?", [key]);
      return (result.changes ?? 0) > 0;
    } catch (err) {
      console.error("[Sqlite-Cache] Error deleting entry:", err);
      return false;
    }
  }

  async deleteMatching(substring: string): Promise<number> {
    try {
      const database = await this.getDb();
      const result = await database.run("DELETE FROM cache_entries WHERE instr(cache_key, ?) > 0", [substring]);
      return result.changes ?? 0;
    } catch (err) {
      console.error("[Sqlite-Cache] Error invalidating entries:", err);
      return 0;
    }
  }

  // ==========================================================================
  // MAINTENANCE
  // ==========================================================================

  async cleanupExpired(now: number): Promise<number> {
    try {
      const database = await this.getDb();
      const result = await database.run("DELETE FROM cache_entries WHERE expires_at <= ?", [now]);
      const deleted = result.changes ?? 0;
      if (deleted > 0) {
        console.log(`[Sqlite-Cache] Cleaned up ${deleted} expired entries`);
      }
      return deleted;
    } catch (err) {
      console.error("[Sqlite-Cache] Error cleaning up cache:", err);
      return 0;
    }
  }

  async clear(): Promise<number> {
    try {
      const database = await this.getDb();
      const result = await database.run("DELETE FROM cache_entries");
      return result.changes ?? 0;
    } catch (err) {
      console.error("[Sqlite-Cache] Error clearing cache:", err);
      return 0;
    }
  }

  async getStats(now: number = Date.now()): Promise<SqliteCacheStats> {
    try {
      const database = await this.getDb();
      const totalRow = await database.get<{ count: number }>("SELECT COUNT(*) as count FROM cache_entries");
      const validRow = await database.get<{ count: number }>(
        "SELECT COUNT(*) as count FROM cache_entries WHERE expires_at > ?",
        [now],
      );
      const rangeRow = await database.get<{ oldest: number | null; newest: number | null }>(
        "SELECT MIN(created_at) as oldest, MAX(created_at) as newest FROM cache_entries WHERE expires_at > ?",
        [now],
      );

      const totalEntries = totalRow?.count ?? 0;
      const validEntries = validRow?.count ?? 0;

      let dbSizeBytes: number | null = null;
      if (fs.existsSync(this.dbPath)) {
        dbSizeBytes = fs.statSync(this.dbPath).size;
      }

      return {
        totalEntries,
        validEntries,
        expiredEntries: totalEntries - validEntries,
        oldestEntry: rangeRow?.oldest ?? null,
        newestEntry: rangeRow?.newest ?? null,
        dbSizeBytes,
      };
    } catch (err) {
      console.error("[Sqlite-Cache] Error getting stats:", err);
      return {
        totalEntries: 0,
        validEntries: 0,
        expiredEntries: 0,
        oldestEntry: null,
        newestEntry: null,
        dbSizeBytes: null,
      };
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
      this.dbPromise = null;
      console.log("[Sqlite-Cache] Database closed");
    }
  }
}
