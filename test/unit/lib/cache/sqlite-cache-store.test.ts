/**
 * Tests for the SQLite persistent cache tier, against a database file in a
 * temporary directory.
 */
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CacheEntry } from "@/lib/cache/cache-types";
import { SqliteCacheStore } from "@/lib/cache/sqlite-cache-store";

const NOW = 1_700_000_000_000;

function entry(key: string, value: unknown, ttlMs = 60_000): CacheEntry {
  return { key, value, createdAt: NOW, expiresAt: NOW + ttlMs, accessCount: 0, lastAccessed: NOW, metadata: { kind: "test" } };
}

describe("SqliteCacheStore", () => {
  let dir: string;
  let store: SqliteCacheStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ra-sqlite-"));
    store = new SqliteCacheStore(path.join(dir, "cache.db"));
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("round-trips a JSON value with metadata and counts access", async () => {
    await store.set(entry("analysis:330499:abc", { status: "completed", keywords: ["serum"] }));

    const first = await store.get("analysis:330499:abc", NOW + 1);
    expect(first?.value).toEqual({ status: "completed", keywords: ["serum"] });
    expect(first?.metadata).toEqual({ kind: "test" });
    expect(first?.accessCount).toBe(1);

    const second = await store.get("analysis:330499:abc", NOW + 2);
    expect(second?.accessCount).toBe(2);
    expect(second?.lastAccessed).toBe(NOW + 2);
  });

  it("never returns an expired row", async () => {
    await store.set(entry("k", "v", 1_000));
    expect(await store.get("k", NOW + 999)).not.toBeNull();
    expect(await store.get("k", NOW + 1_000)).toBeNull();
  });

  it("deletes an expired row when a read finds it", async () => {
    await store.set(entry("stale", "v", 1_000));
    await store.set(entry("fresh", "v", 60_000));

    expect(await store.get("stale", NOW + 5_000)).toBeNull();

    const stats = await store.getStats(NOW + 5_000);
    expect(stats.totalEntries).toBe(1);
    expect(stats.expiredEntries).toBe(0);
    expect(await store.cleanupExpired(NOW + 5_000)).toBe(0);
  });

  it("replaces an existing key", async () => {
    await store.set(entry("k", "old"));
    await store.set(entry("k", "new"));
    expect((await store.get("k", NOW))?.value).toBe("new");
  });

  it("deletes single keys and substring matches", async () => {
    await store.set(entry("analysis:330499:a", 1));
    await store.set(entry("analysis:330499:b", 2));
    await store.set(entry("evidence:FDA:code:330499:x", 3));

    expect(await store.delete("analysis:330499:a")).toBe(true);
    expect(await store.delete("analysis:330499:a")).toBe(false);
    expect(await store.deleteMatching("330499")).toBe(2);
    expect(await store.get("evidence:FDA:code:330499:x", NOW)).toBeNull();
  });

  it("cleans up expired rows and reports stats", async () => {
    await store.set(entry("short", 1, 1_000));
    await store.set(entry("long", 2, 60_000));

    const before = await store.getStats(NOW + 5_000);
    expect(before.totalEntries).toBe(2);
    expect(before.validEntries).toBe(1);
    expect(before.expiredEntries).toBe(1);

    expect(await store.cleanupExpired(NOW + 5_000)).toBe(1);
    expect((await store.getStats(NOW + 5_000)).totalEntries).toBe(1);
  });

  it("clears every row", async () => {
    await store.set(entry("a", 1));
    await store.set(entry("b", 2));
    expect(await store.clear()).toBe(2);
    expect(await store.get("a", NOW)).toBeNull();
  });
});
