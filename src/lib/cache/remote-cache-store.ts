/**
 * HTTP client for the remote cache backend.
 *
 * Endpoints (relative to baseUrl):
 *   GET    /cache/:key              → 200 { value, expiresAt? } | 404
 *   PUT    /cache/:key              ← { value, ttlSec }
 *   DELETE /cache/:key
 *   GET    /cache?contains=:substr  → 200 { keys: string[] }
 *
 * @module cache/remote-cache-store
 */

import { z } from "zod";
import { ProviderError, ProviderContractError } from "../errors";
import type { RemoteCacheStore, RemoteCacheValue } from "./cache-types";

const PROVIDER = "remote-cache";

const RemoteValueSchema = z.object({
  value: z.unknown(),
  expiresAt: z.number().nullable().optional(),
});

const RemoteKeysSchema = z.object({
  keys: z.array(z.string()),
});

export class HttpRemoteCacheStore implements RemoteCacheStore {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number = 5000,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  private entryUrl(key: string): string {
    return `${this.baseUrl}/cache/${encodeURIComponent(key)}`;
  }

  async get(key: string): Promise<RemoteCacheValue | null> {
    const res = await fetch(this.entryUrl(key), { signal: AbortSignal.timeout(this.timeoutMs) });
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new ProviderError(PROVIDER, res.status, res.status >= 500, `Remote cache GET failed: HTTP ${res.status}`);
    }
    const parsed = RemoteValueSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderContractError(PROVIDER, `Malformed remote cache entry for ${key}`);
    }
    return { value: parsed.data.value, expiresAt: parsed.data.expiresAt ?? null };
  }

  async set(key: string, value: unknown, ttlSec: number): Promise<void> {
    const res = await fetch(this.entryUrl(key), {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ value, ttlSec }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new ProviderError(PROVIDER, res.status, res.status >= 500, `Remote cache PUT failed: HTTP ${res.status}`);
    }
  }

  async delete(key: string): Promise<void> {
    const res = await fetch(this.entryUrl(key), {
      method: "DELETE",
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok && res.status !== 404) {
      throw new ProviderError(PROVIDER, res.status, res.status >= 500, `Remote cache DELETE failed: HTTP ${res.status}`);
    }
  }

  async keys(substring: string): Promise<string[]> {
    const url = `${this.baseUrl}/cache?${new URLSearchParams({ contains: substring }).toString()}`;
    const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      throw new ProviderError(PROVIDER, res.status, res.status >= 500, `Remote cache key listing failed: HTTP ${res.status}`);
    }
    const parsed = RemoteKeysSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderContractError(PROVIDER, "Malformed remote cache key listing");
    }
    return parsed.data.keys;
  }
}
