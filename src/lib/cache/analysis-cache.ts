/**
 * Analysis Result Cache
 *
 * Stores complete analysis results per (classification code, product name)
 * on top of the tiered cache. Keys embed the normalized code in clear text so
 * every product under one code can be invalidated with a single pattern.
 *
 * @module cache/analysis-cache
 */

import crypto from "crypto";
import { RequirementsAnalysisResultSchema, type RequirementsAnalysisResult } from "../analyzer/types";
import type { TieredCache } from "./tiered-cache";

export const ANALYSIS_KEY_PREFIX = "analysis:";

export interface AnalysisCacheStatus {
  cached: boolean;
  cacheKey: string;
  tier: "memory" | "persistent" | "remote" | null;
  createdAt: string | null;
  expiresAt: string | null;
  ttlRemainingSec: number | null;
  accessCount: number;
}

export function normalizeCode(code: string): string {
  return code.replace(/[^0-9A-Za-z]/g, "").toUpperCase();
}

export function analysisCacheKey(code: string, productName: string): string {
  const nameHash = crypto
    .createHash("md5")
    .update(`${normalizeCode(code)}_${productName.trim().toLowerCase()}`)
    .digest("hex");
  return `${ANALYSIS_KEY_PREFIX}${normalizeCode(code)}:${nameHash}`;
}

export class AnalysisResultCache {
  constructor(
    private readonly cache: TieredCache,
    private readonly ttlSec: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get(code: string, productName: string): Promise<RequirementsAnalysisResult | null> {
    const key = analysisCacheKey(code, productName);
    const cached = await this.cache.getParsed(key, RequirementsAnalysisResultSchema);
    if (!cached) return null;
    console.log(`[Analysis-Cache] ✅ Cache HIT for ${code} "${productName.substring(0, 50)}"`);
    return cached;
  }

  async save(result: RequirementsAnalysisResult): Promise<void> {
    if (result.status === "failed") return;
    const key = analysisCacheKey(result.classificationCode, result.productName);
    await this.cache.set(key, result, this.ttlSec, {
      classificationCode: result.classificationCode,
      confidenceLevel: result.confidence.level,
    });
    console.log(
      `[Analysis-Cache] ✅ Cached analysis for ${result.classificationCode} "${result.productName.substring(0, 50)}" (TTL: ${Math.round(this.ttlSec / 86_400)}d)`,
    );
  }

  async invalidate(code: string, productName: string): Promise<boolean> {
    return this.cache.delete(analysisCacheKey(code, productName));
  }

  async invalidateCode(code: string): Promise<number> {
    return this.cache.invalidatePattern(`${ANALYSIS_KEY_PREFIX}${normalizeCode(code)}:`);
  }

  async status(code: string, productName: string): Promise<AnalysisCacheStatus> {
    const key = analysisCacheKey(code, productName);
    const info = await this.cache.describe(key);
    if (!info) {
      return {
        cached: false,
        cacheKey: key,
        tier: null,
        createdAt: null,
        expiresAt: null,
        ttlRemainingSec: null,
        accessCount: 0,
      };
    }
    return {
      cached: true,
      cacheKey: key,
      tier: info.tier,
      createdAt: new Date(info.createdAt).toISOString(),
      expiresAt: new Date(info.expiresAt).toISOString(),
      ttlRemainingSec: Math.max(0, Math.round((info.expiresAt - this.now()) / 1000)),
      accessCount: info.accessCount,
    };
  }
}
