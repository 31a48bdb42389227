/**
 * Configuration Loader
 *
 * Resolves the effective analyzer config in three layers:
 *   1. code defaults (DEFAULT_ANALYZER_CONFIG)
 *   2. optional JSON file (explicit path or RA_CONFIG_PATH)
 *   3. RA_* environment variable overrides
 *
 * Every layer is validated against AnalyzerConfigSchema. An env override that
 * would make the config invalid is skipped and reported, never applied.
 *
 * @module config-loader
 */

import * as fs from "fs";
import * as path from "path";
import {
  AnalyzerConfigSchema,
  DEFAULT_ANALYZER_CONFIG,
  validateAnalyzerConfig,
  type AnalyzerConfig,
} from "./config-schemas";

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue: string | number | boolean | undefined;
}

export interface LoadedConfig {
  config: AnalyzerConfig;
  source: "default" | "file";
  filePath: string | null;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
  warnings: string[];
}

export interface LoadConfigOptions {
  filePath?: string | null;
  env?: NodeJS.ProcessEnv;
}

type EnvMapping = { fieldPath: string; parser: (v: string) => unknown };

// ============================================================================
// ENV OVERRIDE MAPPINGS
// ============================================================================

const parseIntValue = (v: string) => parseInt(v, 10);
const parseFloatValue = (v: string) => parseFloat(v);
const parseBool = (v: string) => v.toLowerCase() === "true";
const parseNullableString = (v: string) => (v === "null" ? null : v);

const ENV_MAP: Record<string, EnvMapping> = {
  RA_LLM_ENABLED: { fieldPath: "llm.enabled", parser: parseBool },
  RA_LLM_PROVIDER: { fieldPath: "llm.provider", parser: (v) => v.toLowerCase() },
  RA_LLM_MODEL: { fieldPath: "llm.model", parser: parseNullableString },
  RA_LLM_EMBEDDINGS_ENABLED: { fieldPath: "llm.embeddingsEnabled", parser: parseBool },
  RA_CACHE_MEMORY_CAPACITY: { fieldPath: "cache.memoryCapacity", parser: parseIntValue },
  RA_CACHE_DEFAULT_TTL_SEC: { fieldPath: "cache.defaultTtlSec", parser: parseIntValue },
  RA_CACHE_PERSISTENT_ENABLED: { fieldPath: "cache.persistentEnabled", parser: parseBool },
  RA_CACHE_DB_PATH: { fieldPath: "cache.dbPath", parser: (v) => v },
  RA_CACHE_REMOTE_ENABLED: { fieldPath: "cache.remoteEnabled", parser: parseBool },
  RA_CACHE_REMOTE_URL: { fieldPath: "cache.remoteBaseUrl", parser: parseNullableString },
  RA_MAX_CONCURRENT: { fieldPath: "concurrency.maxConcurrent", parser: parseIntValue },
  RA_TASK_TIMEOUT_MS: { fieldPath: "concurrency.taskTimeoutMs", parser: parseIntValue },
  RA_RETRY_MAX: { fieldPath: "concurrency.retry.maxRetries", parser: parseIntValue },
  RA_RETRY_BASE_DELAY_MS: { fieldPath: "concurrency.retry.baseDelayMs", parser: parseIntValue },
  RA_SEARCH_ENABLED: { fieldPath: "search.enabled", parser: parseBool },
  RA_SEARCH_PROVIDER: { fieldPath: "search.provider", parser: (v) => v.toLowerCase() },
  RA_SEARCH_MAX_RESULTS: { fieldPath: "search.maxResults", parser: parseIntValue },
  RA_PIPELINE_DEADLINE_MS: {
    fieldPath: "pipeline.deadlineMs",
    parser: (v) => (v === "null" || v === "0" ? null : parseInt(v, 10)),
  },
  RA_RECOMMENDER_URL: { fieldPath: "pipeline.recommenderUrl", parser: parseNullableString },
  RA_PRECEDENT_SERVICE_URL: { fieldPath: "pipeline.precedentServiceUrl", parser: parseNullableString },
  RA_CIRCUIT_BREAKER_ENABLED: { fieldPath: "circuitBreaker.enabled", parser: parseBool },
  RA_PRECEDENT_MATCH_THRESHOLD: { fieldPath: "precedent.matchThreshold", parser: parseFloatValue },
};

// ============================================================================
// LOADING
// ============================================================================

/**
 * Load the effective analyzer configuration.
 * Throws only when the config file exists but is invalid; a missing env or
 * file layer simply leaves the previous layer in place.
 */
export function loadAnalyzerConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? env.RA_CONFIG_PATH ?? null;

  let base: AnalyzerConfig = cloneConfig(DEFAULT_ANALYZER_CONFIG);
  let source: LoadedConfig["source"] = "default";
  let resolvedPath: string | null = null;

  if (filePath) {
    resolvedPath = path.resolve(filePath);
    const raw: unknown = JSON.parse(fs.readFileSync(resolvedPath, "utf-8"));
    const merged = deepMerge(cloneConfig(base), raw);
    const parsed = AnalyzerConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new Error(`Invalid analyzer config file ${resolvedPath}: ${details}`);
    }
    base = parsed.data;
    source = "file";
    console.log(`[Config-Loader] Loaded config from ${resolvedPath}`);
  }

  const { result, overrides, skippedOverrides } = applyEnvOverrides(base, env);
  const { warnings } = validateAnalyzerConfig(result);
  for (const warning of warnings) {
    console.warn(`[Config-Loader] ${warning}`);
  }

  return { config: result, source, filePath: resolvedPath, overrides, skippedOverrides, warnings };
}

function applyEnvOverrides(
  base: AnalyzerConfig,
  env: NodeJS.ProcessEnv,
): { result: AnalyzerConfig; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];
  let result = base;

  for (const [envVar, mapping] of Object.entries(ENV_MAP)) {
    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsedValue = mapping.parser(envValue);
    if (typeof parsedValue === "number" && Number.isNaN(parsedValue)) {
      console.warn(`[Config-Loader] Failed to parse ${envVar}=${envValue}`);
      skippedOverrides.push(`${envVar} (not a number)`);
      continue;
    }

    const tentative: unknown = cloneConfig(result);
    setNestedValue(tentative, mapping.fieldPath, parsedValue);

    const validation = AnalyzerConfigSchema.safeParse(tentative);
    if (!validation.success) {
      console.warn(
        `[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ` +
          validation.error.issues.map((i) => i.message).join(", "),
      );
      skippedOverrides.push(`${envVar} (invalid: ${validation.error.issues[0]?.message})`);
      continue;
    }

    result = validation.data;
    overrides.push({
      envVar,
      fieldPath: mapping.fieldPath,
      appliedValue:
        typeof parsedValue === "string" || typeof parsedValue === "number" || typeof parsedValue === "boolean"
          ? parsedValue
          : undefined,
    });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// HELPERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function cloneConfig(config: AnalyzerConfig): AnalyzerConfig {
  return structuredClone(config);
}

function deepMerge(base: unknown, patch: unknown): unknown {
  if (!isRecord(base) || !isRecord(patch)) return patch === undefined ? base : patch;
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    out[key] = key in base ? deepMerge(base[key], value) : value;
  }
  return out;
}

function setNestedValue(obj: unknown, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    if (!isRecord(current)) return;
    if (!isRecord(current[parts[i]])) {
      current[parts[i]] = {};
    }
    current = current[parts[i]];
  }

  if (isRecord(current)) {
    current[parts[parts.length - 1]] = value;
  }
}
