/**
 * Tests for the layered config loader.
 *
 * Validates defaults, the shipped JSON file, file validation and RA_* env
 * overrides (applied, unparseable, and schema-invalid).
 */
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it } from "vitest";
import { loadAnalyzerConfig } from "@/lib/config-loader";
import { DEFAULT_ANALYZER_CONFIG, validateAnalyzerConfig } from "@/lib/config-schemas";

const DEFAULT_CONFIG_FILE = fileURLToPath(new URL("../../../configs/analyzer.default.json", import.meta.url));

let tmpDirs: string[] = [];

function writeTempConfig(content: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ra-config-"));
  tmpDirs.push(dir);
  const file = path.join(dir, "analyzer.json");
  fs.writeFileSync(file, JSON.stringify(content), "utf-8");
  return file;
}

afterEach(() => {
  for (const dir of tmpDirs) fs.rmSync(dir, { recursive: true, force: true });
  tmpDirs = [];
});

describe("loadAnalyzerConfig", () => {
  it("returns code defaults when no file or env is given", () => {
    const loaded = loadAnalyzerConfig({ env: {} });
    expect(loaded.source).toBe("default");
    expect(loaded.filePath).toBeNull();
    expect(loaded.config).toEqual(DEFAULT_ANALYZER_CONFIG);
    expect(loaded.overrides).toEqual([]);
    expect(loaded.warnings).toEqual([]);
  });

  it("keeps the shipped default file in sync with the code defaults", () => {
    const loaded = loadAnalyzerConfig({ filePath: DEFAULT_CONFIG_FILE, env: {} });
    expect(loaded.source).toBe("file");
    expect(loaded.config).toEqual(DEFAULT_ANALYZER_CONFIG);
    expect(loaded.config.pipeline.recovery.consolidate).toBe("fail");
  });

  it("merges a partial file over the defaults", () => {
    const file = writeTempConfig({ search: { enabled: false }, concurrency: { maxConcurrent: 5 } });
    const loaded = loadAnalyzerConfig({ filePath: file, env: {} });
    expect(loaded.config.search.enabled).toBe(false);
    expect(loaded.config.search.maxResults).toBe(DEFAULT_ANALYZER_CONFIG.search.maxResults);
    expect(loaded.config.concurrency.maxConcurrent).toBe(5);
    expect(loaded.config.concurrency.retry).toEqual(DEFAULT_ANALYZER_CONFIG.concurrency.retry);
  });

  it("reads the file named by RA_CONFIG_PATH", () => {
    const file = writeTempConfig({ pipeline: { maxKeywords: 2 } });
    const loaded = loadAnalyzerConfig({ env: { RA_CONFIG_PATH: file } });
    expect(loaded.filePath).toBe(path.resolve(file));
    expect(loaded.config.pipeline.maxKeywords).toBe(2);
  });

  it("throws on an invalid file", () => {
    const file = writeTempConfig({ pipeline: { recovery: { consolidate: "explode" } } });
    expect(() => loadAnalyzerConfig({ filePath: file, env: {} })).toThrow(/Invalid analyzer config file/);
  });

  it("applies env overrides and records them", () => {
    const loaded = loadAnalyzerConfig({
      env: { RA_MAX_CONCURRENT: "5", RA_LLM_PROVIDER: "Anthropic", RA_PIPELINE_DEADLINE_MS: "0" },
    });
    expect(loaded.config.concurrency.maxConcurrent).toBe(5);
    expect(loaded.config.llm.provider).toBe("anthropic");
    expect(loaded.config.pipeline.deadlineMs).toBeNull();
    expect(loaded.overrides).toContainEqual({ envVar: "RA_MAX_CONCURRENT", fieldPath: "concurrency.maxConcurrent", appliedValue: 5 });
  });

  it("skips overrides that do not parse or would break the schema", () => {
    const loaded = loadAnalyzerConfig({ env: { RA_MAX_CONCURRENT: "lots", RA_SEARCH_MAX_RESULTS: "500" } });
    expect(loaded.config.concurrency.maxConcurrent).toBe(DEFAULT_ANALYZER_CONFIG.concurrency.maxConcurrent);
    expect(loaded.config.search.maxResults).toBe(DEFAULT_ANALYZER_CONFIG.search.maxResults);
    expect(loaded.skippedOverrides).toHaveLength(2);
    expect(loaded.skippedOverrides[0]).toBe("RA_MAX_CONCURRENT (not a number)");
    expect(loaded.skippedOverrides[1]).toMatch(/^RA_SEARCH_MAX_RESULTS \(invalid: /);
  });
});

describe("validateAnalyzerConfig", () => {
  it("warns when confidence weights do not sum to one", () => {
    const candidate = structuredClone(DEFAULT_ANALYZER_CONFIG);
    candidate.confidence.weights.consistency = 0.3;
    const result = validateAnalyzerConfig(candidate);
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["confidence.weights sum to 1.200 instead of 1.0"]);
  });

  it("reports schema errors with their path", () => {
    const candidate = structuredClone(DEFAULT_ANALYZER_CONFIG);
    candidate.concurrency.maxConcurrent = 0;
    const result = validateAnalyzerConfig(candidate);
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^concurrency\.maxConcurrent: /);
  });
});
