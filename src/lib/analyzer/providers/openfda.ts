/**
 * openFDA enforcement-report provider (FDA).
 *
 * Queries the enforcement endpoint matching the product category. openFDA
 * answers 404 when nothing matches; that is a zero-result success.
 * OPENFDA_API_KEY raises the daily quota and is optional.
 *
 * @module analyzer/providers/openfda
 */

import { z } from "zod";
import { ProviderContractError, ProviderError, errorMessage } from "../../errors";
import type { StructuredProvidersConfig } from "../../config-schemas";
import { timeoutSignal } from "../../web-search";
import type { EvidenceItem } from "../types";
import { toIsoDate, type EvidenceProvider, type EvidenceQuery } from "./evidence-provider";

const PROVIDER = "openFDA";

const EnforcementResponseSchema = z.object({
  results: z
    .array(
      z.object({
        recall_number: z.string().optional(),
        product_description: z.string().optional(),
        reason_for_recall: z.string().optional(),
        classification: z.string().optional(),
        status: z.string().optional(),
        report_date: z.string().optional(),
        recalling_firm: z.string().optional(),
      }),
    )
    .default([]),
});

type EnforcementRecord = z.infer<typeof EnforcementResponseSchema>["results"][number];

export function enforcementEndpoint(category: string): string {
  const lower = category.toLowerCase();
  if (lower.includes("device")) return "device";
  if (lower.includes("cosmetic") || lower.includes("drug") || lower.includes("chemical")) return "drug";
  return "food";
}

export class OpenFdaProvider implements EvidenceProvider {
  readonly name = PROVIDER;
  readonly kind = "structured" as const;

  constructor(
    private readonly config: StructuredProvidersConfig["openFda"],
    private readonly timeoutMs: number,
  ) {}

  supports(agency: string): boolean {
    return this.config.enabled && agency === "FDA";
  }

  async fetch(query: EvidenceQuery): Promise<EvidenceItem[]> {
    const term = query.query.replace(/"/g, "").trim();
    if (!term) return [];

    const endpoint = enforcementEndpoint(query.category);
    const params = new URLSearchParams({
      search: `product_description:"${term}"`,
      limit: String(this.config.maxResults),
    });
    const apiKey = process.env.OPENFDA_API_KEY;
    if (apiKey) params.set("api_key", apiKey);

    const url = `${this.config.baseUrl.replace(/\/+$/, "")}/${endpoint}/enforcement.json?${params.toString()}`;
    let res: Response;
    try {
      res = await fetch(url, { signal: timeoutSignal(this.timeoutMs, query.signal) });
    } catch (err) {
      if (query.signal?.aborted) throw err;
      throw new ProviderError(PROVIDER, undefined, false, `openFDA request failed: ${errorMessage(err)}`);
    }

    if (res.status === 404) {
      console.log(`[OpenFDA] No ${endpoint} enforcement records for "${term.substring(0, 50)}"`);
      return [];
    }
    if (!res.ok) {
      throw new ProviderError(PROVIDER, res.status, res.status === 429 || res.status === 403, `openFDA HTTP ${res.status}`);
    }

    const parsed = EnforcementResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderContractError(PROVIDER, `Unexpected openFDA ${endpoint} enforcement payload`);
    }

    const retrievedAt = new Date().toISOString();
    const items = parsed.data.results
      .filter((r) => r.recall_number && (r.product_description || r.reason_for_recall))
      .map((r) => this.toEvidence(r, endpoint, query, retrievedAt));
    console.log(`[OpenFDA] ✅ ${items.length} ${endpoint} enforcement records for "${term.substring(0, 50)}"`);
    return items;
  }

  private toEvidence(record: EnforcementRecord, endpoint: string, query: EvidenceQuery, retrievedAt: string): EvidenceItem {
    const recallNumber = record.recall_number ?? "";
    const product = (record.product_description ?? "").substring(0, 120);
    const reason = record.reason_for_recall ?? "";
    const details = [record.classification, record.status, record.recalling_firm].filter(Boolean).join(", ");
    return {
      kind: "notice",
      agency: "FDA",
      title: `FDA recall ${recallNumber}: ${product}`.trim(),
      description: details ? `${reason} (${details})` : reason,
      sourceUrl: `${this.config.baseUrl.replace(/\/+$/, "")}/${endpoint}/enforcement.json?search=recall_number:"${recallNumber}"`,
      required: false,
      rawPayload: record,
      provenance: { provider: PROVIDER, query: query.query, strategy: query.strategy, retrievedAt },
      effectiveDate: toIsoDate(record.report_date),
      jurisdiction: "federal",
    };
  }
}
