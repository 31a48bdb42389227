/**
 * LLM Provider Selection
 *
 * Resolves AI SDK language and embedding models from the analyzer config and
 * wraps `generateText` with the shared retry policy.
 *
 * @module llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import { generateText, type CoreMessage, type EmbeddingModel, type LanguageModel } from "ai";
import { retryWithBackoff, isRetriableError } from "./concurrency/task-runner";
import { DEFAULT_LLM_CONFIG, type LlmConfig, type RetryConfig } from "./config-schemas";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export type LlmProvider = LlmConfig["provider"];

export interface ModelInfo {
  provider: LlmProvider;
  modelName: string;
  model: LanguageModel;
}

function normalizeProvider(raw: string): LlmProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  if (p === "google" || p === "gemini") return "google";
  if (p === "mistral") return "mistral";
  return "openai";
}

export function defaultModelName(provider: LlmProvider): string {
  switch (provider) {
    case "anthropic":
      return "claude-3-5-haiku-20241022";
    case "google":
      return "gemini-1.5-flash";
    case "mistral":
      return "mistral-small-latest";
    case "openai":
      return "gpt-4o-mini";
  }
}

function buildModel(provider: LlmProvider, modelName: string): LanguageModel {
  if (provider === "anthropic") return anthropic(modelName);
  if (provider === "google") return google(modelName);
  if (provider === "mistral") return mistral(modelName);
  return openai(modelName);
}

/**
 * Get the configured language model. Extraction-style prompts only, so a
 * small model per provider is the default.
 */
export function getModel(config: LlmConfig = DEFAULT_LLM_CONFIG): ModelInfo {
  const provider = normalizeProvider(config.provider);
  const modelName = config.model ?? defaultModelName(provider);
  return { provider, modelName, model: buildModel(provider, modelName) };
}

export function getEmbeddingModel(config: LlmConfig = DEFAULT_LLM_CONFIG): EmbeddingModel<string> {
  return openai.embedding(config.embeddingModel);
}

// ============================================================================
// TEXT GENERATION
// ============================================================================

export interface GenerateOptions {
  temperature?: number;
  signal?: AbortSignal;
  retry?: RetryConfig;
}

/**
 * One prompt, text out. Retries transient failures with backoff.
 */
export async function generateWithRetry(
  model: LanguageModel,
  messages: CoreMessage[],
  options: GenerateOptions = {},
): Promise<string> {
  const retry = options.retry ?? { maxRetries: DEFAULT_LLM_CONFIG.maxRetries, baseDelayMs: 1000, backoffFactor: 2 };
  return retryWithBackoff(
    async () => {
      const result = await generateText({
        model,
        messages,
        temperature: options.temperature ?? DEFAULT_LLM_CONFIG.temperature,
        abortSignal: options.signal,
      });
      return result.text;
    },
    { ...retry, signal: options.signal, shouldRetry: isRetriableError },
  );
}
