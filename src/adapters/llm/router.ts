/**
 * Provider router.
 *
 * Selects the LLM adapter from configuration (LLM_PROVIDER, LLM_MODEL) and
 * caches one instance per provider/model pair.
 */

import { log } from "../../utils/telemetry.js";
import { config } from "../../config/index.js";
import type { LLMAdapter, LlmProviderName } from "./types.js";
import { OpenAIAdapter } from "./openai.js";
import { FixturesAdapter } from "./fixtures.js";

const adapters: Map<string, LLMAdapter> = new Map();

function getAdapterInstance(provider: LlmProviderName, model?: string): LLMAdapter {
  const cacheKey = `${provider}:${model || "default"}`;

  const cached = adapters.get(cacheKey);
  if (cached) return cached;

  let adapter: LLMAdapter;
  switch (provider) {
    case "openai":
      adapter = new OpenAIAdapter(model);
      break;
    case "fixtures":
      adapter = new FixturesAdapter();
      break;
    default:
      throw new Error(`Unknown provider: ${String(provider)}`);
  }

  adapters.set(cacheKey, adapter);
  log.info({ provider: adapter.name, model: adapter.model, cache_key: cacheKey }, "Created LLM adapter instance");

  return adapter;
}

/**
 * Get the configured LLM adapter.
 *
 * @example
 * ```typescript
 * const adapter = getAdapter();
 * const { content } = await adapter.complete(args);
 * ```
 */
export function getAdapter(): LLMAdapter {
  return getAdapterInstance(config.llm.provider, config.llm.model);
}

/**
 * Get adapter for a specific provider (useful for testing).
 */
export function getAdapterForProvider(provider: LlmProviderName, model?: string): LLMAdapter {
  return getAdapterInstance(provider, model);
}

/**
 * Reset adapter cache (useful for testing).
 */
export function resetAdapterCache(): void {
  adapters.clear();
}
