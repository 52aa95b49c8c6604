import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import type { EmbeddingProvider } from "./types.js";
import { LocalEmbeddingProvider } from "./local.js";
import { OpenAIEmbeddingProvider } from "./openai.js";

let cached: EmbeddingProvider | null = null;

/**
 * Configured embedding provider (EMBEDDINGS_PROVIDER).
 */
export function getEmbeddingProvider(): EmbeddingProvider {
  if (cached) return cached;

  const { provider, model, maxChars } = config.embeddings;
  cached =
    provider === "local"
      ? new LocalEmbeddingProvider(maxChars)
      : new OpenAIEmbeddingProvider(model, maxChars, config.llm.timeoutMs);

  log.info({ provider: cached.name, model: cached.model }, "Created embedding provider");
  return cached;
}

export function resetEmbeddingProvider(): void {
  cached = null;
}
