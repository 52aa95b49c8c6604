import { log } from "../../utils/telemetry.js";
import { withRetry } from "../../utils/retry.js";
import { getOpenAIClient, toUpstreamError } from "../llm/openai.js";
import type { EmbeddingProvider } from "./types.js";

const MODEL_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-large": 3072,
  "text-embedding-3-small": 1536,
  "text-embedding-ada-002": 1536,
};

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai" as const;
  readonly model: string;
  readonly dimensions: number;

  constructor(
    model: string,
    private readonly maxChars: number,
    private readonly timeoutMs: number
  ) {
    this.model = model;
    this.dimensions = MODEL_DIMENSIONS[model] ?? 1536;
  }

  async embed(text: string): Promise<number[]> {
    const input = text.slice(0, this.maxChars);
    return withRetry(() => this.embedOnce(input), { provider: "openai", model: this.model, operation: "embed" });
  }

  private async embedOnce(input: string): Promise<number[]> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.timeoutMs);
    const startTime = Date.now();

    try {
      const response = await getOpenAIClient().embeddings.create(
        { model: this.model, input },
        { signal: abortController.signal }
      );
      clearTimeout(timeoutId);

      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        log.error({ model: this.model }, "OpenAI returned no embedding");
        throw new Error("openai_empty_embedding");
      }
      return embedding;
    } catch (error) {
      clearTimeout(timeoutId);
      throw toUpstreamError(error, "embed", abortController.signal.aborted, Date.now() - startTime);
    }
  }
}
