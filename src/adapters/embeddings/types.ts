export type EmbeddingsProviderName = "openai" | "local";

/**
 * Text to fixed-dimension vector. Implementations truncate input to their
 * configured maximum and throw on failure; there is no fallback.
 */
export interface EmbeddingProvider {
  readonly name: EmbeddingsProviderName;
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}
