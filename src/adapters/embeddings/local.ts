import type { EmbeddingProvider } from "./types.js";

export const LOCAL_DIM = 192;

function normalizeText(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

// FNV-1a
function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

export function unitNormalize(values: number[]): number[] {
  let norm = 0;
  for (const value of values) {
    norm += value * value;
  }
  if (norm <= 0) return values;
  const inv = 1 / Math.sqrt(norm);
  return values.map((value) => value * inv);
}

/**
 * Deterministic hashed bag-of-words embedding. Needs no network; used by
 * tests and offline runs.
 */
export function localEmbedding(text: string, dim = LOCAL_DIM): number[] {
  const values = new Array<number>(dim).fill(0);
  const tokens = normalizeText(text).split(/\s+/).filter((token) => token.length > 1);
  if (tokens.length === 0) return values;

  for (const token of tokens) {
    const hash = hashToken(token);
    const idx = hash % dim;
    const sign = hash % 2 === 0 ? 1 : -1;
    const weight = Math.min(3.2, 1 + token.length / 12);
    values[idx] = (values[idx] ?? 0) + sign * weight;
  }

  return unitNormalize(values);
}

export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = "local" as const;
  readonly model = "local-hash-v1";
  readonly dimensions: number;

  constructor(
    private readonly maxChars: number,
    dimensions = LOCAL_DIM
  ) {
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    return localEmbedding(text.slice(0, this.maxChars), this.dimensions);
  }
}
