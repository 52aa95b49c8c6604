import type { VectorIndex, VectorMatch, VectorRecord } from "./types.js";

function cosine(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Process-local cosine index with namespaces.
 *
 * Scores are clamped to [0, 1]. Equal scores keep insertion order, so
 * results are deterministic for a given upsert sequence.
 */
export class InMemoryVectorIndex implements VectorIndex {
  readonly name = "memory";
  private readonly namespaces = new Map<string, Map<string, VectorRecord>>();

  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    let store = this.namespaces.get(namespace);
    if (!store) {
      store = new Map();
      this.namespaces.set(namespace, store);
    }
    for (const record of records) {
      store.set(record.id, { id: record.id, values: [...record.values], metadata: { ...record.metadata } });
    }
  }

  async query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]> {
    const store = this.namespaces.get(namespace);
    if (!store || topK <= 0) return [];

    const scored = [...store.values()].map((record, order) => ({
      order,
      match: {
        id: record.id,
        score: Math.max(0, Math.min(1, cosine(vector, record.values))),
        metadata: { ...record.metadata },
      },
    }));

    scored.sort((a, b) => b.match.score - a.match.score || a.order - b.order);
    return scored.slice(0, topK).map((s) => s.match);
  }

  async clear(namespace: string): Promise<void> {
    this.namespaces.delete(namespace);
  }

  count(namespace: string): number {
    return this.namespaces.get(namespace)?.size ?? 0;
  }
}
