export type VectorMetadataValue = string | number | boolean | null;
export type VectorMetadata = Record<string, VectorMetadataValue>;

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: VectorMetadata;
}

/**
 * One ranked hit. `score` is in [0, 1]; higher is more similar.
 */
export interface VectorMatch {
  id: string;
  score: number;
  metadata: VectorMetadata;
}

/**
 * Namespaced similarity index. Results come back best-first and callers
 * trust that order.
 */
export interface VectorIndex {
  readonly name: string;
  upsert(namespace: string, records: VectorRecord[]): Promise<void>;
  query(namespace: string, vector: number[], topK: number): Promise<VectorMatch[]>;
  clear(namespace: string): Promise<void>;
  count(namespace: string): number;
}
