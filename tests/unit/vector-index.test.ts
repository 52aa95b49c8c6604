import { describe, it, expect } from "vitest";
import { InMemoryVectorIndex } from "../../src/adapters/vector/memory.js";
import { LOCAL_DIM, LocalEmbeddingProvider, localEmbedding } from "../../src/adapters/embeddings/local.js";

function record(id: string, values: number[]) {
  return { id, values, metadata: { title: id } };
}

describe("InMemoryVectorIndex", () => {
  it("returns matches best-first with scores clamped to [0, 1]", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert("docs", [record("opposite", [-1, 0]), record("exact", [1, 0]), record("orthogonal", [0, 1])]);

    const matches = await index.query("docs", [1, 0], 3);

    expect(matches.map((m) => [m.id, m.score])).toEqual([
      ["exact", 1],
      ["opposite", 0],
      ["orthogonal", 0],
    ]);
    expect(matches[0]?.metadata).toEqual({ title: "exact" });
  });

  it("keeps namespaces apart and honours topK", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert("a", [record("a1", [1, 0]), record("a2", [1, 1])]);
    await index.upsert("b", [record("b1", [1, 0])]);

    expect(await index.query("a", [1, 0], 1)).toHaveLength(1);
    expect(await index.query("a", [1, 0], 0)).toEqual([]);
    expect(await index.query("missing", [1, 0], 5)).toEqual([]);
    expect(index.count("a")).toBe(2);
    expect(index.count("b")).toBe(1);

    await index.clear("a");
    expect(index.count("a")).toBe(0);
    expect(index.count("b")).toBe(1);
  });

  it("replaces records that share an id", async () => {
    const index = new InMemoryVectorIndex();
    await index.upsert("docs", [record("x", [1, 0])]);
    await index.upsert("docs", [record("x", [0, 1])]);

    expect(index.count("docs")).toBe(1);
    expect((await index.query("docs", [0, 1], 1))[0]?.score).toBe(1);
  });
});

describe("localEmbedding", () => {
  it("is deterministic and unit length", () => {
    const a = localEmbedding("Increase digital adoption to 80%");
    const b = localEmbedding("Increase digital adoption to 80%");

    expect(a).toEqual(b);
    expect(a).toHaveLength(LOCAL_DIM);
    expect(Math.sqrt(a.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1, 10);
  });

  it("returns a zero vector for text without tokens", () => {
    expect(localEmbedding("! ?").every((v) => v === 0)).toBe(true);
  });

  it("truncates input to the configured length", async () => {
    const provider = new LocalEmbeddingProvider(10);
    expect(await provider.embed("risk oversight and reporting")).toEqual(localEmbedding("risk overs"));
  });
});
