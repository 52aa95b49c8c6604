import { describe, it, expect, afterEach } from "vitest";
import { ACTION_NAMESPACE, EmbeddingAnalyzer, STRATEGIC_NAMESPACE } from "../../src/alignment/embedding-analyzer.js";
import { ExternalServiceError } from "../../src/alignment/errors.js";
import { LocalEmbeddingProvider } from "../../src/adapters/embeddings/local.js";
import { InMemoryVectorIndex } from "../../src/adapters/vector/memory.js";
import type { VectorMatch } from "../../src/adapters/vector/types.js";
import { setTestSink, TelemetryEvents } from "../../src/utils/telemetry.js";
import { actionPlan, strategicPlan } from "../support/factories.js";
import { FailingEmbeddingProvider } from "../support/failing-embedder.js";

class FailingQueryIndex extends InMemoryVectorIndex {
  async query(): Promise<VectorMatch[]> {
    throw new Error("index timeout");
  }
}

describe("EmbeddingAnalyzer", () => {
  afterEach(() => setTestSink(null));

  it("indexes both plans and queries action items per objective", async () => {
    const index = new InMemoryVectorIndex();
    const analyzer = new EmbeddingAnalyzer(new LocalEmbeddingProvider(8000), index, { topK: 5 });

    const results = await analyzer.analyze(strategicPlan(), actionPlan());

    expect(index.count(ACTION_NAMESPACE)).toBe(1);
    expect(index.count(STRATEGIC_NAMESPACE)).toBe(2);
    expect(results.map((r) => [r.objective_id, r.objective_title, r.matches.length])).toEqual([
      ["obj_digital", "Digital Transformation", 1],
      ["obj_risk", "Risk Management", 1],
    ]);
    expect(results[0]?.matches[0]?.id).toBe("ap_act_platform");
    expect(results[0]?.matches[0]?.metadata.title).toBe("Core Platform Migration");
  });

  it("fails the run when a section cannot be embedded", async () => {
    const analyzer = new EmbeddingAnalyzer(new FailingEmbeddingProvider(), new InMemoryVectorIndex(), { topK: 5 });

    await expect(analyzer.analyze(strategicPlan(), actionPlan())).rejects.toMatchObject({
      name: "ExternalServiceError",
      service: "embeddings",
    });
    await expect(analyzer.analyze(strategicPlan(), actionPlan())).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("gives an objective no matches when its query fails", async () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));
    const analyzer = new EmbeddingAnalyzer(new LocalEmbeddingProvider(8000), new FailingQueryIndex(), { topK: 5 });

    const results = await analyzer.analyze(strategicPlan(), actionPlan());

    expect(results.map((r) => r.matches)).toEqual([[], []]);
    expect(events.filter((e) => e === TelemetryEvents.ObjectiveQueryFailed)).toHaveLength(2);
  });
});
