/**
 * Service-level behaviour: run orchestration, serialization of transitions
 * and upkeep of the Q&A index.
 */

import { describe, it, expect, afterEach } from "vitest";
import { ProposalStateError } from "../../src/alignment/errors.js";
import { InMemoryVectorIndex } from "../../src/adapters/vector/memory.js";
import type { VectorRecord } from "../../src/adapters/vector/types.js";
import { NOTHING_INDEXED_ANSWER, RAG_NAMESPACE } from "../../src/qa/document-qa.js";
import { InMemoryAnalysisStore } from "../../src/store/memory.js";
import { setTestSink, TelemetryEvents } from "../../src/utils/telemetry.js";
import { actionPlan, analysisRecord, strategicPlan } from "../support/factories.js";
import { FailingEmbeddingProvider } from "../support/failing-embedder.js";
import { offlineService } from "../support/service.js";

class RagRejectingIndex extends InMemoryVectorIndex {
  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    if (namespace === RAG_NAMESPACE) throw new Error("index quota exceeded");
    await super.upsert(namespace, records);
  }
}

class RecordingIndex extends InMemoryVectorIndex {
  lastRagUpsert: VectorRecord[] = [];

  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    if (namespace === RAG_NAMESPACE) this.lastRagUpsert = records;
    await super.upsert(namespace, records);
  }
}

function seededStore(): InMemoryAnalysisStore {
  return new InMemoryAnalysisStore({ strategicPlan: strategicPlan(), actionPlan: actionPlan() });
}

describe("AlignmentService", () => {
  afterEach(() => setTestSink(null));

  it("emits stage events in pipeline order", async () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));

    await offlineService(seededStore()).runAnalysis();

    const stages = events.filter((e) =>
      [
        TelemetryEvents.AnalysisStarted,
        TelemetryEvents.EntitiesMatched,
        TelemetryEvents.SimilarityAggregated,
        TelemetryEvents.FindingsDetected,
        TelemetryEvents.ProposalsGenerated,
        TelemetryEvents.AnalysisCompleted,
      ].some((stage) => stage === e)
    );
    expect(stages).toEqual([
      TelemetryEvents.AnalysisStarted,
      TelemetryEvents.EntitiesMatched,
      TelemetryEvents.SimilarityAggregated,
      TelemetryEvents.FindingsDetected,
      TelemetryEvents.ProposalsGenerated,
      TelemetryEvents.AnalysisCompleted,
    ]);
  });

  it("derives the simulation and summary from the generated proposals", async () => {
    const record = await offlineService(seededStore()).runAnalysis();

    expect(record.impact_simulation.current_score).toBe(record.report.overall_score);
    expect(record.agent_summary.total_proposals).toBe(record.proposals.length);
    expect(record.agent_summary.total_findings).toBe(record.critical_findings.length);
    expect(record.agent_summary.projected_score).toBe(record.impact_simulation.projected_score);
  });

  it("fails the run without saving when embedding fails", async () => {
    const events: string[] = [];
    setTestSink((name) => events.push(name));
    const store = seededStore();

    await expect(
      offlineService(store, { embedder: new FailingEmbeddingProvider() }).runAnalysis()
    ).rejects.toMatchObject({ name: "ExternalServiceError", service: "embeddings" });

    expect(await store.loadResults()).toBeNull();
    expect(events).toContain(TelemetryEvents.AnalysisFailed);
  });

  it("keeps the results when the Q&A index cannot be rebuilt", async () => {
    const store = seededStore();
    const service = offlineService(store, { index: new RagRejectingIndex() });

    await service.runAnalysis();

    expect(await store.loadResults()).not.toBeNull();
    expect((await service.ask("What is the budget?")).answer).toBe(NOTHING_INDEXED_ANSWER);
  });

  it("rebuilds the Q&A index from stored results on the first question", async () => {
    const store = seededStore();
    await store.saveResults(analysisRecord());
    const index = new InMemoryVectorIndex();
    const service = offlineService(store, { index });

    const answer = await service.ask("How much does the core platform migration cost?");

    expect(answer.answer).toBe("Fixture answer based on the indexed plans [1].");
    expect(answer.sources).toHaveLength(5);
    // 2 strategic sections, 1 action item, summary, 2 objectives, 1 proposal
    expect(index.count(RAG_NAMESPACE)).toBe(7);
  });

  it("answers that nothing is indexed while no results are stored", async () => {
    const service = offlineService(seededStore());

    expect(await service.ask("What is the budget?")).toEqual({ answer: NOTHING_INDEXED_ANSWER, sources: [] });
  });

  it("re-indexes the action plan after an accepted proposal", async () => {
    const store = seededStore();
    await store.saveResults(analysisRecord());
    const index = new InMemoryVectorIndex();
    const service = offlineService(store, { index });

    await service.acceptProposal("proposal_obj_1_0");

    // the accepted proposal becomes a second action-plan section
    expect(index.count(RAG_NAMESPACE)).toBe(8);
  });

  it("re-indexes the proposal status after a rejection", async () => {
    const store = seededStore();
    await store.saveResults(analysisRecord());
    const index = new RecordingIndex();
    const service = offlineService(store, { index });

    await service.rejectProposal("proposal_obj_1_0");

    const chunk = index.lastRagUpsert.find((r) => r.id === "analysis_proposal_proposal_obj_1_0");
    expect(chunk?.metadata.text).toBe(
      [
        "PROPOSAL (medium priority, rejected): Launch Customer Insights Program",
        "Objective: Objective One",
        "Stand up a quarterly customer insights review.",
        "Budget: $250,000",
        "Timeline: Q1 2025 - Q4 2025",
        "- Customer satisfaction 90%",
      ].join("\n")
    );
  });

  it("applies concurrent transitions one at a time", async () => {
    const store = seededStore();
    await store.saveResults(analysisRecord());
    const service = offlineService(store);

    const [first, second] = await Promise.allSettled([
      service.acceptProposal("proposal_obj_1_0"),
      service.acceptProposal("proposal_obj_1_0"),
    ]);

    expect(first.status).toBe("fulfilled");
    expect(second.status === "rejected" && second.reason instanceof ProposalStateError).toBe(true);
    expect((await store.loadActionPlan())?.sections).toHaveLength(2);
  });

  it("keeps serving after a failed transition", async () => {
    const store = seededStore();
    await store.saveResults(analysisRecord());
    const service = offlineService(store);

    await expect(service.rejectProposal("proposal_missing")).rejects.toMatchObject({ resource: "proposal" });
    await expect(service.rejectProposal("proposal_obj_1_0")).resolves.toMatchObject({
      proposal: { status: "rejected" },
    });
  });
});
