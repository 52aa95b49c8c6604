import type { EmbeddingProvider } from "../adapters/embeddings/types.js";
import type { VectorIndex, VectorRecord } from "../adapters/vector/types.js";
import type { PlanDocumentT, PlanSectionT } from "../schemas/plan.js";
import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import { ExternalServiceError, describeError } from "./errors.js";
import type { AlignmentSettings } from "./settings.js";
import type { ObjectiveQueryResult } from "./similarity-aggregator.js";

export const ACTION_NAMESPACE = "action_plan";
export const STRATEGIC_NAMESPACE = "strategic_plan";

const CONTENT_PREVIEW_CHARS = 1000;

export function sectionEmbeddingText(section: PlanSectionT): string {
  return `${section.title}. ${section.content.slice(0, CONTENT_PREVIEW_CHARS)}`;
}

function sectionMetadata(section: PlanSectionT, document: "strategic_plan" | "action_plan"): VectorRecord["metadata"] {
  return {
    id: section.id,
    title: section.title,
    type: section.type,
    document,
    budget: section.budget ?? 0,
    timeline: section.timeline ?? "",
    priority: section.priority ?? "",
    kpi_count: section.kpis.length,
  };
}

/**
 * Indexes both plans and asks the vector index for the closest action items
 * of every strategic objective.
 *
 * Embedding or indexing failures abort the run. A failed query only empties
 * that objective's matches.
 */
export class EmbeddingAnalyzer {
  constructor(
    private readonly embedder: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly settings: Pick<AlignmentSettings, "topK">
  ) {}

  async analyze(strategic: PlanDocumentT, action: PlanDocumentT): Promise<ObjectiveQueryResult[]> {
    const objectives = strategic.sections.filter((s) => s.type === "strategic_objective");
    const actionItems = action.sections.filter((s) => s.type === "action_item");

    await this.reindex(ACTION_NAMESPACE, "action_plan", actionItems);
    const objectiveVectors = await this.reindex(STRATEGIC_NAMESPACE, "strategic_plan", objectives);

    const results: ObjectiveQueryResult[] = [];
    for (const [i, objective] of objectives.entries()) {
      const vector = objectiveVectors[i] ?? [];
      try {
        const matches = await this.index.query(ACTION_NAMESPACE, vector, this.settings.topK);
        results.push({ objective_id: objective.id, objective_title: objective.title, matches });
      } catch (error) {
        log.warn({ objective_id: objective.id, error: describeError(error) }, "Vector query failed; objective gets no matches");
        emit(TelemetryEvents.ObjectiveQueryFailed, { objective_id: objective.id, index: this.index.name });
        results.push({ objective_id: objective.id, objective_title: objective.title, matches: [] });
      }
    }

    return results;
  }

  private async reindex(
    namespace: string,
    document: "strategic_plan" | "action_plan",
    sections: readonly PlanSectionT[]
  ): Promise<number[][]> {
    const prefix = document === "strategic_plan" ? "sp" : "ap";
    const records: VectorRecord[] = [];

    for (const section of sections) {
      let values: number[];
      try {
        values = await this.embedder.embed(sectionEmbeddingText(section));
      } catch (error) {
        throw new ExternalServiceError(
          `Embedding failed for section ${section.id}: ${describeError(error)}`,
          "embeddings",
          "embed",
          error
        );
      }
      records.push({ id: `${prefix}_${section.id}`, values, metadata: sectionMetadata(section, document) });
    }

    try {
      await this.index.clear(namespace);
      if (records.length > 0) {
        await this.index.upsert(namespace, records);
      }
    } catch (error) {
      throw new ExternalServiceError(
        `Indexing ${namespace} failed: ${describeError(error)}`,
        "vector_index",
        "upsert",
        error
      );
    }

    return records.map((r) => r.values);
  }
}
