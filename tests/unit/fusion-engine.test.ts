import { describe, it, expect } from "vitest";
import {
  GAP_LOW_SIMILARITY,
  GAP_NO_ENTITY_MATCH,
  ScoreFusionEngine,
  belowThresholdGap,
  interpretScore,
} from "../../src/alignment/fusion-engine.js";
import { ConfigurationError } from "../../src/alignment/errors.js";
import { RuleBasedInsightGenerator } from "../../src/alignment/insights/rules.js";
import { DEFAULT_ALIGNMENT_SETTINGS } from "../../src/alignment/settings.js";
import type { ObjectiveAlignmentT } from "../../src/schemas/analysis.js";
import { entity } from "../support/factories.js";

function alignment(best: number, overrides: Partial<ObjectiveAlignmentT> = {}): ObjectiveAlignmentT {
  return {
    objective_id: "obj_digital",
    objective_title: "Digital Transformation",
    best_similarity: best,
    top_matches: [],
    has_support: best >= 0.7,
    ...overrides,
  };
}

describe("ScoreFusionEngine", () => {
  const engine = new ScoreFusionEngine(DEFAULT_ALIGNMENT_SETTINGS, new RuleBasedInsightGenerator());

  it("fuses a well-supported objective", () => {
    const fused = engine.fuseObjective(alignment(0.82), 6);

    expect(fused.embedding_score).toBeCloseTo(82, 10);
    expect(fused.entity_score).toBe(100);
    expect(fused.combined_score).toBeCloseTo(89.2, 10);
    expect(fused.has_strong_support).toBe(true);
    expect(fused.gaps).toEqual([]);
  });

  it("reports every gap for an unsupported objective", () => {
    const fused = engine.fuseObjective(alignment(0.5), 0);

    expect(fused.combined_score).toBeCloseTo(30, 10);
    expect(fused.has_strong_support).toBe(false);
    expect(fused.gaps).toEqual([GAP_LOW_SIMILARITY, GAP_NO_ENTITY_MATCH, belowThresholdGap(0.5)]);
    expect(belowThresholdGap(0.5)).toBe("Best match score (0.50) below threshold");
  });

  it("keeps at most three top matching actions", () => {
    const top = [1, 2, 3, 4].map((rank) => ({
      action_id: `a${rank}`,
      action_title: `Action ${rank}`,
      similarity_score: 0.9 - rank / 100,
      rank,
    }));
    const fused = engine.fuseObjective(alignment(0.89, { top_matches: top }), 1);
    expect(fused.top_matching_actions.map((a) => a.rank)).toEqual([1, 2, 3]);
  });

  it("counts entity matches by the strategic entity's section title", () => {
    const match = (title: string) => ({
      strategic_entity: entity("Adoption", "KPI", title),
      action_entity: entity("Adoption", "KPI", "Action", "act"),
      match_score: 100,
      match_type: "exact" as const,
    });

    const fused = engine.fuseObjectives(
      [alignment(0.8), alignment(0.8, { objective_id: "obj_risk", objective_title: "Risk Management" })],
      [match("Digital Transformation"), match("Digital Transformation"), match("Other")]
    );

    expect(fused.map((o) => o.entity_match_count)).toEqual([2, 0]);
    expect(fused[0]?.entity_score).toBe(40);
  });

  it("combines scores with the configured weights for any valid pair", () => {
    for (const embeddingWeight of [0, 0.25, 0.5, 0.7, 1]) {
      const weighted = new ScoreFusionEngine(
        { ...DEFAULT_ALIGNMENT_SETTINGS, embeddingWeight, entityWeight: 1 - embeddingWeight },
        new RuleBasedInsightGenerator()
      );
      const fused = weighted.fuseObjective(alignment(0.64), 2);
      expect(fused.combined_score).toBeCloseTo(embeddingWeight * 64 + (1 - embeddingWeight) * 40, 10);
    }
  });

  it("rejects weights that do not sum to one", () => {
    expect(
      () =>
        new ScoreFusionEngine(
          { ...DEFAULT_ALIGNMENT_SETTINGS, embeddingWeight: 0.7, entityWeight: 0.4 },
          new RuleBasedInsightGenerator()
        )
    ).toThrow(ConfigurationError);
  });

  it("accepts weights within the tolerance", () => {
    expect(
      () =>
        new ScoreFusionEngine(
          { ...DEFAULT_ALIGNMENT_SETTINGS, embeddingWeight: 0.605, entityWeight: 0.4 },
          new RuleBasedInsightGenerator()
        )
    ).not.toThrow();
  });

  it("builds the report from document-level scores", async () => {
    const report = await engine.combine({
      similarity: {
        embedding_score: 82,
        average_similarity: 0.82,
        objectives_with_support: 1,
        objectives_without_support: 0,
        threshold: 0.7,
        objective_alignments: [alignment(0.82)],
      },
      entityResults: {
        entity_score: 50,
        match_rate: 50,
        total_strategic_entities: 4,
        total_action_entities: 2,
        matched_entities: 2,
        unmatched_entities: 2,
        matches_by_type: { KPI: 2 },
        entity_matches: [],
        unmatched_strategic_entities: [],
      },
      strategicPlanTitle: "Strategic Plan 2025",
      actionPlanTitle: "Action Plan 2025",
      assessedAt: new Date("2025-01-15T00:00:00.000Z"),
    });

    // 0.6 * 82 + 0.4 * 50, not an average of objective scores
    expect(report.overall_score).toBeCloseTo(69.2, 10);
    expect(report.interpretation).toBe("Moderate - Significant improvements needed");
    expect(report.total_objectives).toBe(1);
    expect(report.objectives_with_strong_support).toBe(0);
    expect(report.objectives_with_weak_support).toBe(1);
    expect(report.assessment_date).toBe("2025-01-15T00:00:00.000Z");
    expect(report.weights).toEqual({ embedding: 0.6, entity: 0.4 });
  });
});

describe("interpretScore", () => {
  it("bands the overall score", () => {
    expect(interpretScore(90)).toBe("Excellent - Strong alignment across all objectives");
    expect(interpretScore(75)).toBe("Good - Minor gaps that should be addressed");
    expect(interpretScore(60)).toBe("Moderate - Significant improvements needed");
    expect(interpretScore(59.9)).toBe("Poor - Major misalignment requiring urgent attention");
  });
});
