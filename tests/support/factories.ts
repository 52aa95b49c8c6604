/**
 * Builders for test data. Every field has a plain default so tests only
 * spell out what they assert on.
 */

import type {
  ActionProposalT,
  AnalysisRecordT,
  EntityT,
  EntityTypeT,
  ObjectiveSynchronizationT,
} from "../../src/schemas/analysis.js";
import { ANALYSIS_RECORD_SCHEMA } from "../../src/schemas/analysis.js";
import { PlanDocument } from "../../src/schemas/plan.js";
import type { PlanDocumentT } from "../../src/schemas/plan.js";

export function entity(text: string, type: EntityTypeT, sectionTitle = "Objective A", sectionId = "obj_a"): EntityT {
  return { text, type, value: null, source_section_id: sectionId, source_section_title: sectionTitle };
}

export function objective(overrides: Partial<ObjectiveSynchronizationT> = {}): ObjectiveSynchronizationT {
  return {
    objective_id: "obj_1",
    objective_title: "Objective One",
    embedding_score: 60,
    entity_match_count: 0,
    entity_score: 0,
    combined_score: 36,
    has_strong_support: false,
    top_matching_actions: [],
    gaps: [],
    ...overrides,
  };
}

export function proposal(overrides: Partial<ActionProposalT> = {}): ActionProposalT {
  return {
    id: "proposal_obj_1_0",
    priority: "medium",
    objective_id: "obj_1",
    objective_title: "Objective One",
    action_title: "Launch Customer Insights Program",
    description: "Stand up a quarterly customer insights review.",
    budget_estimate: 250000,
    timeline: "Q1 2025 - Q4 2025",
    expected_kpis: ["Customer satisfaction 90%"],
    rationale: "Closes the measurement gap",
    expected_impact: "Raises objective support",
    status: "pending",
    ...overrides,
  };
}

export function strategicPlan(input: unknown = {}): PlanDocumentT {
  return PlanDocument.parse({
    title: "Strategic Plan 2025",
    document_type: "strategic_plan",
    sections: [
      {
        id: "obj_digital",
        type: "strategic_objective",
        title: "Digital Transformation",
        content: "Modernize core platforms and move customer journeys online.",
        kpis: [{ metric: "Digital adoption rate", target: 80, unit: "%", deadline: "2025-12-31" }],
        timeline: "FY2025",
        goals: ["Modernize core platforms"],
      },
      {
        id: "obj_risk",
        type: "strategic_objective",
        title: "Risk Management",
        content: "Strengthen enterprise risk oversight and reporting.",
        kpis: [{ metric: "Audit findings closed", target: 95, unit: "%" }],
        goals: ["Board-level risk reporting"],
      },
    ],
    ...(typeof input === "object" && input !== null ? input : {}),
  });
}

export function actionPlan(input: unknown = {}): PlanDocumentT {
  return PlanDocument.parse({
    title: "Action Plan 2025",
    document_type: "action_plan",
    total_budget: 1000000,
    sections: [
      {
        id: "act_platform",
        type: "action_item",
        title: "Core Platform Migration",
        content: "Migrate core platforms to the cloud and launch online customer journeys.",
        kpis: [{ metric: "Digital adoption rate", target: 80, unit: "%", deadline: "2025-12-31" }],
        budget: 400000,
        timeline: "FY2025",
        priority: "high",
      },
    ],
    ...(typeof input === "object" && input !== null ? input : {}),
  });
}

export function analysisRecord(overrides: Partial<AnalysisRecordT> = {}): AnalysisRecordT {
  const objectives = [
    objective({ objective_id: "obj_1", objective_title: "Objective One", combined_score: 60 }),
    objective({ objective_id: "obj_2", objective_title: "Objective Two", combined_score: 80 }),
  ];
  return {
    schema: ANALYSIS_RECORD_SCHEMA,
    report: {
      overall_score: 70,
      embedding_score: 75,
      entity_score: 50,
      interpretation: "Moderate - Significant improvements needed",
      weights: { embedding: 0.6, entity: 0.4 },
      total_objectives: 2,
      objectives_with_strong_support: 1,
      objectives_with_weak_support: 1,
      objective_synchronizations: objectives,
      total_strategic_entities: 4,
      matched_entities: 2,
      unmatched_entities: 2,
      assessment_date: "2025-01-15T00:00:00.000Z",
      strategic_plan_title: "Strategic Plan 2025",
      action_plan_title: "Action Plan 2025",
      strengths: [],
      weaknesses: [],
      recommendations: [],
    },
    entity_results: {
      entity_score: 50,
      match_rate: 50,
      total_strategic_entities: 4,
      total_action_entities: 3,
      matched_entities: 2,
      unmatched_entities: 2,
      matches_by_type: {},
      entity_matches: [],
      unmatched_strategic_entities: [],
    },
    similarity_results: {
      embedding_score: 75,
      average_similarity: 0.75,
      objectives_with_support: 1,
      objectives_without_support: 1,
      threshold: 0.7,
      objective_alignments: [],
    },
    critical_findings: [],
    proposals: [proposal()],
    impact_simulation: { current_score: 70, projected_score: 76, improvement: 6, affected_objectives: [] },
    agent_summary: {
      total_findings: 0,
      critical_count: 0,
      high_count: 0,
      total_proposals: 1,
      high_priority_proposals: 0,
      current_score: 70,
      projected_score: 76,
      improvement: 6,
      objectives_affected: 1,
    },
    ...overrides,
  };
}
