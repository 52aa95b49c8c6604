import { z } from "zod";

export const EntityType = z.enum(["KPI", "METRIC_TARGET", "BUDGET", "TIMELINE", "GOAL", "INITIATIVE"]);

export const Entity = z.object({
  text: z.string(),
  type: EntityType,
  value: z.union([z.number(), z.string()]).nullable().optional(),
  source_section_id: z.string(),
  source_section_title: z.string(),
});

export const MatchType = z.enum(["exact", "fuzzy", "partial", "no_match"]);

export const EntityMatch = z.object({
  strategic_entity: Entity,
  action_entity: Entity,
  match_score: z.number().min(0).max(100),
  match_type: MatchType,
});

export const EntityResults = z.object({
  entity_score: z.number().min(0).max(100),
  /** Weighted match rate; equal to entity_score */
  match_rate: z.number().min(0).max(100),
  total_strategic_entities: z.number().int().nonnegative(),
  total_action_entities: z.number().int().nonnegative(),
  matched_entities: z.number().int().nonnegative(),
  unmatched_entities: z.number().int().nonnegative(),
  matches_by_type: z.record(z.number().int().nonnegative()),
  entity_matches: z.array(EntityMatch),
  unmatched_strategic_entities: z.array(Entity),
});

export const RankedMatch = z.object({
  action_id: z.string(),
  action_title: z.string(),
  similarity_score: z.number(),
  rank: z.number().int().positive(),
});

export const ObjectiveAlignment = z.object({
  objective_id: z.string(),
  objective_title: z.string(),
  best_similarity: z.number().min(0).max(1),
  top_matches: z.array(RankedMatch),
  has_support: z.boolean(),
});

export const SimilarityResults = z.object({
  embedding_score: z.number().min(0).max(100),
  average_similarity: z.number().min(0).max(1),
  objectives_with_support: z.number().int().nonnegative(),
  objectives_without_support: z.number().int().nonnegative(),
  threshold: z.number(),
  objective_alignments: z.array(ObjectiveAlignment),
});

export const ObjectiveSynchronization = z.object({
  objective_id: z.string(),
  objective_title: z.string(),
  embedding_score: z.number(),
  entity_match_count: z.number().int().nonnegative(),
  entity_score: z.number(),
  combined_score: z.number(),
  has_strong_support: z.boolean(),
  top_matching_actions: z.array(RankedMatch),
  gaps: z.array(z.string()),
});

export const Recommendation = z.object({
  priority: z.enum(["high", "medium", "low"]),
  objective: z.string(),
  current_score: z.number().optional(),
  actions: z.array(z.string()),
  expected_impact: z.string().optional(),
});

export const SynchronizationReport = z.object({
  overall_score: z.number(),
  embedding_score: z.number(),
  entity_score: z.number(),
  interpretation: z.string(),
  weights: z.object({ embedding: z.number(), entity: z.number() }),
  total_objectives: z.number().int().nonnegative(),
  objectives_with_strong_support: z.number().int().nonnegative(),
  objectives_with_weak_support: z.number().int().nonnegative(),
  objective_synchronizations: z.array(ObjectiveSynchronization),
  total_strategic_entities: z.number().int().nonnegative(),
  matched_entities: z.number().int().nonnegative(),
  unmatched_entities: z.number().int().nonnegative(),
  assessment_date: z.string(),
  strategic_plan_title: z.string(),
  action_plan_title: z.string(),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  recommendations: z.array(Recommendation),
});

export const Severity = z.enum(["critical", "high", "medium"]);

export const CriticalFinding = z.object({
  id: z.string(),
  severity: Severity,
  title: z.string(),
  description: z.string(),
  affected_objective: z.string(),
  impact: z.string(),
  evidence: z.array(z.string()),
});

export const ProposalStatus = z.enum(["pending", "accepted", "rejected"]);
export const ProposalPriority = z.enum(["high", "medium", "low"]);

export const ActionProposal = z.object({
  id: z.string(),
  priority: ProposalPriority,
  objective_id: z.string(),
  objective_title: z.string(),
  action_title: z.string(),
  description: z.string(),
  budget_estimate: z.number().nonnegative(),
  timeline: z.string(),
  expected_kpis: z.array(z.string()),
  rationale: z.string(),
  expected_impact: z.string(),
  status: ProposalStatus,
});

export const AffectedObjective = z.object({
  objective_title: z.string(),
  current_score: z.number(),
  projected_score: z.number(),
  improvement: z.number(),
});

export const ImpactSimulation = z.object({
  current_score: z.number(),
  projected_score: z.number(),
  improvement: z.number(),
  affected_objectives: z.array(AffectedObjective),
});

export const AgentSummary = z.object({
  total_findings: z.number().int().nonnegative(),
  critical_count: z.number().int().nonnegative(),
  high_count: z.number().int().nonnegative(),
  total_proposals: z.number().int().nonnegative(),
  high_priority_proposals: z.number().int().nonnegative(),
  current_score: z.number(),
  projected_score: z.number(),
  improvement: z.number(),
  objectives_affected: z.number().int().nonnegative(),
});

export const ANALYSIS_RECORD_SCHEMA = "analysis_results.v1";

/**
 * The single canonical analysis-results record persisted after each run.
 */
export const AnalysisRecord = z.object({
  schema: z.literal(ANALYSIS_RECORD_SCHEMA),
  report: SynchronizationReport,
  entity_results: EntityResults,
  similarity_results: SimilarityResults,
  critical_findings: z.array(CriticalFinding),
  proposals: z.array(ActionProposal),
  impact_simulation: ImpactSimulation,
  agent_summary: AgentSummary,
});

export type EntityTypeT = z.infer<typeof EntityType>;
export type EntityT = z.infer<typeof Entity>;
export type MatchTypeT = z.infer<typeof MatchType>;
export type EntityMatchT = z.infer<typeof EntityMatch>;
export type EntityResultsT = z.infer<typeof EntityResults>;
export type RankedMatchT = z.infer<typeof RankedMatch>;
export type ObjectiveAlignmentT = z.infer<typeof ObjectiveAlignment>;
export type SimilarityResultsT = z.infer<typeof SimilarityResults>;
export type ObjectiveSynchronizationT = z.infer<typeof ObjectiveSynchronization>;
export type RecommendationT = z.infer<typeof Recommendation>;
export type SynchronizationReportT = z.infer<typeof SynchronizationReport>;
export type SeverityT = z.infer<typeof Severity>;
export type CriticalFindingT = z.infer<typeof CriticalFinding>;
export type ProposalStatusT = z.infer<typeof ProposalStatus>;
export type ProposalPriorityT = z.infer<typeof ProposalPriority>;
export type ActionProposalT = z.infer<typeof ActionProposal>;
export type AffectedObjectiveT = z.infer<typeof AffectedObjective>;
export type ImpactSimulationT = z.infer<typeof ImpactSimulation>;
export type AgentSummaryT = z.infer<typeof AgentSummary>;
export type AnalysisRecordT = z.infer<typeof AnalysisRecord>;
