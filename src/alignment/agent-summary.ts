import type {
  ActionProposalT,
  AgentSummaryT,
  CriticalFindingT,
  ImpactSimulationT,
} from "../schemas/analysis.js";

/**
 * Roll-up counts stored alongside every analysis record.
 */
export function buildAgentSummary(
  findings: readonly CriticalFindingT[],
  proposals: readonly ActionProposalT[],
  simulation: ImpactSimulationT
): AgentSummaryT {
  return {
    total_findings: findings.length,
    critical_count: findings.filter((f) => f.severity === "critical").length,
    high_count: findings.filter((f) => f.severity === "high").length,
    total_proposals: proposals.length,
    high_priority_proposals: proposals.filter((p) => p.priority === "high").length,
    current_score: simulation.current_score,
    projected_score: simulation.projected_score,
    improvement: simulation.improvement,
    objectives_affected: simulation.affected_objectives.length,
  };
}
