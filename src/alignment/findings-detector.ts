import type { CriticalFindingT, ObjectiveSynchronizationT, SeverityT } from "../schemas/analysis.js";

export const CRITICAL_SCORE = 50;
export const WEAK_SUPPORT_SCORE = 65;
export const UNMATCHED_ENTITY_LIMIT = 10;

const SEVERITY_RANK: Record<SeverityT, number> = { critical: 0, high: 1, medium: 2 };

export interface FindingsInput {
  objectives: readonly ObjectiveSynchronizationT[];
  unmatchedEntities: number;
  entityScore: number;
}

/**
 * Deterministic rule ladder over fused scores.
 *
 * Rules run in order (critical objectives, weak objectives, document-wide
 * entity coverage) sharing one id counter; the result is stably sorted by
 * severity.
 */
export class FindingsDetector {
  detect(input: FindingsInput): CriticalFindingT[] {
    const findings: CriticalFindingT[] = [];
    let counter = 0;

    for (const obj of input.objectives) {
      if (obj.combined_score >= CRITICAL_SCORE) continue;
      counter++;
      findings.push({
        id: `critical_${counter}`,
        severity: "critical",
        title: `Severe Misalignment: ${obj.objective_title}`,
        description: `Objective scoring only ${obj.combined_score.toFixed(1)}/100, indicating major gaps in action plan support.`,
        affected_objective: obj.objective_title,
        impact: "High - This strategic priority lacks adequate execution plan",
        evidence: [
          `Embedding score: ${obj.embedding_score.toFixed(1)}%`,
          `Entity matches: ${obj.entity_match_count}`,
          `Gaps: ${obj.gaps.join(", ")}`,
        ],
      });
    }

    for (const obj of input.objectives) {
      if (obj.combined_score < CRITICAL_SCORE || obj.combined_score >= WEAK_SUPPORT_SCORE) continue;
      counter++;
      findings.push({
        id: `high_${counter}`,
        severity: "high",
        title: `Weak Support: ${obj.objective_title}`,
        description: `Objective scoring ${obj.combined_score.toFixed(1)}/100 needs strengthened action support.`,
        affected_objective: obj.objective_title,
        impact: "Medium-High - Strategic goal at risk of underdelivery",
        evidence: [`Only ${obj.entity_match_count} entity matches found`, ...obj.gaps.slice(0, 2)],
      });
    }

    if (input.unmatchedEntities > UNMATCHED_ENTITY_LIMIT) {
      counter++;
      findings.push({
        id: `entities_${counter}`,
        severity: "high",
        title: "Significant Entity Coverage Gaps",
        description: `${input.unmatchedEntities} strategic entities (KPIs, targets) not tracked in action plan.`,
        affected_objective: "Multiple objectives",
        impact: "Medium - Accountability and measurement gaps across strategic plan",
        evidence: [`Total unmatched: ${input.unmatchedEntities}`, `Match rate: ${input.entityScore.toFixed(1)}%`],
      });
    }

    // Array.prototype.sort is stable
    return findings.sort((a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]);
  }
}
