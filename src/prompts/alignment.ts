/**
 * Prompts for the alignment service.
 *
 * Builders take already-computed analysis data and render it into the
 * context block each prompt expects. Every JSON prompt names its envelope
 * key explicitly; parsers rely on it.
 */

import type {
  CriticalFindingT,
  EntityResultsT,
  ObjectiveSynchronizationT,
} from "../schemas/analysis.js";
import type { PlanSectionT } from "../schemas/plan.js";
import { formatCurrency, formatMetricTarget } from "../alignment/entity-extractor.js";
import { strongestFirst, weakestFirst } from "../alignment/insights/types.js";
import type { InsightContext } from "../alignment/insights/types.js";

export const PROPOSAL_SYSTEM_PROMPT =
  "You are a strategic planning expert who creates specific, actionable proposals. Always return valid JSON.";

export const ENTITY_TRACKING_SYSTEM_PROMPT =
  "You are a strategic planning expert specializing in KPI frameworks and performance measurement. Always return valid JSON.";

export const INSIGHT_SYSTEM_PROMPT = "You are a strategic planning expert analyzing plan synchronization.";

export const QA_SYSTEM_PROMPT =
  "You answer questions about a strategic plan, its action plan and their alignment analysis. " +
  "Use only the numbered context passages. Cite passages as [n]. If the context does not contain the answer, say so.";

const PROPOSAL_FORMAT = `Return ONLY valid JSON in this exact format:
{
  "proposals": [
    {
      "action_title": "Quarterly Risk Assessment Reviews",
      "description": "Implement quarterly risk assessment reviews with Board oversight, tracking the objective's KPIs against targets.",
      "budget_estimate": 500000,
      "timeline": "Q1 2025 - Q4 2025",
      "expected_kpis": ["KPI with numeric target"],
      "rationale": "Which identified gap this addresses",
      "expected_impact": "Measurable effect on the objective"
    }
  ]
}`;

function bulletList(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

// ============================================================================
// Proposals
// ============================================================================

export function buildObjectiveProposalPrompt(
  objective: ObjectiveSynchronizationT,
  section: PlanSectionT | undefined
): string {
  let context = `OBJECTIVE NEEDING IMPROVEMENT:
Title: ${objective.objective_title}
Current Score: ${objective.combined_score.toFixed(1)}/100
Embedding Score: ${objective.embedding_score.toFixed(1)}/100
Entity Matches: ${objective.entity_match_count}

IDENTIFIED GAPS:
${bulletList(objective.gaps)}

STRATEGIC PLAN DETAILS:
`;

  if (section) {
    context += `Budget: ${formatCurrency(section.budget ?? 0)}\n`;
    context += `Timeline: ${section.timeline || "Not specified"}\n`;
    if (section.kpis.length > 0) {
      context += `\nStrategic KPIs:\n${bulletList(
        section.kpis.slice(0, 5).map((kpi) => (kpi.target === null ? kpi.metric : formatMetricTarget(kpi)))
      )}\n`;
    }
  }

  if (objective.top_matching_actions.length > 0) {
    context += `\nCurrent Best Matching Actions:\n${bulletList(
      objective.top_matching_actions.map((a) => `${a.action_title} (similarity: ${a.similarity_score.toFixed(2)})`)
    )}\n`;
  }

  return `You are an expert strategic planning consultant. Based on the analysis below, generate 1-2 SPECIFIC, ACTIONABLE proposals for new action items to improve alignment.

${context}
Generate concrete proposals that:
1. Address the identified gaps
2. Include specific KPIs to track
3. Have realistic budgets and timelines
4. Can be directly implemented

${PROPOSAL_FORMAT}

Generate 1-2 proposals. Be specific with numbers, dates, and KPIs.`;
}

export function buildFindingProposalPrompt(
  finding: CriticalFindingT,
  state: { overallScore: number; entityScore: number; unmatchedEntities: number }
): string {
  return `You are an expert strategic planning consultant. Based on this critical finding, generate 1-2 SPECIFIC, ACTIONABLE proposals to address the issue.

CRITICAL FINDING TO ADDRESS:
Title: ${finding.title}
Severity: ${finding.severity.toUpperCase()}
Description: ${finding.description}
Impact: ${finding.impact}

Evidence:
${bulletList(finding.evidence)}

Current State:
- Overall Score: ${state.overallScore.toFixed(1)}/100
- Entity Match Score: ${state.entityScore.toFixed(1)}%
- Total Unmatched Entities: ${state.unmatchedEntities}

The proposals should directly address this finding and improve the alignment. Include:
1. Specific actions to take
2. Clear KPIs to track
3. Realistic budget and timeline
4. Expected measurable impact

${PROPOSAL_FORMAT}`;
}

export function buildEntityTrackingProposalPrompt(entityResults: EntityResultsT, overallScore: number): string {
  const byType = new Map<string, string[]>();
  for (const entity of entityResults.unmatched_strategic_entities.slice(0, 20)) {
    const list = byType.get(entity.type) ?? [];
    list.push(entity.text);
    byType.set(entity.type, list);
  }

  const samples = [...byType.entries()]
    .map(([type, texts]) => `${type}:\n${texts.slice(0, 5).map((t) => `  - ${t}`).join("\n")}`)
    .join("\n");

  return `You are an expert strategic planning consultant. Based on this entity tracking gap analysis, generate 2-3 SPECIFIC, ACTIONABLE proposals to improve KPI tracking and measurement.

ENTITY TRACKING GAP ANALYSIS:
- Total Unmatched Strategic Entities: ${entityResults.unmatched_entities}
- Entity Match Score: ${entityResults.entity_score.toFixed(1)}%
- Overall Synchronization Score: ${overallScore.toFixed(1)}/100

Sample Unmatched Entities by Type:
${samples}

PROBLEM: Many strategic KPIs, targets, and metrics from the strategic plan are not explicitly tracked or measured in the action plan.

Create proposals that:
1. Systematically address the entity tracking gaps
2. Ensure strategic KPIs are measurable in the action plan
3. Create accountability mechanisms
4. Are realistic and implementable

${PROPOSAL_FORMAT}

Generate 2-3 specific proposals focused on improving measurement and tracking.`;
}

// ============================================================================
// Insights
// ============================================================================

function describeObjective(obj: ObjectiveSynchronizationT): string {
  return `- '${obj.objective_title}': ${obj.combined_score.toFixed(1)}/100
  Embedding: ${obj.embedding_score.toFixed(1)}, Entity Matches: ${obj.entity_match_count}`;
}

export function buildStrengthsPrompt(ctx: InsightContext): string {
  const strong = ctx.objectives.filter((o) => o.has_strong_support).length;
  const top = strongestFirst(ctx.objectives)
    .slice(0, 3)
    .map((obj) => {
      const best = obj.top_matching_actions[0];
      return best ? `${describeObjective(obj)}\n  Best Action: ${best.action_title}` : describeObjective(obj);
    });

  return `Analyze this strategic plan synchronization data and return ONLY a JSON object.

ANALYSIS RESULTS:
- Overall Score: ${ctx.overallScore.toFixed(1)}/100
- Embedding Score: ${ctx.similarity.embedding_score.toFixed(1)}/100
- Entity Match Score: ${ctx.entityResults.entity_score.toFixed(1)}/100
- Total Objectives: ${ctx.objectives.length}
- Strong Support: ${strong}/${ctx.objectives.length}

TOP PERFORMING OBJECTIVES:
${top.join("\n")}

Return format (NO other text, ONLY this JSON):
{"strengths": ["string 1", "string 2", "string 3"]}

Each strength must reference concrete data (scores, numbers, specific objectives).
Generate 3-5 strengths based on the data above.`;
}

export function buildWeaknessesPrompt(ctx: InsightContext): string {
  const weak = ctx.objectives.filter((o) => !o.has_strong_support).length;
  const weakest = weakestFirst(ctx.objectives)
    .slice(0, 3)
    .map((obj) => (obj.gaps.length > 0 ? `${describeObjective(obj)}\n  Gaps: ${obj.gaps.slice(0, 2).join(", ")}` : describeObjective(obj)));

  return `Analyze this strategic plan synchronization data and return ONLY a JSON object.

IDENTIFIED ISSUES:
- Overall Score: ${ctx.overallScore.toFixed(1)}/100
- Weak Objectives: ${weak}/${ctx.objectives.length}
- Unmatched Strategic Entities: ${ctx.entityResults.unmatched_entities}/${ctx.entityResults.total_strategic_entities}

WEAKEST OBJECTIVES:
${weakest.join("\n")}

Return format (NO other text, ONLY this JSON):
{"weaknesses": ["string 1", "string 2"]}

Reference concrete data and explain the impact. If there are no significant weaknesses, return {"weaknesses": []}.
Generate 0-5 weaknesses based on the data above.`;
}

export function buildRecommendationsPrompt(ctx: InsightContext, weaknesses: readonly string[]): string {
  const weak = weakestFirst(ctx.objectives.filter((o) => !o.has_strong_support));
  const details = weak.slice(0, 3).map((obj) => {
    let text = `Objective: '${obj.objective_title}'
- Score: ${obj.combined_score.toFixed(1)}/100
- Embedding Score: ${obj.embedding_score.toFixed(1)}/100
- Entity Matches: ${obj.entity_match_count}`;
    if (obj.gaps.length > 0) text += `\n- Gaps: ${obj.gaps.join(", ")}`;
    return text;
  });

  const samples = ctx.entityResults.unmatched_strategic_entities
    .slice(0, 5)
    .map((e) => `- [${e.type}] ${e.text.slice(0, 60)}`);

  return `Generate actionable recommendations and return ONLY a JSON object.

CURRENT STATE:
- Overall Score: ${ctx.overallScore.toFixed(1)}/100
- Weak Objectives: ${weak.length}/${ctx.objectives.length}

IDENTIFIED WEAKNESSES:
${bulletList(weaknesses.slice(0, 5))}

WEAKEST OBJECTIVES (need attention):
${details.join("\n\n")}
${samples.length > 0 ? `\nSAMPLE UNMATCHED ENTITIES:\n${samples.join("\n")}\n` : ""}
Return format (NO other text, ONLY this JSON):
{"recommendations": [{"priority": "high", "objective": "objective name", "current_score": 62.5, "actions": ["action 1", "action 2"], "expected_impact": "impact description"}]}

Generate 3-5 specific, actionable recommendations using actual objective names and scores.`;
}

// ============================================================================
// Document Q&A
// ============================================================================

export function buildQuestionPrompt(question: string, passages: readonly { title: string; text: string }[]): string {
  const context = passages.map((p, i) => `[${i + 1}] ${p.title}\n${p.text}`).join("\n\n");
  return `CONTEXT:
${context}

QUESTION: ${question}

Answer concisely using only the context above and cite passages as [n].`;
}
