import type { RecommendationT } from "../../schemas/analysis.js";
import type { InsightContext, InsightGenerator } from "./types.js";
import { strongestFirst, weakestFirst } from "./types.js";

const GENERAL_ALIGNMENT = "Action plan shows general alignment with strategic direction";

/**
 * Deterministic strengths, weaknesses and recommendations.
 */
export class RuleBasedInsightGenerator implements InsightGenerator {
  readonly name = "rules";

  async identifyStrengths({ objectives, entityResults, similarity }: InsightContext): Promise<string[]> {
    const strengths: string[] = [];
    const total = objectives.length;
    const strong = objectives.filter((o) => o.has_strong_support).length;

    if (total > 0 && strong === total) {
      strengths.push("All strategic objectives have strong supporting actions");
    } else if (total > 0 && strong >= total * 0.8) {
      strengths.push(`${strong}/${total} strategic objectives have strong support`);
    }

    const matchRate = entityResults.match_rate;
    if (matchRate >= 85) {
      strengths.push(`Excellent entity matching (${matchRate.toFixed(0)}%) - KPIs and targets well-aligned`);
    } else if (matchRate >= 70) {
      strengths.push(`Good entity matching (${matchRate.toFixed(0)}%) - most targets are tracked`);
    }

    if (similarity.average_similarity >= 0.85) {
      strengths.push(
        `Very high semantic alignment (${similarity.average_similarity.toFixed(2)}) - actions clearly address objectives`
      );
    }

    const top = strongestFirst(objectives)[0];
    if (top && top.combined_score >= 90) {
      strengths.push(`Exemplary alignment on '${top.objective_title}'`);
    }

    return strengths.length > 0 ? strengths : [GENERAL_ALIGNMENT];
  }

  async identifyWeaknesses({ objectives, entityResults }: InsightContext): Promise<string[]> {
    const weaknesses: string[] = [];

    const weak = objectives.filter((o) => !o.has_strong_support).length;
    if (weak > 0) {
      weaknesses.push(`${weak} strategic objectives lack strong supporting actions`);
    }

    const unmatchedByType = new Map<string, number>();
    for (const entity of entityResults.unmatched_strategic_entities) {
      unmatchedByType.set(entity.type, (unmatchedByType.get(entity.type) ?? 0) + 1);
    }
    for (const [type, count] of unmatchedByType) {
      if (count >= 3) {
        weaknesses.push(`${count} ${type} entities not tracked in action plan`);
      }
    }

    if (entityResults.match_rate < 50) {
      weaknesses.push(
        `Low entity match rate (${entityResults.match_rate.toFixed(0)}%) - many strategic targets missing from actions`
      );
    }

    return weaknesses;
  }

  async generateRecommendations({ objectives }: InsightContext): Promise<RecommendationT[]> {
    const weak = weakestFirst(objectives.filter((o) => !o.has_strong_support));
    const recommendations: RecommendationT[] = [];

    for (const obj of weak.slice(0, 3)) {
      const actions: string[] = [];
      if (obj.embedding_score < 70) {
        actions.push("Review action plan to ensure it directly addresses the strategic intent");
      }
      if (obj.entity_match_count === 0) {
        actions.push("Add explicit KPIs, targets, and timelines matching strategic plan");
      }
      if (obj.top_matching_actions.length === 0) {
        actions.push("Create new action items specifically supporting this objective");
      }

      recommendations.push({
        priority: obj.combined_score < 50 ? "high" : "medium",
        objective: obj.objective_title,
        current_score: obj.combined_score,
        actions,
      });
    }

    if (weak.length > 5) {
      recommendations.unshift({
        priority: "high",
        objective: "Overall Action Plan",
        actions: [
          "Conduct comprehensive review to strengthen objective-action linkages",
          "Consider adding cross-reference table mapping objectives to actions",
        ],
      });
    }

    return recommendations;
  }
}
