import { EntityType } from "../schemas/analysis.js";
import type { EntityMatchT, EntityResultsT, EntityT } from "../schemas/analysis.js";
import type { AlignmentSettings } from "./settings.js";
import { compareEntityText, normalizeEntityText } from "./text-similarity.js";
import type { TextSimilarity } from "./text-similarity.js";
import { countEntities } from "./entity-extractor.js";
import type { EntitiesByType } from "./entity-extractor.js";

/**
 * Static importance of each entity type in the document-level match rate.
 */
export const ENTITY_TYPE_WEIGHTS: Readonly<Record<string, number>> = Object.freeze({
  METRIC_TARGET: 3.0,
  KPI: 3.0,
  BUDGET: 2.5,
  TIMELINE: 2.0,
  GOAL: 1.5,
  INITIATIVE: 1.5,
});

const DEFAULT_TYPE_WEIGHT = 1.0;

export function entityTypeWeight(type: string): number {
  return ENTITY_TYPE_WEIGHTS[type] ?? DEFAULT_TYPE_WEIGHT;
}

/**
 * Pairs each strategic entity with its best same-type action entity and
 * computes the weighted document-level entity score.
 */
export class EntityMatcher {
  private readonly fuzzyThreshold: number;

  constructor(settings: Pick<AlignmentSettings, "fuzzyThreshold">) {
    this.fuzzyThreshold = settings.fuzzyThreshold;
  }

  compare(a: string, b: string): TextSimilarity {
    return compareEntityText(a, b, this.fuzzyThreshold);
  }

  /**
   * One match at most per strategic entity. Ties keep the earliest action
   * entity in list order.
   */
  match(strategic: EntitiesByType, action: EntitiesByType): EntityMatchT[] {
    const matches: EntityMatchT[] = [];

    for (const type of EntityType.options) {
      const strategicOfType = strategic[type];
      const actionOfType = action[type];
      if (!strategicOfType?.length || !actionOfType?.length) continue;

      for (const strategicEntity of strategicOfType) {
        let best: { entity: EntityT; similarity: TextSimilarity } | null = null;

        for (const actionEntity of actionOfType) {
          const similarity = this.compare(strategicEntity.text, actionEntity.text);
          if (similarity.score > (best?.similarity.score ?? 0)) {
            best = { entity: actionEntity, similarity };
          }
        }

        if (best && best.similarity.score >= this.fuzzyThreshold) {
          matches.push({
            strategic_entity: strategicEntity,
            action_entity: best.entity,
            match_score: best.similarity.score,
            match_type: best.similarity.matchType,
          });
        }
      }
    }

    return matches;
  }

  score(strategic: EntitiesByType, action: EntitiesByType, matches: readonly EntityMatchT[]): EntityResultsT {
    const matched = new Set(matches.map((m) => normalizeEntityText(m.strategic_entity.text)));
    const matchesByType: Record<string, number> = {};
    for (const m of matches) {
      matchesByType[m.strategic_entity.type] = (matchesByType[m.strategic_entity.type] ?? 0) + 1;
    }

    let totalWeight = 0;
    let matchedWeight = 0;
    const unmatched: EntityT[] = [];

    for (const type of EntityType.options) {
      const weight = entityTypeWeight(type);
      for (const entity of strategic[type] ?? []) {
        totalWeight += weight;
        if (matched.has(normalizeEntityText(entity.text))) {
          matchedWeight += weight;
        } else {
          unmatched.push(entity);
        }
      }
    }

    const entityScore = totalWeight > 0 ? (matchedWeight / totalWeight) * 100 : 0;
    const totalStrategic = countEntities(strategic);

    return {
      entity_score: entityScore,
      match_rate: entityScore,
      total_strategic_entities: totalStrategic,
      total_action_entities: countEntities(action),
      matched_entities: totalStrategic - unmatched.length,
      unmatched_entities: unmatched.length,
      matches_by_type: matchesByType,
      entity_matches: [...matches],
      unmatched_strategic_entities: unmatched,
    };
  }

  analyze(strategic: EntitiesByType, action: EntitiesByType): EntityResultsT {
    return this.score(strategic, action, this.match(strategic, action));
  }
}
