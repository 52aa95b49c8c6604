import type {
  EntityMatchT,
  EntityResultsT,
  ObjectiveAlignmentT,
  ObjectiveSynchronizationT,
  SimilarityResultsT,
  SynchronizationReportT,
} from "../schemas/analysis.js";
import { ConfigurationError } from "./errors.js";
import { WEIGHT_SUM_TOLERANCE } from "./settings.js";
import type { AlignmentSettings } from "./settings.js";
import type { InsightGenerator } from "./insights/types.js";

/** Per-objective embedding score below which the semantic gap is reported */
export const LOW_SIMILARITY_SCORE = 70;

const TOP_ACTIONS_KEPT = 3;
const MAX_SCORE = 100;

export const GAP_LOW_SIMILARITY = "Low semantic similarity - action may not address objective intent";
export const GAP_NO_ENTITY_MATCH = "No explicit KPIs/targets matched in action plan";

export function belowThresholdGap(bestSimilarity: number): string {
  return `Best match score (${bestSimilarity.toFixed(2)}) below threshold`;
}

export function interpretScore(score: number): string {
  if (score >= 90) return "Excellent - Strong alignment across all objectives";
  if (score >= 75) return "Good - Minor gaps that should be addressed";
  if (score >= 60) return "Moderate - Significant improvements needed";
  return "Poor - Major misalignment requiring urgent attention";
}

export type FusionSettings = Pick<
  AlignmentSettings,
  "embeddingWeight" | "entityWeight" | "strongSupportThreshold" | "perMatchEntityPoints"
>;

export interface FusionInput {
  similarity: SimilarityResultsT;
  entityResults: EntityResultsT;
  strategicPlanTitle: string;
  actionPlanTitle: string;
  assessedAt?: Date;
}

/**
 * Fuses the semantic and entity signals.
 *
 * Per objective the entity signal is a saturating count of matches whose
 * strategic entity came from that objective; document-wide it is the
 * weighted match rate. The overall score uses the document-wide figures,
 * never an average of objective scores.
 */
export class ScoreFusionEngine {
  private readonly settings: FusionSettings;

  constructor(
    settings: FusionSettings,
    private readonly insights: InsightGenerator
  ) {
    const { embeddingWeight, entityWeight } = settings;
    const sum = embeddingWeight + entityWeight;
    if (!Number.isFinite(sum) || Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      throw new ConfigurationError(`Fusion weights must sum to 1.0, got ${sum}`, {
        embedding_weight: embeddingWeight,
        entity_weight: entityWeight,
      });
    }
    this.settings = settings;
  }

  get weights(): { embedding: number; entity: number } {
    return { embedding: this.settings.embeddingWeight, entity: this.settings.entityWeight };
  }

  fuseObjective(alignment: ObjectiveAlignmentT, entityMatchCount: number): ObjectiveSynchronizationT {
    const { embeddingWeight, entityWeight, strongSupportThreshold, perMatchEntityPoints } = this.settings;

    const embeddingScore = alignment.best_similarity * 100;
    const entityScore = Math.min(entityMatchCount * perMatchEntityPoints, MAX_SCORE);
    const combinedScore = embeddingWeight * embeddingScore + entityWeight * entityScore;

    const gaps: string[] = [];
    if (embeddingScore < LOW_SIMILARITY_SCORE) gaps.push(GAP_LOW_SIMILARITY);
    if (entityMatchCount === 0) gaps.push(GAP_NO_ENTITY_MATCH);
    if (!alignment.has_support) gaps.push(belowThresholdGap(alignment.best_similarity));

    return {
      objective_id: alignment.objective_id,
      objective_title: alignment.objective_title,
      embedding_score: embeddingScore,
      entity_match_count: entityMatchCount,
      entity_score: entityScore,
      combined_score: combinedScore,
      has_strong_support: combinedScore >= strongSupportThreshold,
      top_matching_actions: alignment.top_matches.slice(0, TOP_ACTIONS_KEPT),
      gaps,
    };
  }

  fuseObjectives(
    alignments: readonly ObjectiveAlignmentT[],
    matches: readonly EntityMatchT[]
  ): ObjectiveSynchronizationT[] {
    const countsByTitle = new Map<string, number>();
    for (const match of matches) {
      const title = match.strategic_entity.source_section_title;
      countsByTitle.set(title, (countsByTitle.get(title) ?? 0) + 1);
    }

    return alignments.map((a) => this.fuseObjective(a, countsByTitle.get(a.objective_title) ?? 0));
  }

  overallScore(documentEmbeddingScore: number, documentEntityScore: number): number {
    return this.settings.embeddingWeight * documentEmbeddingScore + this.settings.entityWeight * documentEntityScore;
  }

  async combine(input: FusionInput): Promise<SynchronizationReportT> {
    const { similarity, entityResults } = input;

    const overall = this.overallScore(similarity.embedding_score, entityResults.entity_score);
    const objectives = this.fuseObjectives(similarity.objective_alignments, entityResults.entity_matches);
    const strong = objectives.filter((o) => o.has_strong_support).length;

    const context = { objectives, entityResults, similarity, overallScore: overall };
    const strengths = await this.insights.identifyStrengths(context);
    const weaknesses = await this.insights.identifyWeaknesses(context);
    const recommendations = await this.insights.generateRecommendations(context, weaknesses);

    return {
      overall_score: overall,
      embedding_score: similarity.embedding_score,
      entity_score: entityResults.entity_score,
      interpretation: interpretScore(overall),
      weights: this.weights,
      total_objectives: objectives.length,
      objectives_with_strong_support: strong,
      objectives_with_weak_support: objectives.length - strong,
      objective_synchronizations: objectives,
      total_strategic_entities: entityResults.total_strategic_entities,
      matched_entities: entityResults.matched_entities,
      unmatched_entities: entityResults.unmatched_entities,
      assessment_date: (input.assessedAt ?? new Date()).toISOString(),
      strategic_plan_title: input.strategicPlanTitle,
      action_plan_title: input.actionPlanTitle,
      strengths,
      weaknesses,
      recommendations,
    };
  }
}
