import type {
  EntityResultsT,
  ObjectiveSynchronizationT,
  RecommendationT,
  SimilarityResultsT,
} from "../../schemas/analysis.js";

/**
 * Everything an insight generator may look at. Scores are final; generators
 * only describe them.
 */
export interface InsightContext {
  objectives: readonly ObjectiveSynchronizationT[];
  entityResults: EntityResultsT;
  similarity: SimilarityResultsT;
  overallScore: number;
}

/**
 * Prose layer of the fusion report. Either deterministic rules or an LLM.
 */
export interface InsightGenerator {
  readonly name: string;
  identifyStrengths(context: InsightContext): Promise<string[]>;
  identifyWeaknesses(context: InsightContext): Promise<string[]>;
  generateRecommendations(context: InsightContext, weaknesses: readonly string[]): Promise<RecommendationT[]>;
}

export function weakestFirst(objectives: readonly ObjectiveSynchronizationT[]): ObjectiveSynchronizationT[] {
  return [...objectives].sort((a, b) => a.combined_score - b.combined_score);
}

export function strongestFirst(objectives: readonly ObjectiveSynchronizationT[]): ObjectiveSynchronizationT[] {
  return [...objectives].sort((a, b) => b.combined_score - a.combined_score);
}
