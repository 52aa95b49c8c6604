import type { ObjectiveAlignmentT, RankedMatchT, SimilarityResultsT } from "../schemas/analysis.js";
import type { VectorMatch } from "../adapters/vector/types.js";
import type { AlignmentSettings } from "./settings.js";

/**
 * Raw ranked hits for one strategic objective, in service order.
 */
export interface ObjectiveQueryResult {
  objective_id: string;
  objective_title: string;
  matches: VectorMatch[];
}

function toRankedMatch(match: VectorMatch, index: number): RankedMatchT {
  const { id, title } = match.metadata;
  return {
    action_id: typeof id === "string" ? id : match.id,
    action_title: typeof title === "string" ? title : "",
    similarity_score: match.score,
    rank: index + 1,
  };
}

/**
 * Derives per-objective support from externally ranked similarity hits.
 * Ranking is never altered here.
 */
export class SimilarityAggregator {
  private readonly threshold: number;

  constructor(settings: Pick<AlignmentSettings, "similarityThreshold">) {
    this.threshold = settings.similarityThreshold;
  }

  align(result: ObjectiveQueryResult): ObjectiveAlignmentT {
    const topMatches = result.matches.map(toRankedMatch);
    const best = topMatches[0]?.similarity_score ?? 0;
    return {
      objective_id: result.objective_id,
      objective_title: result.objective_title,
      best_similarity: best,
      top_matches: topMatches,
      has_support: best >= this.threshold,
    };
  }

  aggregate(results: readonly ObjectiveQueryResult[]): SimilarityResultsT {
    const alignments = results.map((r) => this.align(r));
    const supported = alignments.filter((a) => a.has_support).length;
    const average =
      alignments.length > 0
        ? alignments.reduce((sum, a) => sum + a.best_similarity, 0) / alignments.length
        : 0;

    return {
      embedding_score: average * 100,
      average_similarity: average,
      objectives_with_support: supported,
      objectives_without_support: alignments.length - supported,
      threshold: this.threshold,
      objective_alignments: alignments,
    };
  }
}
