import { partial_ratio, token_sort_ratio } from "fuzzball";
import type { MatchTypeT } from "../schemas/analysis.js";

export interface TextSimilarity {
  /** 0-100 */
  score: number;
  matchType: MatchTypeT;
}

/** Scores at or above this are classified exact even when strings differ */
export const EXACT_SCORE = 95;
/** Scores at or above this (and below the fuzzy threshold) are partial */
export const PARTIAL_SCORE = 60;

export function normalizeEntityText(text: string): string {
  return text.toLowerCase().trim();
}

/**
 * Score two entity strings on a 0-100 scale.
 *
 * Normalized-equal strings are forced to (100, exact). Otherwise the higher
 * of a token-order-invariant ratio and a best-substring ratio is classified
 * against the thresholds.
 */
export function compareEntityText(a: string, b: string, fuzzyThreshold: number): TextSimilarity {
  const left = normalizeEntityText(a);
  const right = normalizeEntityText(b);

  if (left === right) {
    return { score: 100, matchType: "exact" };
  }

  const score = Math.max(token_sort_ratio(left, right), partial_ratio(left, right));

  let matchType: MatchTypeT;
  if (score >= EXACT_SCORE) {
    matchType = "exact";
  } else if (score >= fuzzyThreshold) {
    matchType = "fuzzy";
  } else if (score >= PARTIAL_SCORE) {
    matchType = "partial";
  } else {
    matchType = "no_match";
  }

  return { score, matchType };
}
