/**
 * Policy constants for every alignment component.
 *
 * Components take this struct at construction and never read the
 * environment themselves; see buildAlignmentSettings() for the
 * config-driven instance.
 */
export interface AlignmentSettings {
  /** Weight of the semantic signal in fused scores */
  embeddingWeight: number;
  /** Weight of the entity signal in fused scores */
  entityWeight: number;
  /** Combined score at or above which an objective counts as strongly supported */
  strongSupportThreshold: number;
  /** Raw best-similarity (0-1) at or above which an objective has support */
  similarityThreshold: number;
  /** Minimum text-similarity (0-100) for an entity match to be kept */
  fuzzyThreshold: number;
  /** Vector-index results requested per objective */
  topK: number;
  /** Per-objective entity points per matched entity (saturates at 100) */
  perMatchEntityPoints: number;
  /** Score uplift of the first proposal on an objective */
  baseImprovement: number;
  /** Multiplier applied to each further proposal on the same objective */
  diminishingFactor: number;
  /** Document entity-score uplift per entity-tracking proposal */
  entityTrackingImprovement: number;
  /** Objectives below this combined score get proposals */
  weakObjectiveThreshold: number;
  maxObjectivesForProposals: number;
  /** Document entity score below which an entity-tracking proposal is requested */
  entityProposalThreshold: number;
}

export const DEFAULT_ALIGNMENT_SETTINGS: Readonly<AlignmentSettings> = Object.freeze({
  embeddingWeight: 0.6,
  entityWeight: 0.4,
  strongSupportThreshold: 75,
  similarityThreshold: 0.7,
  fuzzyThreshold: 85,
  topK: 5,
  perMatchEntityPoints: 20,
  baseImprovement: 12,
  diminishingFactor: 0.7,
  entityTrackingImprovement: 8,
  weakObjectiveThreshold: 75,
  maxObjectivesForProposals: 3,
  entityProposalThreshold: 60,
});

/**
 * Sentinel objective id carried by enterprise-wide entity-tracking proposals.
 */
export const ENTITY_TRACKING_OBJECTIVE_ID = "entity_tracking";

/**
 * Tolerance on embeddingWeight + entityWeight = 1.
 */
export const WEIGHT_SUM_TOLERANCE = 0.01;
