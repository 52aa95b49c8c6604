import type { Config } from "./index.js";
import type { AlignmentSettings } from "../alignment/settings.js";

/**
 * Build the explicit settings struct from validated configuration.
 */
export function buildAlignmentSettings(cfg: Pick<Config, "alignment">): AlignmentSettings {
  const a = cfg.alignment;
  return {
    embeddingWeight: a.embeddingWeight,
    entityWeight: a.entityWeight,
    strongSupportThreshold: a.strongSupportThreshold,
    similarityThreshold: a.similarityThreshold,
    fuzzyThreshold: a.fuzzyThreshold,
    topK: a.topK,
    perMatchEntityPoints: a.perMatchEntityPoints,
    baseImprovement: a.baseImprovement,
    diminishingFactor: a.diminishingFactor,
    entityTrackingImprovement: a.entityTrackingImprovement,
    weakObjectiveThreshold: a.weakObjectiveThreshold,
    maxObjectivesForProposals: a.maxObjectivesForProposals,
    entityProposalThreshold: a.entityProposalThreshold,
  };
}
