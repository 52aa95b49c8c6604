import type {
  ActionProposalT,
  AffectedObjectiveT,
  ImpactSimulationT,
  ObjectiveSynchronizationT,
} from "../schemas/analysis.js";
import { ENTITY_TRACKING_OBJECTIVE_ID } from "./settings.js";
import type { AlignmentSettings } from "./settings.js";

export const ENTITY_TRACKING_ROW_TITLE = "Entity Tracking & KPI Coverage";

const MAX_SCORE = 100;

export type SimulatorSettings = Pick<
  AlignmentSettings,
  "baseImprovement" | "diminishingFactor" | "entityTrackingImprovement" | "entityWeight"
>;

export interface SimulationInput {
  proposals: readonly ActionProposalT[];
  objectives: readonly ObjectiveSynchronizationT[];
  /** Current document-level overall score */
  currentScore: number;
  /** Current document-level (weighted) entity score */
  entityScore: number;
}

/**
 * True for proposals that improve document-wide entity coverage rather than
 * a single objective: the sentinel id, or any id mentioning an entity or a
 * finding.
 */
export function isEntityTrackingProposal(objectiveId: string): boolean {
  if (objectiveId === ENTITY_TRACKING_OBJECTIVE_ID) return true;
  const lower = objectiveId.toLowerCase();
  return lower.includes("entity") || lower.includes("finding");
}

/**
 * Heuristic projection of the overall score if proposals were adopted.
 * This is not the authoritative fused score.
 */
export class ImpactSimulator {
  constructor(private readonly settings: SimulatorSettings) {}

  /**
   * Uplift of the n-th (0-based) proposal on the same objective.
   */
  contribution(n: number): number {
    return this.settings.baseImprovement * Math.pow(this.settings.diminishingFactor, n);
  }

  simulate(input: SimulationInput): ImpactSimulationT {
    const improvements = new Map<string, number>();
    const counts = new Map<string, number>();
    let entityImprovement = 0;

    for (const proposal of input.proposals) {
      if (proposal.status === "rejected") continue;

      if (isEntityTrackingProposal(proposal.objective_id)) {
        entityImprovement += this.settings.entityTrackingImprovement;
        continue;
      }

      const n = counts.get(proposal.objective_id) ?? 0;
      improvements.set(proposal.objective_id, (improvements.get(proposal.objective_id) ?? 0) + this.contribution(n));
      counts.set(proposal.objective_id, n + 1);
    }

    const affected: AffectedObjectiveT[] = [];
    let totalDelta = 0;

    for (const obj of input.objectives) {
      const improvement = improvements.get(obj.objective_id);
      if (improvement === undefined) continue;

      const projected = Math.min(obj.combined_score + improvement, MAX_SCORE);
      affected.push({
        objective_title: obj.objective_title,
        current_score: obj.combined_score,
        projected_score: projected,
        improvement: projected - obj.combined_score,
      });
      totalDelta += projected - obj.combined_score;
    }

    if (entityImprovement > 0) {
      const projected = Math.min(input.entityScore + entityImprovement, MAX_SCORE);
      affected.push({
        objective_title: ENTITY_TRACKING_ROW_TITLE,
        current_score: input.entityScore,
        projected_score: projected,
        improvement: projected - input.entityScore,
      });
      totalDelta += (projected - input.entityScore) * this.settings.entityWeight;
    }

    let projectedScore = input.currentScore;
    if (affected.length > 0) {
      if (improvements.size > 0) {
        const objectiveCount = input.objectives.length;
        const averageDelta = objectiveCount > 0 ? totalDelta / objectiveCount : totalDelta;
        projectedScore = Math.min(input.currentScore + averageDelta, MAX_SCORE);
      } else {
        projectedScore = Math.min(input.currentScore + entityImprovement * this.settings.entityWeight, MAX_SCORE);
      }
    }

    return {
      current_score: input.currentScore,
      projected_score: projectedScore,
      improvement: projectedScore - input.currentScore,
      affected_objectives: affected,
    };
  }
}
