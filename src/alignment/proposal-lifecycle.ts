import type { ActionProposalT, AnalysisRecordT, ImpactSimulationT, ProposalStatusT } from "../schemas/analysis.js";
import type { PlanDocumentT, PlanSectionT } from "../schemas/plan.js";
import type { AnalysisStore } from "../store/interface.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { buildAgentSummary } from "./agent-summary.js";
import { NotFoundError, ProposalStateError } from "./errors.js";
import type { ImpactSimulator } from "./impact-simulator.js";

export interface AcceptanceResult {
  proposal: ActionProposalT;
  section: PlanSectionT;
  /** Action plan total budget after acceptance, null when the plan does not track one */
  total_budget: number | null;
  impact_simulation: ImpactSimulationT;
}

export interface RejectionResult {
  proposal: ActionProposalT;
  impact_simulation: ImpactSimulationT;
}

/**
 * Turn an accepted proposal into an action-plan section.
 */
export function proposalToSection(proposal: ActionProposalT, existingSections: number): PlanSectionT {
  return {
    id: `action_agent_${existingSections + 1}`,
    type: "action_item",
    title: proposal.action_title,
    content: proposal.description,
    kpis: proposal.expected_kpis.map((metric) => ({ metric, target: null, unit: "", deadline: null })),
    budget: proposal.budget_estimate,
    timeline: proposal.timeline,
    goals: [],
    initiatives: [],
    priority: proposal.priority,
  };
}

/**
 * pending -> accepted | rejected. Both target states are terminal.
 *
 * Acceptance writes the new section into the stored action plan; it never
 * recomputes alignment scores. A fresh analysis run is needed for that.
 */
export class ProposalLifecycleManager {
  constructor(
    private readonly store: AnalysisStore,
    private readonly simulator: ImpactSimulator
  ) {}

  async list(status?: ProposalStatusT): Promise<ActionProposalT[]> {
    const record = await this.requireResults();
    return status ? record.proposals.filter((p) => p.status === status) : record.proposals;
  }

  async simulation(): Promise<ImpactSimulationT> {
    const record = await this.requireResults();
    return record.impact_simulation;
  }

  async accept(proposalId: string): Promise<AcceptanceResult> {
    const record = await this.requireResults();
    const proposal = this.requirePending(record, proposalId);

    const actionPlan = await this.store.loadActionPlan();
    if (!actionPlan) {
      throw new NotFoundError("Action plan not found", "action_plan");
    }

    const section = proposalToSection(proposal, actionPlan.sections.length);
    const nextPlan: PlanDocumentT = {
      ...actionPlan,
      sections: [...actionPlan.sections, section],
    };
    // A zero total means no budget was found in the plan, same as null
    if (typeof actionPlan.total_budget === "number" && actionPlan.total_budget !== 0) {
      nextPlan.total_budget = actionPlan.total_budget + proposal.budget_estimate;
    }

    const accepted: ActionProposalT = { ...proposal, status: "accepted" };
    const nextRecord = this.withProposal(record, accepted);

    await this.store.commitAcceptance(nextPlan, nextRecord);

    emit(TelemetryEvents.ProposalAccepted, {
      proposal_id: proposalId,
      objective_id: proposal.objective_id,
      section_id: section.id,
      budget_estimate: proposal.budget_estimate,
    });

    return {
      proposal: accepted,
      section,
      total_budget: typeof nextPlan.total_budget === "number" ? nextPlan.total_budget : null,
      impact_simulation: nextRecord.impact_simulation,
    };
  }

  async reject(proposalId: string): Promise<RejectionResult> {
    const record = await this.requireResults();
    const proposal = this.requirePending(record, proposalId);

    const rejected: ActionProposalT = { ...proposal, status: "rejected" };
    const nextRecord = this.withProposal(record, rejected);
    await this.store.saveResults(nextRecord);

    emit(TelemetryEvents.ProposalRejected, {
      proposal_id: proposalId,
      objective_id: proposal.objective_id,
    });

    return { proposal: rejected, impact_simulation: nextRecord.impact_simulation };
  }

  private async requireResults(): Promise<AnalysisRecordT> {
    const record = await this.store.loadResults();
    if (!record) {
      throw new NotFoundError("No analysis results found; run an analysis first", "analysis_results");
    }
    return record;
  }

  private requirePending(record: AnalysisRecordT, proposalId: string): ActionProposalT {
    const proposal = record.proposals.find((p) => p.id === proposalId);
    if (!proposal) {
      throw new NotFoundError(`Proposal ${proposalId} not found`, "proposal", proposalId);
    }
    if (proposal.status !== "pending") {
      throw new ProposalStateError(
        `Proposal ${proposalId} is already ${proposal.status}`,
        proposalId,
        proposal.status
      );
    }
    return proposal;
  }

  /**
   * Replace one proposal and re-derive the simulation and summary from it.
   */
  private withProposal(record: AnalysisRecordT, updated: ActionProposalT): AnalysisRecordT {
    const proposals = record.proposals.map((p) => (p.id === updated.id ? updated : p));
    const impactSimulation = this.simulator.simulate({
      proposals,
      objectives: record.report.objective_synchronizations,
      currentScore: record.report.overall_score,
      entityScore: record.report.entity_score,
    });

    return {
      ...record,
      proposals,
      impact_simulation: impactSimulation,
      agent_summary: buildAgentSummary(record.critical_findings, proposals, impactSimulation),
    };
  }
}
