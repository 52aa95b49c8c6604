import { z } from "zod";
import type { LLMAdapter, CallOpts, LlmTask } from "../adapters/llm/types.js";
import type {
  ActionProposalT,
  CriticalFindingT,
  EntityResultsT,
  ObjectiveSynchronizationT,
  ProposalPriorityT,
  SynchronizationReportT,
} from "../schemas/analysis.js";
import type { PlanDocumentT } from "../schemas/plan.js";
import {
  ENTITY_TRACKING_SYSTEM_PROMPT,
  PROPOSAL_SYSTEM_PROMPT,
  buildEntityTrackingProposalPrompt,
  buildFindingProposalPrompt,
  buildObjectiveProposalPrompt,
} from "../prompts/alignment.js";
import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import { MalformedResponseError, describeError } from "./errors.js";
import { completeJson } from "./llm-json.js";
import { ENTITY_TRACKING_OBJECTIVE_ID } from "./settings.js";
import type { AlignmentSettings } from "./settings.js";
import { weakestFirst } from "./insights/types.js";

export const ENTITY_TRACKING_TITLE = "Enterprise-wide KPI Tracking";

/** Entity-tracking proposals are only requested while fewer than this many exist */
const ENTITY_TRACKING_PROPOSAL_CAP = 3;

/**
 * Parse "$250,000", "250000", "1.5e5" and the like; anything else is 0.
 */
export function coerceBudget(value: unknown): number {
  let amount = Number.NaN;
  if (typeof value === "number") {
    amount = value;
  } else if (typeof value === "string") {
    const cleaned = value.replace(/[^0-9.eE-]/g, "");
    amount = cleaned.length > 0 ? Number(cleaned) : Number.NaN;
  }
  return Number.isFinite(amount) && amount > 0 ? amount : 0;
}

const text = z.preprocess((v) => (typeof v === "string" ? v.trim() : ""), z.string());

const ProposalItem = z.object({
  action_title: z.string().trim().min(1),
  description: z.string().trim().min(1),
  budget_estimate: z.unknown().transform(coerceBudget),
  timeline: z.preprocess((v) => (typeof v === "string" && v.trim() ? v.trim() : "TBD"), z.string()),
  expected_kpis: z.preprocess((v) => {
    if (typeof v === "string") return v.trim() ? [v.trim()] : [];
    if (Array.isArray(v)) return v.filter((k): k is string => typeof k === "string" && k.trim().length > 0);
    return [];
  }, z.array(z.string())),
  rationale: text,
  expected_impact: text,
});

const ProposalEnvelope = z.object({ proposals: z.array(z.unknown()) });

type ProposalItemT = z.infer<typeof ProposalItem>;

interface ProposalTarget {
  objectiveId: string;
  objectiveTitle: string;
  priority: ProposalPriorityT;
  idPrefix: string;
}

export interface ProposalContext {
  report: SynchronizationReportT;
  findings: readonly CriticalFindingT[];
  entityResults: EntityResultsT;
  strategicPlan: PlanDocumentT;
}

export type ProposalSettings = Pick<
  AlignmentSettings,
  "weakObjectiveThreshold" | "maxObjectivesForProposals" | "entityProposalThreshold"
>;

export function objectivePriority(combinedScore: number): ProposalPriorityT {
  if (combinedScore < 50) return "high";
  if (combinedScore < 65) return "medium";
  return "low";
}

export function findingPriority(finding: CriticalFindingT): ProposalPriorityT {
  if (finding.severity === "critical") return "high";
  if (finding.severity === "high") return "medium";
  return "low";
}

/**
 * Validate and coerce one completion into proposals. Items without a title
 * or description are dropped.
 *
 * @throws MalformedResponseError when the envelope is not `{ proposals: [...] }`
 */
export function parseProposals(raw: unknown, target: ProposalTarget, task: LlmTask): ActionProposalT[] {
  const envelope = ProposalEnvelope.safeParse(raw);
  if (!envelope.success) {
    throw new MalformedResponseError(`LLM ${task} response has no proposals array`, task);
  }

  const items: ProposalItemT[] = [];
  for (const entry of envelope.data.proposals) {
    const parsed = ProposalItem.safeParse(entry);
    if (parsed.success) items.push(parsed.data);
  }

  const dropped = envelope.data.proposals.length - items.length;
  if (dropped > 0) {
    log.warn({ task, dropped, kept: items.length }, "Dropped proposals missing title or description");
  }

  return items.map((item, i): ActionProposalT => ({
    id: `${target.idPrefix}_${i}`,
    priority: target.priority,
    objective_id: target.objectiveId,
    objective_title: target.objectiveTitle,
    ...item,
    status: "pending",
  }));
}

/**
 * Asks the LLM for improvement proposals, in three passes: weakest
 * objectives, then critical/high findings when the first pass produced
 * nothing, then enterprise KPI tracking while the entity score is low.
 *
 * A failed or malformed completion yields zero proposals for that request
 * only.
 */
export class ProposalGenerator {
  constructor(
    private readonly adapter: LLMAdapter,
    private readonly settings: ProposalSettings,
    private readonly temperature: number
  ) {}

  async generate(ctx: ProposalContext, opts?: CallOpts): Promise<ActionProposalT[]> {
    const proposals: ActionProposalT[] = [];

    const weak = weakestFirst(
      ctx.report.objective_synchronizations.filter((o) => o.combined_score < this.settings.weakObjectiveThreshold)
    ).slice(0, this.settings.maxObjectivesForProposals);

    for (const objective of weak) {
      proposals.push(...(await this.forObjective(objective, ctx.strategicPlan, opts)));
    }

    if (proposals.length === 0 && ctx.findings.length > 0) {
      for (const finding of ctx.findings) {
        if (finding.severity !== "critical" && finding.severity !== "high") continue;
        proposals.push(...(await this.forFinding(finding, ctx, opts)));
      }
    }

    if (
      ctx.entityResults.entity_score < this.settings.entityProposalThreshold &&
      proposals.length < ENTITY_TRACKING_PROPOSAL_CAP
    ) {
      proposals.push(...(await this.forEntityTracking(ctx, opts)));
    }

    emit(TelemetryEvents.ProposalsGenerated, {
      count: proposals.length,
      weak_objectives: weak.length,
      provider: this.adapter.name,
    });

    return proposals;
  }

  private forObjective(
    objective: ObjectiveSynchronizationT,
    strategicPlan: PlanDocumentT,
    opts?: CallOpts
  ): Promise<ActionProposalT[]> {
    const section = strategicPlan.sections.find((s) => s.title === objective.objective_title);
    return this.request(
      "proposals_objective",
      PROPOSAL_SYSTEM_PROMPT,
      buildObjectiveProposalPrompt(objective, section),
      {
        objectiveId: objective.objective_id,
        objectiveTitle: objective.objective_title,
        priority: objectivePriority(objective.combined_score),
        idPrefix: `proposal_${objective.objective_id}`,
      },
      opts
    );
  }

  private forFinding(finding: CriticalFindingT, ctx: ProposalContext, opts?: CallOpts): Promise<ActionProposalT[]> {
    return this.request(
      "proposals_finding",
      PROPOSAL_SYSTEM_PROMPT,
      buildFindingProposalPrompt(finding, {
        overallScore: ctx.report.overall_score,
        entityScore: ctx.entityResults.entity_score,
        unmatchedEntities: ctx.entityResults.unmatched_entities,
      }),
      {
        objectiveId: `finding_${finding.id}`,
        objectiveTitle: finding.affected_objective,
        priority: findingPriority(finding),
        idPrefix: `proposal_finding_${finding.id}`,
      },
      opts
    );
  }

  private forEntityTracking(ctx: ProposalContext, opts?: CallOpts): Promise<ActionProposalT[]> {
    return this.request(
      "proposals_entity_tracking",
      ENTITY_TRACKING_SYSTEM_PROMPT,
      buildEntityTrackingProposalPrompt(ctx.entityResults, ctx.report.overall_score),
      {
        objectiveId: ENTITY_TRACKING_OBJECTIVE_ID,
        objectiveTitle: ENTITY_TRACKING_TITLE,
        priority: "medium",
        idPrefix: `proposal_${ENTITY_TRACKING_OBJECTIVE_ID}`,
      },
      opts
    );
  }

  private async request(
    task: LlmTask,
    system: string,
    prompt: string,
    target: ProposalTarget,
    opts?: CallOpts
  ): Promise<ActionProposalT[]> {
    try {
      const raw = await completeJson(this.adapter, { task, system, prompt, temperature: this.temperature }, opts);
      return parseProposals(raw, target, task);
    } catch (error) {
      log.warn(
        { task, objective_id: target.objectiveId, error: describeError(error) },
        "Proposal request failed; continuing without proposals for this target"
      );
      emit(TelemetryEvents.ProposalRequestFailed, {
        task,
        objective_id: target.objectiveId,
        error: error instanceof Error ? error.name : "unknown",
      });
      return [];
    }
  }
}
