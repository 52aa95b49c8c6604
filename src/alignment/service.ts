import { getEmbeddingProvider } from "../adapters/embeddings/router.js";
import type { EmbeddingProvider } from "../adapters/embeddings/types.js";
import { getAdapter } from "../adapters/llm/router.js";
import type { CallOpts, LLMAdapter } from "../adapters/llm/types.js";
import { InMemoryVectorIndex } from "../adapters/vector/memory.js";
import type { VectorIndex } from "../adapters/vector/types.js";
import { buildAlignmentSettings } from "../config/alignment.js";
import { config } from "../config/index.js";
import { DocumentQA } from "../qa/document-qa.js";
import type { Answer } from "../qa/document-qa.js";
import type { ActionProposalT, AnalysisRecordT, ImpactSimulationT, ProposalStatusT } from "../schemas/analysis.js";
import type { PlanDocumentT } from "../schemas/plan.js";
import { FileAnalysisStore } from "../store/file.js";
import type { AnalysisStore } from "../store/interface.js";
import { log } from "../utils/telemetry.js";
import { StructuredEntityExtractor } from "./entity-extractor.js";
import type { EntityExtractor } from "./entity-extractor.js";
import { NotFoundError, describeError } from "./errors.js";
import { createInsightGenerator } from "./insights/index.js";
import type { InsightGenerator } from "./insights/types.js";
import { AlignmentPipeline } from "./pipeline.js";
import { ProposalLifecycleManager } from "./proposal-lifecycle.js";
import type { AcceptanceResult, RejectionResult } from "./proposal-lifecycle.js";
import type { AlignmentSettings } from "./settings.js";

const QA_TOP_K = 5;

export interface AnalysisInput {
  strategic_plan?: PlanDocumentT;
  action_plan?: PlanDocumentT;
}

export interface AlignmentServiceDeps {
  settings: AlignmentSettings;
  store: AnalysisStore;
  embedder: EmbeddingProvider;
  index: VectorIndex;
  llm: LLMAdapter;
  insights: InsightGenerator;
  extractor?: EntityExtractor;
  proposalTemperature?: number;
  qaTemperature?: number;
  now?: () => Date;
}

/**
 * Entry point for the HTTP layer. Analysis runs and proposal transitions
 * are applied one at a time, in arrival order.
 */
export class AlignmentService {
  readonly pipeline: AlignmentPipeline;
  readonly lifecycle: ProposalLifecycleManager;
  readonly qa: DocumentQA;
  private readonly store: AnalysisStore;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(deps: AlignmentServiceDeps) {
    this.store = deps.store;
    this.pipeline = new AlignmentPipeline({
      settings: deps.settings,
      extractor: deps.extractor ?? new StructuredEntityExtractor(),
      embedder: deps.embedder,
      index: deps.index,
      llm: deps.llm,
      insights: deps.insights,
      proposalTemperature: deps.proposalTemperature ?? 0.4,
      now: deps.now,
    });
    this.lifecycle = new ProposalLifecycleManager(deps.store, this.pipeline.simulator);
    this.qa = new DocumentQA(deps.embedder, deps.index, deps.llm, {
      topK: QA_TOP_K,
      temperature: deps.qaTemperature ?? 0.3,
    });
  }

  runAnalysis(input: AnalysisInput = {}, opts: CallOpts = {}): Promise<AnalysisRecordT> {
    return this.serialize(async () => {
      if (input.strategic_plan) await this.store.saveStrategicPlan(input.strategic_plan);
      if (input.action_plan) await this.store.saveActionPlan(input.action_plan);

      const strategicPlan = await this.store.loadStrategicPlan();
      if (!strategicPlan) throw new NotFoundError("Strategic plan not found", "strategic_plan");
      const actionPlan = await this.store.loadActionPlan();
      if (!actionPlan) throw new NotFoundError("Action plan not found", "action_plan");

      const record = await this.pipeline.run(strategicPlan, actionPlan, opts);
      await this.store.saveResults(record);
      await this.rebuildQaIndex(strategicPlan, actionPlan, record, opts);

      return record;
    });
  }

  async getResults(): Promise<AnalysisRecordT> {
    const record = await this.store.loadResults();
    if (!record) {
      throw new NotFoundError("No analysis results found; run an analysis first", "analysis_results");
    }
    return record;
  }

  listProposals(status?: ProposalStatusT): Promise<ActionProposalT[]> {
    return this.lifecycle.list(status);
  }

  simulation(): Promise<ImpactSimulationT> {
    return this.lifecycle.simulation();
  }

  acceptProposal(proposalId: string, opts: CallOpts = {}): Promise<AcceptanceResult> {
    return this.serialize(async () => {
      const result = await this.lifecycle.accept(proposalId);
      await this.refreshQaIndex(opts);
      return result;
    });
  }

  rejectProposal(proposalId: string, opts: CallOpts = {}): Promise<RejectionResult> {
    return this.serialize(async () => {
      const result = await this.lifecycle.reject(proposalId);
      await this.refreshQaIndex(opts);
      return result;
    });
  }

  /**
   * The Q&A index is process-local; after a restart it is rebuilt from the
   * stored plans and results on the first question.
   */
  async ask(question: string, opts: CallOpts = {}): Promise<Answer> {
    if (!this.qa.indexed) {
      await this.serialize(async () => {
        if (!this.qa.indexed) await this.refreshQaIndex(opts);
      });
    }
    return this.qa.ask(question, opts);
  }

  private async refreshQaIndex(opts: CallOpts): Promise<void> {
    const [strategicPlan, actionPlan, record] = await Promise.all([
      this.store.loadStrategicPlan(),
      this.store.loadActionPlan(),
      this.store.loadResults(),
    ]);
    if (!strategicPlan || !actionPlan || !record) return;
    await this.rebuildQaIndex(strategicPlan, actionPlan, record, opts);
  }

  private async rebuildQaIndex(
    strategicPlan: PlanDocumentT,
    actionPlan: PlanDocumentT,
    record: AnalysisRecordT,
    opts: CallOpts
  ): Promise<void> {
    try {
      await this.qa.rebuild(strategicPlan, actionPlan, record);
    } catch (error) {
      log.warn({ request_id: opts.requestId, error: describeError(error) }, "Q&A index rebuild failed; answers may be stale");
    }
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    // Failures reach the caller through `run`; the queue itself keeps going
    this.tail = run.catch(() => undefined);
    return run;
  }
}

/**
 * Service wired from validated configuration.
 */
export function createAlignmentService(overrides: Partial<AlignmentServiceDeps> = {}): AlignmentService {
  const llm = overrides.llm ?? getAdapter();
  return new AlignmentService({
    settings: overrides.settings ?? buildAlignmentSettings(config),
    store:
      overrides.store ??
      new FileAnalysisStore({ dataDir: config.storage.dataDir, backupEnabled: config.storage.backupEnabled }),
    embedder: overrides.embedder ?? getEmbeddingProvider(),
    index: overrides.index ?? new InMemoryVectorIndex(),
    llm,
    insights: overrides.insights ?? createInsightGenerator(config.alignment.insights, llm, config.llm.insightTemperature),
    extractor: overrides.extractor,
    proposalTemperature: overrides.proposalTemperature ?? config.llm.proposalTemperature,
    qaTemperature: overrides.qaTemperature ?? config.llm.insightTemperature,
    now: overrides.now,
  });
}
