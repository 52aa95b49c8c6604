import type { EmbeddingProvider } from "../adapters/embeddings/types.js";
import type { CallOpts, LLMAdapter } from "../adapters/llm/types.js";
import type { VectorIndex } from "../adapters/vector/types.js";
import { ANALYSIS_RECORD_SCHEMA } from "../schemas/analysis.js";
import type { AnalysisRecordT } from "../schemas/analysis.js";
import type { PlanDocumentT } from "../schemas/plan.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { buildAgentSummary } from "./agent-summary.js";
import { EmbeddingAnalyzer } from "./embedding-analyzer.js";
import type { EntityExtractor } from "./entity-extractor.js";
import { countEntities } from "./entity-extractor.js";
import { EntityMatcher } from "./entity-matcher.js";
import { describeError } from "./errors.js";
import { FindingsDetector } from "./findings-detector.js";
import { ScoreFusionEngine } from "./fusion-engine.js";
import { ImpactSimulator } from "./impact-simulator.js";
import type { InsightGenerator } from "./insights/types.js";
import { ProposalGenerator } from "./proposal-generator.js";
import type { AlignmentSettings } from "./settings.js";
import { SimilarityAggregator } from "./similarity-aggregator.js";

export interface PipelineDeps {
  settings: AlignmentSettings;
  extractor: EntityExtractor;
  embedder: EmbeddingProvider;
  index: VectorIndex;
  llm: LLMAdapter;
  insights: InsightGenerator;
  proposalTemperature: number;
  /** Clock for assessment_date */
  now?: () => Date;
}

/**
 * One full alignment run, stage by stage:
 * extraction -> entity matching -> similarity -> fusion -> findings ->
 * proposals -> simulation.
 *
 * Stateless between runs apart from the vector index it reindexes.
 */
export class AlignmentPipeline {
  readonly matcher: EntityMatcher;
  readonly aggregator: SimilarityAggregator;
  readonly fusion: ScoreFusionEngine;
  readonly detector: FindingsDetector;
  readonly simulator: ImpactSimulator;
  private readonly embeddings: EmbeddingAnalyzer;
  private readonly proposals: ProposalGenerator;

  constructor(private readonly deps: PipelineDeps) {
    const { settings } = deps;
    // Constructed first so a bad weight pair fails before anything else is built
    this.fusion = new ScoreFusionEngine(settings, deps.insights);
    this.matcher = new EntityMatcher(settings);
    this.aggregator = new SimilarityAggregator(settings);
    this.detector = new FindingsDetector();
    this.simulator = new ImpactSimulator(settings);
    this.embeddings = new EmbeddingAnalyzer(deps.embedder, deps.index, settings);
    this.proposals = new ProposalGenerator(deps.llm, settings, deps.proposalTemperature);
  }

  async run(strategicPlan: PlanDocumentT, actionPlan: PlanDocumentT, opts: CallOpts = {}): Promise<AnalysisRecordT> {
    const started = Date.now();
    emit(TelemetryEvents.AnalysisStarted, {
      request_id: opts.requestId,
      strategic_sections: strategicPlan.sections.length,
      action_sections: actionPlan.sections.length,
    });

    try {
      const record = await this.execute(strategicPlan, actionPlan, opts);
      emit(TelemetryEvents.AnalysisCompleted, {
        request_id: opts.requestId,
        latency_ms: Date.now() - started,
        overall_score: record.report.overall_score,
        findings: record.critical_findings.length,
        proposals: record.proposals.length,
      });
      return record;
    } catch (error) {
      log.error({ request_id: opts.requestId, error: describeError(error) }, "Alignment analysis failed");
      emit(TelemetryEvents.AnalysisFailed, {
        request_id: opts.requestId,
        latency_ms: Date.now() - started,
        error: error instanceof Error ? error.name : "unknown",
      });
      throw error;
    }
  }

  private async execute(
    strategicPlan: PlanDocumentT,
    actionPlan: PlanDocumentT,
    opts: CallOpts
  ): Promise<AnalysisRecordT> {
    const strategicEntities = this.deps.extractor.extract(strategicPlan);
    const actionEntities = this.deps.extractor.extract(actionPlan);
    const entityResults = this.matcher.analyze(strategicEntities, actionEntities);
    emit(TelemetryEvents.EntitiesMatched, {
      strategic_entities: countEntities(strategicEntities),
      action_entities: countEntities(actionEntities),
      matched: entityResults.matched_entities,
      entity_score: entityResults.entity_score,
    });

    const queryResults = await this.embeddings.analyze(strategicPlan, actionPlan);
    const similarity = this.aggregator.aggregate(queryResults);
    emit(TelemetryEvents.SimilarityAggregated, {
      objectives: similarity.objective_alignments.length,
      with_support: similarity.objectives_with_support,
      embedding_score: similarity.embedding_score,
    });

    const report = await this.fusion.combine({
      similarity,
      entityResults,
      strategicPlanTitle: strategicPlan.title,
      actionPlanTitle: actionPlan.title,
      assessedAt: this.deps.now?.(),
    });

    const findings = this.detector.detect({
      objectives: report.objective_synchronizations,
      unmatchedEntities: entityResults.unmatched_entities,
      entityScore: entityResults.entity_score,
    });
    emit(TelemetryEvents.FindingsDetected, {
      total: findings.length,
      critical: findings.filter((f) => f.severity === "critical").length,
    });

    const proposals = await this.proposals.generate(
      { report, findings, entityResults, strategicPlan },
      opts
    );

    const impactSimulation = this.simulator.simulate({
      proposals,
      objectives: report.objective_synchronizations,
      currentScore: report.overall_score,
      entityScore: entityResults.entity_score,
    });

    return {
      schema: ANALYSIS_RECORD_SCHEMA,
      report,
      entity_results: entityResults,
      similarity_results: similarity,
      critical_findings: findings,
      proposals,
      impact_simulation: impactSimulation,
      agent_summary: buildAgentSummary(findings, proposals, impactSimulation),
    };
  }
}
