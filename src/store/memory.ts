import type { PlanDocumentT } from '../schemas/plan.js';
import type { AnalysisRecordT } from '../schemas/analysis.js';
import type { AnalysisStore } from './interface.js';

/**
 * Process-local store. Values are deep-copied on the way in and out so
 * callers never share references with the stored state.
 */
export class InMemoryAnalysisStore implements AnalysisStore {
  private strategicPlan: PlanDocumentT | null = null;
  private actionPlan: PlanDocumentT | null = null;
  private results: AnalysisRecordT | null = null;

  constructor(initial: { strategicPlan?: PlanDocumentT; actionPlan?: PlanDocumentT } = {}) {
    this.strategicPlan = initial.strategicPlan ? structuredClone(initial.strategicPlan) : null;
    this.actionPlan = initial.actionPlan ? structuredClone(initial.actionPlan) : null;
  }

  async loadStrategicPlan(): Promise<PlanDocumentT | null> {
    return this.strategicPlan && structuredClone(this.strategicPlan);
  }

  async loadActionPlan(): Promise<PlanDocumentT | null> {
    return this.actionPlan && structuredClone(this.actionPlan);
  }

  async saveStrategicPlan(document: PlanDocumentT): Promise<void> {
    this.strategicPlan = structuredClone(document);
  }

  async saveActionPlan(document: PlanDocumentT): Promise<void> {
    this.actionPlan = structuredClone(document);
  }

  async loadResults(): Promise<AnalysisRecordT | null> {
    return this.results && structuredClone(this.results);
  }

  async saveResults(record: AnalysisRecordT): Promise<void> {
    this.results = structuredClone(record);
  }

  async commitAcceptance(actionPlan: PlanDocumentT, results: AnalysisRecordT): Promise<void> {
    const nextPlan = structuredClone(actionPlan);
    const nextResults = structuredClone(results);
    this.actionPlan = nextPlan;
    this.results = nextResults;
  }
}
