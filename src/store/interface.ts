/**
 * Analysis Store Interface
 *
 * Persistence boundary for the two plan documents and the single canonical
 * analysis-results record.
 */

import type { PlanDocumentT } from '../schemas/plan.js';
import type { AnalysisRecordT } from '../schemas/analysis.js';

export interface AnalysisStore {
  loadStrategicPlan(): Promise<PlanDocumentT | null>;
  loadActionPlan(): Promise<PlanDocumentT | null>;
  saveStrategicPlan(document: PlanDocumentT): Promise<void>;
  saveActionPlan(document: PlanDocumentT): Promise<void>;

  loadResults(): Promise<AnalysisRecordT | null>;
  saveResults(record: AnalysisRecordT): Promise<void>;

  /**
   * Write back the action plan and the results record together. If the
   * second write fails the first is rolled back and the error rethrown.
   */
  commitAcceptance(actionPlan: PlanDocumentT, results: AnalysisRecordT): Promise<void>;
}

export interface FileStoreConfig {
  /** Directory holding strategic_plan.json, action_plan.json and analysis_results.json */
  dataDir: string;
  /** Keep timestamped copies before overwriting */
  backupEnabled?: boolean;
  maxBackups?: number;
}
