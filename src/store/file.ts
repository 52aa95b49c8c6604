/**
 * File-based Analysis Store
 *
 * Three JSON files under one data directory, validated on load and written
 * atomically (temp file + rename).
 */

import { readFile, writeFile, mkdir, copyFile, readdir, unlink, rename } from 'fs/promises';
import { join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { PlanDocument } from '../schemas/plan.js';
import type { PlanDocumentT } from '../schemas/plan.js';
import { AnalysisRecord } from '../schemas/analysis.js';
import type { AnalysisRecordT } from '../schemas/analysis.js';
import { log } from '../utils/telemetry.js';
import type { AnalysisStore, FileStoreConfig } from './interface.js';

export const STRATEGIC_PLAN_FILE = 'strategic_plan.json';
export const ACTION_PLAN_FILE = 'action_plan.json';
export const RESULTS_FILE = 'analysis_results.json';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

export class FileAnalysisStore implements AnalysisStore {
  private readonly config: Required<FileStoreConfig>;

  constructor(config: FileStoreConfig) {
    this.config = {
      dataDir: config.dataDir,
      backupEnabled: config.backupEnabled ?? false,
      maxBackups: config.maxBackups ?? 5,
    };
  }

  private path(file: string): string {
    return join(this.config.dataDir, file);
  }

  loadStrategicPlan(): Promise<PlanDocumentT | null> {
    return this.load(STRATEGIC_PLAN_FILE, PlanDocument);
  }

  loadActionPlan(): Promise<PlanDocumentT | null> {
    return this.load(ACTION_PLAN_FILE, PlanDocument);
  }

  saveStrategicPlan(document: PlanDocumentT): Promise<void> {
    return this.writeAtomic(STRATEGIC_PLAN_FILE, document);
  }

  saveActionPlan(document: PlanDocumentT): Promise<void> {
    return this.writeAtomic(ACTION_PLAN_FILE, document);
  }

  loadResults(): Promise<AnalysisRecordT | null> {
    return this.load(RESULTS_FILE, AnalysisRecord);
  }

  saveResults(record: AnalysisRecordT): Promise<void> {
    return this.writeAtomic(RESULTS_FILE, record);
  }

  async commitAcceptance(actionPlan: PlanDocumentT, results: AnalysisRecordT): Promise<void> {
    const previousActionPlan = await readOptional(this.path(ACTION_PLAN_FILE));

    await this.writeAtomic(ACTION_PLAN_FILE, actionPlan);

    try {
      await this.writeAtomic(RESULTS_FILE, results);
    } catch (error) {
      log.error({ error, file: RESULTS_FILE }, 'Results write failed, restoring previous action plan');
      if (previousActionPlan === null) {
        await unlink(this.path(ACTION_PLAN_FILE));
      } else {
        await this.writeRaw(ACTION_PLAN_FILE, previousActionPlan);
      }
      throw error;
    }
  }

  private async load<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | null> {
    const path = this.path(file);
    const content = await readOptional(path);
    if (content === null) return null;

    const result = schema.safeParse(JSON.parse(content));
    if (!result.success) {
      log.error({ file, issues: result.error.issues.length }, 'Stored document failed validation');
      throw new Error(`Stored ${file} is invalid: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return result.data;
  }

  private writeAtomic(file: string, data: unknown): Promise<void> {
    return this.writeRaw(file, JSON.stringify(data, null, 2));
  }

  private async writeRaw(file: string, content: string): Promise<void> {
    const path = this.path(file);
    await mkdir(this.config.dataDir, { recursive: true });

    if (this.config.backupEnabled) {
      await this.createBackup(file);
    }

    // Atomic write: write to temp file, then rename
    const tempPath = `${path}.tmp`;
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
  }

  private async createBackup(file: string): Promise<void> {
    const path = this.path(file);
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    try {
      await copyFile(path, `${path}.backup.${timestamp}`);
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }
    await this.cleanupOldBackups(file);
  }

  /**
   * Remove old backup files beyond maxBackups limit
   */
  private async cleanupOldBackups(file: string): Promise<void> {
    try {
      const backups = (await readdir(this.config.dataDir))
        .filter((f) => f.startsWith(`${file}.backup.`))
        .sort()
        .reverse();

      for (const backup of backups.slice(this.config.maxBackups)) {
        await unlink(join(this.config.dataDir, backup));
      }
    } catch (error) {
      log.warn({ error }, 'Failed to cleanup old backups');
    }
  }
}
