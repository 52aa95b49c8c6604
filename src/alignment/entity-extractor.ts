import { EntityType } from "../schemas/analysis.js";
import type { EntityT, EntityTypeT } from "../schemas/analysis.js";
import type { KpiT, PlanDocumentT, PlanSectionT } from "../schemas/plan.js";
import { normalizeEntityText } from "./text-similarity.js";

export type EntitiesByType = Partial<Record<EntityTypeT, EntityT[]>>;

/**
 * Turns a plan document into typed entities grouped by type.
 *
 * Natural-language extraction lives outside this service; implementations
 * here work from already-structured section fields.
 */
export interface EntityExtractor {
  extract(document: PlanDocumentT): EntitiesByType;
}

const currency = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function formatCurrency(amount: number): string {
  return currency.format(amount);
}

export function formatMetricTarget(kpi: KpiT): string {
  const base = `${kpi.metric}: ${String(kpi.target)}${kpi.unit}`;
  return kpi.deadline ? `${base} by ${kpi.deadline}` : base;
}

function sectionEntities(section: PlanSectionT): EntityT[] {
  const source = { source_section_id: section.id, source_section_title: section.title };
  const entities: EntityT[] = [];

  for (const kpi of section.kpis) {
    entities.push({ text: kpi.metric, type: "KPI", value: null, ...source });
  }
  for (const kpi of section.kpis) {
    if (kpi.target === null || kpi.target === "") continue;
    entities.push({ text: formatMetricTarget(kpi), type: "METRIC_TARGET", value: kpi.target, ...source });
  }
  if (typeof section.budget === "number" && section.budget > 0) {
    entities.push({ text: formatCurrency(section.budget), type: "BUDGET", value: section.budget, ...source });
  }
  if (section.timeline) {
    entities.push({ text: section.timeline, type: "TIMELINE", value: section.timeline, ...source });
  }
  for (const goal of section.goals) {
    entities.push({ text: goal, type: "GOAL", value: null, ...source });
  }
  for (const initiative of section.initiatives) {
    entities.push({ text: initiative, type: "INITIATIVE", value: null, ...source });
  }

  return entities;
}

/**
 * Drop entities whose normalized text was already seen anywhere in the
 * document. Type is not part of the key; the first occurrence wins.
 */
export function deduplicateEntities(entities: readonly EntityT[]): EntityT[] {
  const seen = new Set<string>();
  const unique: EntityT[] = [];

  for (const entity of entities) {
    const key = normalizeEntityText(entity.text);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    unique.push(entity);
  }

  return unique;
}

export function groupByType(entities: readonly EntityT[]): EntitiesByType {
  const grouped: EntitiesByType = {};
  for (const type of EntityType.options) {
    const ofType = entities.filter((e) => e.type === type);
    if (ofType.length > 0) grouped[type] = ofType;
  }
  return grouped;
}

export function countEntities(entities: EntitiesByType): number {
  let total = 0;
  for (const type of EntityType.options) {
    total += entities[type]?.length ?? 0;
  }
  return total;
}

/**
 * Maps structured section fields onto entities: KPI metrics, KPI targets,
 * positive budgets, timelines, goals and initiatives.
 */
export class StructuredEntityExtractor implements EntityExtractor {
  extract(document: PlanDocumentT): EntitiesByType {
    const all = document.sections.flatMap(sectionEntities);
    return groupByType(deduplicateEntities(all));
  }
}
