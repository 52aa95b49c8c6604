import type { AnalysisRecordT } from "../schemas/analysis.js";
import type { PlanDocumentT, PlanSectionT } from "../schemas/plan.js";
import { formatCurrency, formatMetricTarget } from "../alignment/entity-extractor.js";

export type ChunkKind = "section" | "summary" | "objective" | "finding" | "proposal";
export type ChunkSource = "strategic_plan" | "action_plan" | "analysis_results";

export interface DocumentChunk {
  id: string;
  kind: ChunkKind;
  source: ChunkSource;
  title: string;
  text: string;
}

const KPIS_LISTED = 5;
const INITIATIVES_LISTED = 3;

function titleCase(value: string): string {
  return value
    .split("_")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

function sectionText(section: PlanSectionT): string {
  const lines = [`Title: ${section.title}`, `Type: ${titleCase(section.type)}`];

  if (section.kpis.length > 0) {
    lines.push(`KPIs (${section.kpis.length}):`);
    for (const kpi of section.kpis.slice(0, KPIS_LISTED)) {
      lines.push(`- ${kpi.target !== null && kpi.target !== "" ? formatMetricTarget(kpi) : kpi.metric}`);
    }
  }
  if (typeof section.budget === "number" && section.budget > 0) {
    lines.push(`Budget: ${formatCurrency(section.budget)}`);
  }
  if (section.timeline) {
    lines.push(`Timeline: ${section.timeline}`);
  }
  if (section.initiatives.length > 0) {
    lines.push(`Initiatives (${section.initiatives.length}):`);
    for (const initiative of section.initiatives.slice(0, INITIATIVES_LISTED)) {
      lines.push(`- ${initiative}`);
    }
  }
  if (section.content) {
    lines.push("", "Details:", section.content);
  }
  return lines.join("\n");
}

/**
 * One chunk per plan section.
 */
export function chunkPlan(document: PlanDocumentT): DocumentChunk[] {
  return document.sections.map((section) => ({
    id: `${document.document_type}_${section.id}`,
    kind: "section",
    source: document.document_type,
    title: section.title,
    text: sectionText(section),
  }));
}

/**
 * Overall summary, then one chunk per objective, finding and proposal.
 */
export function chunkAnalysis(record: AnalysisRecordT): DocumentChunk[] {
  const { report } = record;
  const chunks: DocumentChunk[] = [];

  const summary = [
    "SYNCHRONIZATION ANALYSIS SUMMARY",
    `Overall Score: ${report.overall_score.toFixed(1)}/100 (${report.interpretation})`,
    `Embedding Score: ${report.embedding_score.toFixed(1)}/100`,
    `Entity Match Score: ${report.entity_score.toFixed(1)}/100`,
    `Objectives: ${report.total_objectives} total, ${report.objectives_with_strong_support} strong, ${report.objectives_with_weak_support} weak`,
    `Entities: ${report.total_strategic_entities} strategic, ${report.matched_entities} matched, ${report.unmatched_entities} unmatched`,
  ];
  if (report.strengths.length > 0) summary.push("Strengths:", ...report.strengths.map((s) => `- ${s}`));
  if (report.weaknesses.length > 0) summary.push("Weaknesses:", ...report.weaknesses.map((w) => `- ${w}`));
  summary.push(
    `Projected score if pending and accepted proposals are adopted: ${record.impact_simulation.projected_score.toFixed(1)}/100`
  );

  chunks.push({
    id: "analysis_summary",
    kind: "summary",
    source: "analysis_results",
    title: "Overall Analysis Summary",
    text: summary.join("\n"),
  });

  for (const obj of report.objective_synchronizations) {
    const lines = [
      `OBJECTIVE ANALYSIS: ${obj.objective_title}`,
      `Combined Score: ${obj.combined_score.toFixed(1)}/100`,
      `Embedding Score: ${obj.embedding_score.toFixed(1)}/100`,
      `Entity Matches: ${obj.entity_match_count}`,
      `Status: ${obj.has_strong_support ? "Strong Support" : "Weak Support"}`,
    ];
    if (obj.top_matching_actions.length > 0) {
      lines.push("Top Matching Actions:");
      for (const action of obj.top_matching_actions) {
        lines.push(`${action.rank}. ${action.action_title} (similarity: ${action.similarity_score.toFixed(2)})`);
      }
    }
    if (obj.gaps.length > 0) {
      lines.push("Identified Gaps:", ...obj.gaps.map((g) => `- ${g}`));
    }
    chunks.push({
      id: `analysis_objective_${obj.objective_id}`,
      kind: "objective",
      source: "analysis_results",
      title: `Analysis: ${obj.objective_title}`,
      text: lines.join("\n"),
    });
  }

  for (const finding of record.critical_findings) {
    chunks.push({
      id: `analysis_finding_${finding.id}`,
      kind: "finding",
      source: "analysis_results",
      title: finding.title,
      text: [
        `FINDING (${finding.severity.toUpperCase()}): ${finding.title}`,
        finding.description,
        `Impact: ${finding.impact}`,
        ...finding.evidence.map((e) => `- ${e}`),
      ].join("\n"),
    });
  }

  for (const proposal of record.proposals) {
    chunks.push({
      id: `analysis_proposal_${proposal.id}`,
      kind: "proposal",
      source: "analysis_results",
      title: proposal.action_title,
      text: [
        `PROPOSAL (${proposal.priority} priority, ${proposal.status}): ${proposal.action_title}`,
        `Objective: ${proposal.objective_title}`,
        proposal.description,
        `Budget: ${formatCurrency(proposal.budget_estimate)}`,
        `Timeline: ${proposal.timeline}`,
        ...proposal.expected_kpis.map((k) => `- ${k}`),
      ].join("\n"),
    });
  }

  return chunks;
}
