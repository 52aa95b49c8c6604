import { describe, it, expect } from "vitest";
import { buildAgentSummary } from "../../src/alignment/agent-summary.js";
import type { CriticalFindingT } from "../../src/schemas/analysis.js";
import { proposal } from "../support/factories.js";

function finding(id: string, severity: CriticalFindingT["severity"]): CriticalFindingT {
  return { id, severity, title: id, description: "", affected_objective: "", impact: "", evidence: [] };
}

describe("buildAgentSummary", () => {
  it("rolls up findings, proposals and the simulation", () => {
    const summary = buildAgentSummary(
      [finding("critical_1", "critical"), finding("high_2", "high"), finding("high_3", "high"), finding("medium_4", "medium")],
      [proposal({ priority: "high" }), proposal({ id: "proposal_obj_1_1" })],
      {
        current_score: 62,
        projected_score: 68,
        improvement: 6,
        affected_objectives: [
          { objective_title: "Objective One", current_score: 50, projected_score: 62, improvement: 12 },
        ],
      }
    );

    expect(summary).toEqual({
      total_findings: 4,
      critical_count: 1,
      high_count: 2,
      total_proposals: 2,
      high_priority_proposals: 1,
      current_score: 62,
      projected_score: 68,
      improvement: 6,
      objectives_affected: 1,
    });
  });
});
