import type { LLMAdapter, CompletionArgs, CompletionResult, LlmTask } from "./types.js";

/**
 * Canned responses, one per task. Shapes mirror what the real prompts ask for.
 */
const FIXTURE_RESPONSES: Record<LlmTask, unknown> = {
  proposals_objective: {
    proposals: [
      {
        action_title: "Fixture Objective Workstream",
        description: "Stand up a dedicated workstream with quarterly milestones tied to the objective's KPIs.",
        budget_estimate: 150000,
        timeline: "Q1 2025 - Q4 2025",
        expected_kpis: ["Quarterly milestone completion"],
        rationale: "Closes the semantic and KPI gaps identified in analysis",
        expected_impact: "Raises the objective toward the strong-support threshold",
      },
    ],
  },
  proposals_finding: {
    proposals: [
      {
        action_title: "Fixture Finding Remediation",
        description: "Assign an owner and a remediation plan for the finding with monthly reviews.",
        budget_estimate: 100000,
        timeline: "Q2 2025",
        expected_kpis: ["Finding closed"],
        rationale: "Directly addresses the finding",
        expected_impact: "Removes the finding from the next analysis",
      },
    ],
  },
  proposals_entity_tracking: {
    proposals: [
      {
        action_title: "Fixture KPI Tracking Framework",
        description: "Monthly KPI dashboard covering every strategic target with variance alerts.",
        budget_estimate: 200000,
        timeline: "Q1 2025 - Q3 2025",
        expected_kpis: ["100% strategic KPI coverage"],
        rationale: "Creates explicit tracking for unmatched strategic entities",
        expected_impact: "Improves the entity match rate",
      },
    ],
  },
  insights_strengths: { strengths: ["Fixture strength"] },
  insights_weaknesses: { weaknesses: ["Fixture weakness"] },
  insights_recommendations: {
    recommendations: [{ priority: "medium", objective: "Fixture objective", actions: ["Fixture action"] }],
  },
  document_qa: "Fixture answer based on the indexed plans [1].",
};

/**
 * Fixtures adapter for testing without API keys.
 */
export class FixturesAdapter implements LLMAdapter {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  async complete(args: CompletionArgs): Promise<CompletionResult> {
    const response = FIXTURE_RESPONSES[args.task];
    return {
      content: typeof response === "string" ? response : JSON.stringify(response),
      usage: { input_tokens: 0, output_tokens: 0 },
    };
  }
}
