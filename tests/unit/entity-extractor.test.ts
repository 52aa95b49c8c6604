import { describe, it, expect } from "vitest";
import {
  StructuredEntityExtractor,
  deduplicateEntities,
  formatCurrency,
  formatMetricTarget,
} from "../../src/alignment/entity-extractor.js";
import { PlanDocument } from "../../src/schemas/plan.js";
import { entity } from "../support/factories.js";

describe("formatting", () => {
  it("formats whole-dollar amounts", () => {
    expect(formatCurrency(250000)).toBe("$250,000");
  });

  it("formats a KPI target with and without a deadline", () => {
    expect(formatMetricTarget({ metric: "Uptime", target: 99.9, unit: "%", deadline: null })).toBe("Uptime: 99.9%");
    expect(formatMetricTarget({ metric: "NPS", target: 60, unit: "", deadline: "2025-06-30" })).toBe(
      "NPS: 60 by 2025-06-30"
    );
  });
});

describe("deduplicateEntities", () => {
  it("keys on lowercased trimmed text regardless of type", () => {
    const unique = deduplicateEntities([
      entity("Customer Satisfaction", "KPI"),
      entity(" customer satisfaction ", "INITIATIVE"),
      entity("", "GOAL"),
      entity("Churn", "KPI"),
    ]);
    expect(unique.map((e) => `${e.type}:${e.text}`)).toEqual(["KPI:Customer Satisfaction", "KPI:Churn"]);
  });
});

describe("StructuredEntityExtractor", () => {
  it("maps structured section fields onto typed entities", () => {
    const document = PlanDocument.parse({
      title: "Strategic Plan",
      document_type: "strategic_plan",
      sections: [
        {
          id: "obj_cx",
          type: "strategic_objective",
          title: "Customer Experience",
          kpis: [
            { metric: "Customer Satisfaction", target: 90, unit: "%", deadline: "2025-12-31" },
            { metric: "Churn" },
          ],
          budget: 250000,
          timeline: "FY2025",
          goals: ["Improve CX"],
          initiatives: ["customer satisfaction"],
        },
      ],
    });

    const extracted = new StructuredEntityExtractor().extract(document);

    expect(extracted.KPI?.map((e) => e.text)).toEqual(["Customer Satisfaction", "Churn"]);
    expect(extracted.METRIC_TARGET?.map((e) => e.text)).toEqual(["Customer Satisfaction: 90% by 2025-12-31"]);
    expect(extracted.BUDGET?.map((e) => e.text)).toEqual(["$250,000"]);
    expect(extracted.TIMELINE?.map((e) => e.text)).toEqual(["FY2025"]);
    expect(extracted.GOAL?.map((e) => e.text)).toEqual(["Improve CX"]);
    expect(extracted.INITIATIVE).toBeUndefined();
    expect(extracted.KPI?.[0]?.source_section_title).toBe("Customer Experience");
  });

  it("skips zero budgets and empty timelines", () => {
    const document = PlanDocument.parse({
      title: "Action Plan",
      document_type: "action_plan",
      sections: [{ id: "a1", type: "action_item", title: "Kickoff", budget: 0, timeline: "" }],
    });

    expect(new StructuredEntityExtractor().extract(document)).toEqual({});
  });
});
