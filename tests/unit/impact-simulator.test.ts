import { describe, it, expect } from "vitest";
import {
  ENTITY_TRACKING_ROW_TITLE,
  ImpactSimulator,
  isEntityTrackingProposal,
} from "../../src/alignment/impact-simulator.js";
import { DEFAULT_ALIGNMENT_SETTINGS } from "../../src/alignment/settings.js";
import { objective, proposal } from "../support/factories.js";

describe("isEntityTrackingProposal", () => {
  it("recognizes the sentinel and entity or finding ids", () => {
    expect(isEntityTrackingProposal("entity_tracking")).toBe(true);
    expect(isEntityTrackingProposal("finding_critical_1")).toBe(true);
    expect(isEntityTrackingProposal("KPI_Entity_Coverage")).toBe(true);
    expect(isEntityTrackingProposal("obj_digital")).toBe(false);
  });
});

describe("ImpactSimulator", () => {
  const simulator = new ImpactSimulator(DEFAULT_ALIGNMENT_SETTINGS);

  it("applies diminishing returns per objective", () => {
    expect(simulator.contribution(0)).toBeCloseTo(12, 10);
    expect(simulator.contribution(1)).toBeCloseTo(8.4, 10);
    expect(simulator.contribution(2)).toBeCloseTo(5.88, 10);
  });

  it("accumulates contributions on one objective and averages over all objectives", () => {
    const result = simulator.simulate({
      proposals: [
        proposal({ id: "p0", objective_id: "obj_1" }),
        proposal({ id: "p1", objective_id: "obj_1" }),
        proposal({ id: "p2", objective_id: "obj_1" }),
      ],
      objectives: [
        objective({ objective_id: "obj_1", objective_title: "One", combined_score: 40 }),
        objective({ objective_id: "obj_2", objective_title: "Two", combined_score: 80 }),
      ],
      currentScore: 60,
      entityScore: 50,
    });

    const delta = 12 + 8.4 + 5.88;
    expect(result.affected_objectives).toHaveLength(1);
    expect(result.affected_objectives[0]?.objective_title).toBe("One");
    expect(result.affected_objectives[0]?.projected_score).toBeCloseTo(40 + delta, 10);
    expect(result.projected_score).toBeCloseTo(60 + delta / 2, 10);
    expect(result.improvement).toBeCloseTo(delta / 2, 10);
  });

  it("caps an objective at 100", () => {
    const result = simulator.simulate({
      proposals: [proposal({ objective_id: "obj_1" })],
      objectives: [objective({ objective_id: "obj_1", combined_score: 95 })],
      currentScore: 95,
      entityScore: 90,
    });

    expect(result.affected_objectives[0]?.projected_score).toBe(100);
    expect(result.affected_objectives[0]?.improvement).toBe(5);
    expect(result.projected_score).toBe(100);
  });

  it("projects entity-only proposals without dividing by objective count", () => {
    const result = simulator.simulate({
      proposals: [proposal({ objective_id: "entity_tracking" }), proposal({ id: "p2", objective_id: "finding_high_1" })],
      objectives: [objective({ objective_id: "obj_1" }), objective({ objective_id: "obj_2" })],
      currentScore: 50,
      entityScore: 40,
    });

    expect(result.affected_objectives).toEqual([
      { objective_title: ENTITY_TRACKING_ROW_TITLE, current_score: 40, projected_score: 56, improvement: 16 },
    ]);
    // 16 * 0.4
    expect(result.projected_score).toBeCloseTo(56.4, 10);
  });

  it("folds the weighted entity delta into the average when both kinds exist", () => {
    const result = simulator.simulate({
      proposals: [proposal({ objective_id: "obj_1" }), proposal({ id: "p2", objective_id: "entity_tracking" })],
      objectives: [
        objective({ objective_id: "obj_1", combined_score: 50 }),
        objective({ objective_id: "obj_2", combined_score: 70 }),
      ],
      currentScore: 60,
      entityScore: 40,
    });

    // (12 + 8 * 0.4) / 2
    expect(result.projected_score).toBeCloseTo(67.6, 10);
    expect(result.affected_objectives.map((a) => a.objective_title)).toEqual(["Objective One", ENTITY_TRACKING_ROW_TITLE]);
  });

  it("ignores rejected proposals and unknown objectives", () => {
    const result = simulator.simulate({
      proposals: [
        proposal({ objective_id: "obj_1", status: "rejected" }),
        proposal({ id: "p2", objective_id: "obj_missing" }),
      ],
      objectives: [objective({ objective_id: "obj_1", combined_score: 50 })],
      currentScore: 50,
      entityScore: 40,
    });

    expect(result.affected_objectives).toEqual([]);
    expect(result.projected_score).toBe(50);
    expect(result.improvement).toBe(0);
  });

  it("counts accepted proposals", () => {
    const result = simulator.simulate({
      proposals: [proposal({ objective_id: "obj_1", status: "accepted" })],
      objectives: [objective({ objective_id: "obj_1", combined_score: 50 })],
      currentScore: 50,
      entityScore: 40,
    });
    expect(result.projected_score).toBeCloseTo(62, 10);
  });
});
