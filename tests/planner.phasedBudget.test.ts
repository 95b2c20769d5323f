import { describe, it } from "mocha";
import { expect } from "chai";

import { resolvePlanningConfig, type PlanningConfigInput } from "../src/config/planning.js";
import { aggregateBuildingRepair, infrastructurePrice, requiresRepair } from "../src/infrastructure/costModel.js";
import {
  combinedScores,
  PhasedBudgetPlanner,
  planPhases,
  ZERO_DENOMINATOR_RECIPROCAL,
  type PlannedBuilding,
} from "../src/planner/phasedBudget.js";
import type { InfrastructureRecord } from "../src/records/schemas.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function config(input: PlanningConfigInput) {
  return resolvePlanningConfig(input, { env: {} });
}

function line(
  id: string,
  buildingId: string,
  type: InfrastructureRecord["type"],
  length: number,
  housesServed = 1,
  state: InfrastructureRecord["state"] = "to_replace",
): InfrastructureRecord {
  return { id, building_id: buildingId, type, state, length, houses_served: housesServed };
}

const buildings: PlannedBuilding[] = [
  { id: "S1", building_type: "school", connected: false },
  { id: "R2", building_type: "residential", connected: false },
  { id: "H1", building_type: "hospital", connected: false },
  { id: "K1", building_type: "commercial", connected: true },
  { id: "R1", building_type: "residential", connected: false },
];

const infrastructures: InfrastructureRecord[] = [
  line("IH1", "H1", "aerial", 40),
  line("IR1", "R1", "aerial", 10, 2),
  line("IR2", "R2", "duct", 20, 4),
  line("IS1", "S1", "aerial", 20),
  line("IK1", "K1", "aerial", 15, 3, "intact"),
];

describe("planner/phasedBudget", () => {
  it("plans the hospital first, then splits the remaining budget", () => {
    const plan = planPhases(buildings, infrastructures, config({ totalBudget: 50_000 }));

    expect(plan.phases.map((phase) => [phase.index, phase.buildingIds])).to.deep.equal([
      [0, ["H1"]],
      [1, ["S1", "R1"]],
      [2, ["R2"]],
    ]);

    const [critical, first, second] = plan.phases;
    expect(critical).to.deep.include({
      kind: "critical",
      infrastructureIds: ["IH1"],
      cost: 20_000,
      durationHours: 80,
      minElapsedHours: 20,
      workerCost: 3000,
      budgetAllotment: null,
      remainingBudgetAfter: 30_000,
    });
    expect(first).to.deep.include({
      kind: "budget",
      infrastructureIds: ["IS1", "IR1"],
      cost: 15_000,
      durationHours: 60,
      minElapsedHours: 10,
      workerCost: 2250,
      remainingBudgetAfter: 15_000,
      warnings: [],
    });
    expect(first?.budgetAllotment).to.be.closeTo(12_000, 1e-6);
    expect(second).to.deep.include({ cost: 18_000, minElapsedHours: 25, remainingBudgetAfter: -3000 });
    expect(second?.budgetAllotment).to.be.closeTo(3000, 1e-6);

    expect(plan.unplanned).to.deep.equal([]);
    expect(plan.warnings).to.deep.equal([]);
    expect(plan.totalCost).to.equal(53_000);
    expect(plan.remainingBudget).to.equal(-3000);
  });

  it("conserves cost and places every building needing work exactly once", () => {
    const plan = planPhases(buildings, infrastructures, config({ totalBudget: 50_000 }));

    const needing = buildings.filter((building) => requiresRepair(building, infrastructures)).map((b) => b.id);
    const placed = [...plan.phases.flatMap((phase) => phase.buildingIds), ...plan.unplanned];
    expect([...placed].sort()).to.deep.equal([...needing].sort());
    expect(new Set(placed).size).to.equal(placed.length);

    const expectedCost = infrastructures
      .filter((entry) => entry.state === "to_replace" && needing.includes(entry.building_id))
      .reduce((sum, entry) => sum + infrastructurePrice(entry), 0);
    expect(plan.phases.reduce((sum, phase) => sum + phase.cost, 0)).to.equal(expectedCost);
  });

  it("warns when hospital repairs outlast the generator threshold", () => {
    const plan = planPhases(buildings, infrastructures, config({ totalBudget: 50_000 }));
    const warnings = plan.phases[0]?.warnings ?? [];

    expect(warnings).to.have.length(1);
    expect(warnings[0]?.code).to.equal("W-GENERATOR-AUTONOMY");
    expect(warnings[0]?.details).to.deep.include({ minElapsedHours: 20, threshold: 16 });
  });

  it("does not warn when the hospital finishes exactly at the threshold", () => {
    const shorter = infrastructures.map((entry) => (entry.id === "IH1" ? line("IH1", "H1", "aerial", 32) : entry));
    const plan = planPhases(buildings, shorter, config({ totalBudget: 50_000 }));

    expect(plan.phases[0]?.minElapsedHours).to.equal(16);
    expect(plan.phases[0]?.warnings).to.deep.equal([]);
  });

  it("places hospitals in phase 0 even when their combined score is the lowest", () => {
    const plan = planPhases(
      [
        { id: "A", building_type: "residential", connected: false },
        { id: "Z", building_type: "hospital", connected: true },
      ],
      [line("IA", "A", "aerial", 1, 10), line("IZ", "Z", "duct", 500)],
      config({ totalBudget: 1_000_000, priorityWeights: { hospital: 0, school: 0, residential: 1, commercial: 0 } }),
    );

    expect(plan.phases[0]).to.deep.include({ index: 0, buildingIds: ["Z"] });
    expect(plan.phases[1]).to.deep.include({ index: 1, buildingIds: ["A"] });
  });

  it("skips phase 0 when no hospital needs work", () => {
    const plan = planPhases(
      buildings.filter((building) => building.building_type !== "hospital"),
      infrastructures,
      config({ totalBudget: 50_000 }),
    );

    expect(plan.phases[0]?.index).to.equal(1);
    expect(plan.phases[0]?.budgetAllotment).to.be.closeTo(20_000, 1e-6);
  });

  it("reports buildings left over once the budget is exhausted", () => {
    const plan = planPhases(
      [
        { id: "R1", building_type: "residential", connected: false },
        { id: "S1", building_type: "school", connected: false },
      ],
      infrastructures,
      config({ totalBudget: 1000 }),
    );

    expect(plan.phases.map((phase) => phase.buildingIds)).to.deep.equal([["S1"]]);
    expect(plan.unplanned).to.deep.equal(["R1"]);
    expect(plan.remainingBudget).to.equal(-9000);
    expect(plan.warnings).to.have.length(1);
    expect(plan.warnings[0]).to.deep.include({ code: "W-BUDGET-EXHAUSTED" });
  });

  it("reports leftovers when the configured phases run out", () => {
    const plan = planPhases(
      [
        { id: "R1", building_type: "residential", connected: false },
        { id: "S1", building_type: "school", connected: false },
      ],
      infrastructures,
      config({ totalBudget: 1_000_000, phaseBudgetFractions: [0.001] }),
    );

    expect(plan.phases.map((phase) => phase.buildingIds)).to.deep.equal([["S1"]]);
    expect(plan.unplanned).to.deep.equal(["R1"]);
  });

  it("schedules disconnected buildings without damaged lines first", () => {
    const plan = planPhases(
      [
        { id: "R1", building_type: "residential", connected: false },
        { id: "D1", building_type: "residential", connected: false },
      ],
      infrastructures,
      config({ totalBudget: 50_000 }),
    );

    expect(plan.phases).to.have.length(1);
    expect(plan.phases[0]).to.deep.include({ buildingIds: ["D1", "R1"], infrastructureIds: ["IR1"], cost: 5000 });
  });

  it("adds the priority weight to the guarded reciprocals of difficulty, cost and duration", () => {
    const repairs = [
      { repair: aggregateBuildingRepair({ id: "R1" }, infrastructures), buildingType: "residential" as const },
      { repair: aggregateBuildingRepair({ id: "S1" }, infrastructures), buildingType: "school" as const },
      { repair: aggregateBuildingRepair({ id: "D1" }, infrastructures), buildingType: "commercial" as const },
    ];
    const scores = combinedScores(repairs, config({ totalBudget: 1 }));

    expect(scores.map((entry) => entry.buildingId)).to.deep.equal(["D1", "S1", "R1"]);
    expect(scores[0]?.score).to.be.closeTo(0.1 + 0.6 * ZERO_DENOMINATOR_RECIPROCAL, 1e-6);
    expect(scores[1]?.score).to.be.closeTo(0.31752, 1e-12);
    expect(scores[2]?.score).to.be.closeTo(0.26504, 1e-12);
    expect(ZERO_DENOMINATOR_RECIPROCAL).to.equal(1e6);
  });

  it("keeps the order of two priced buildings when a building with nothing to replace joins them", () => {
    const lines = [line("IA", "A", "aerial", 2, 10), line("IB", "B", "aerial", 200, 1)];
    const priced: PlannedBuilding[] = [
      { id: "A", building_type: "residential", connected: false },
      { id: "B", building_type: "school", connected: false },
    ];
    const withFree: PlannedBuilding[] = [...priced, { id: "C", building_type: "commercial", connected: false }];
    const settings = config({ totalBudget: 1_000_000 });
    const order = (members: readonly PlannedBuilding[]) =>
      combinedScores(
        members.map((building) => ({
          repair: aggregateBuildingRepair(building, lines),
          buildingType: building.building_type,
        })),
        settings,
      ).map((entry) => entry.buildingId);

    expect(order(priced)).to.deep.equal(["A", "B"]);
    expect(order(withFree)).to.deep.equal(["C", "A", "B"]);
    expect(planPhases(withFree, lines, settings).phases.map((phase) => phase.buildingIds)).to.deep.equal([
      ["C", "A", "B"],
    ]);
  });

  it("plans a city-sized batch of disconnected buildings", () => {
    const many: PlannedBuilding[] = Array.from({ length: 200_000 }, (_, index) => ({
      id: `B${index}`,
      building_type: "residential",
      connected: false,
    }));

    const plan = planPhases(many, [], config({ totalBudget: 1000 }));

    expect(plan.phases).to.have.length(1);
    expect(plan.phases[0]?.buildingIds).to.have.length(200_000);
    expect(plan.unplanned).to.deep.equal([]);
    expect(plan.remainingBudget).to.equal(1000);
  });

  it("logs each state transition and refuses a second run", () => {
    const logger = new RecordingLogger();
    const planner = new PhasedBudgetPlanner(config({ totalBudget: 50_000 }), { logger });

    planner.plan(buildings, infrastructures);

    const transitions = logger.entries
      .filter((entry) => entry.message === "planner_state_changed")
      .map((entry) => entry.payload);
    expect(transitions).to.deep.equal([
      { from: "init", to: "critical_phase" },
      { from: "critical_phase", to: "budget_phase(1)" },
      { from: "budget_phase(1)", to: "budget_phase(2)" },
      { from: "budget_phase(2)", to: "done" },
    ]);
    expect(logger.messages("warn")).to.deep.equal(["planner_generator_autonomy_exceeded"]);
    expect(planner.getState()).to.deep.equal({ kind: "done" });
    expect(() => planner.plan(buildings, infrastructures)).to.throw(/single run/);
  });
});
