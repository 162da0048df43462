import { describe, expect, it } from "vitest";

import {
  computeNetDemand,
  DispatchBranch,
  dispatchHour,
  reconcileShortage,
  settleHour,
} from "../src/simulation/dispatch-engine";
import { buildMeritOrderStack } from "../src/simulation/merit-order";

const singleUnit = buildMeritOrderStack([{name: "U1", capacity: 100, efficiency: 0.5}]);

function hour(netDemand: number, gasPricePencePerTherm = 50, demand = netDemand) {
  return {hour: 1, demand, netDemand, gasPricePencePerTherm};
}

describe("computeNetDemand", () => {
  it("subtracts wind and solar from demand and keeps negative values", () => {
    expect(computeNetDemand([200, 300, 120], [70, 20, 150], [20, 0, 10])).toEqual([110, 280, -40]);
  });
});

describe("dispatchHour", () => {
  it("serves net demand inside the first unit's capacity at that unit's bid", () => {
    const result = dispatchHour(singleUnit, hour(60));

    expect(result.branch).toBe(DispatchBranch.Dispatch);
    expect(result.fuelCostGbpPerMwh).toBeCloseTo(17.0605, 10);
    expect(result.gasGenerated).toBe(60);
    expect(result.marginalPrice).toBeCloseTo(34.121, 10);
    expect(result.unmetDemand).toBe(0);
  });

  it("reports the shortfall and the last bid when the stack runs out", () => {
    const result = dispatchHour(singleUnit, hour(150));

    expect(result.branch).toBe(DispatchBranch.Shortage);
    expect(result.gasGenerated).toBe(100);
    expect(result.marginalPrice).toBeCloseTo(34.121, 10);
    expect(result.unmetDemand).toBe(50);
  });

  it("curtails when net demand is exactly zero, whatever the stack holds", () => {
    const result = dispatchHour(singleUnit, hour(0, 50, 80));

    expect(result.branch).toBe(DispatchBranch.Curtailment);
    expect(result.marginalPrice).toBe(0);
    expect(result.gasGenerated).toBe(0);
    expect(result.dispatched).toEqual([]);
    expect(result.fuelCostGbpPerMwh).toBeNull();
  });

  it("curtails when net demand is only rounding residue", () => {
    const result = dispatchHour(singleUnit, hour(7.1e-15, 50, 65));

    expect(result.branch).toBe(DispatchBranch.Curtailment);
    expect(result.marginalPrice).toBe(0);
    expect(result.gasGenerated).toBe(0);
    expect(result.curtailed).toBe(0);
  });

  it("dispatches net demand just above the tolerance", () => {
    const result = dispatchHour(singleUnit, hour(1e-6, 50, 65));

    expect(result.branch).toBe(DispatchBranch.Dispatch);
    expect(result.gasGenerated).toBe(1e-6);
  });

  it("records the renewable surplus as curtailed energy", () => {
    const result = dispatchHour(singleUnit, hour(-40, 50, 120));

    expect(result.branch).toBe(DispatchBranch.Curtailment);
    expect(result.curtailed).toBe(40);
  });

  it("fully dispatches the more efficient unit before the less efficient one", () => {
    const stack = buildMeritOrderStack([
      {name: "eff04", capacity: 100, efficiency: 0.4},
      {name: "eff06", capacity: 100, efficiency: 0.6},
    ]);

    const partial = dispatchHour(stack, hour(80));
    expect(partial.dispatched.map((entry) => [entry.unit.label, entry.outputMwh])).toEqual([["eff06", 80]]);

    const spill = dispatchHour(stack, hour(130));
    expect(spill.dispatched.map((entry) => [entry.unit.label, entry.outputMwh])).toEqual([
      ["eff06", 100],
      ["eff04", 30],
    ]);
    expect(spill.marginalPrice).toBeCloseTo(17.0605 / 0.4, 10);
  });

  it("sets the price from the last unit dispatched, not the dearest in the stack", () => {
    const stack = buildMeritOrderStack([
      {name: "peaker", capacity: 50, efficiency: 0.3},
      {name: "mid", capacity: 100, efficiency: 0.45},
      {name: "base", capacity: 100, efficiency: 0.6},
    ]);

    const result = dispatchHour(stack, hour(150, 100));

    expect(result.dispatched.map((entry) => entry.unit.label)).toEqual(["base", "mid"]);
    expect(result.marginalPrice).toBeCloseTo(34.121 / 0.45, 10);
    expect(result.marginalPrice).toBeLessThan(34.121 / 0.3);
  });

  it("stops walking the stack once demand is met exactly", () => {
    const stack = buildMeritOrderStack([
      {name: "a", capacity: 60, efficiency: 0.6},
      {name: "b", capacity: 60, efficiency: 0.5},
    ]);

    const result = dispatchHour(stack, hour(60));

    expect(result.dispatched).toHaveLength(1);
    expect(result.marginalPrice).toBeCloseTo(17.0605 / 0.6, 10);
  });

  it("never lets a zero-capacity unit set the price", () => {
    const stack = buildMeritOrderStack([
      {name: "real", capacity: 100, efficiency: 0.5},
      {name: "mothballed", capacity: 0, efficiency: 0.45},
    ]);

    const result = dispatchHour(stack, hour(150));

    expect(result.dispatched.map((entry) => entry.unit.label)).toEqual(["real"]);
    expect(result.marginalPrice).toBeCloseTo(34.121, 10);
    expect(result.unmetDemand).toBe(50);
  });

  it("leaves price at zero and reports the whole net demand as unmet without gas units", () => {
    const result = dispatchHour(buildMeritOrderStack([]), hour(25));

    expect(result.branch).toBe(DispatchBranch.Shortage);
    expect(result.marginalPrice).toBe(0);
    expect(result.gasGenerated).toBe(0);
    expect(result.unmetDemand).toBe(25);
  });
});

describe("reconcileShortage", () => {
  it("is the demand not covered by total supply, floored at zero", () => {
    expect(reconcileShortage(300, {wind: 20, solar: 0}, 250)).toBe(30);
    expect(reconcileShortage(120, {wind: 150, solar: 10}, 0)).toBe(0);
  });

  it("ignores floating-point residue", () => {
    expect(reconcileShortage(0.3, {wind: 0.1, solar: 0.2}, 0)).toBe(0);
  });
});

describe("settleHour", () => {
  it("builds the hourly result from the dispatch and the reconciled shortage", () => {
    const {dispatch, result} = settleHour(
      singleUnit,
      {hour: 7, demand: 200, netDemand: 150, gasPricePencePerTherm: 50},
      {wind: 30, solar: 20},
    );

    expect(dispatch.unmetDemand).toBe(50);
    expect(result).toEqual({
      hour: 7,
      marginal_price_gbp_per_mwh: dispatch.marginalPrice,
      wind_generated_mwh: 30,
      solar_generated_mwh: 20,
      gas_generated_mwh: 100,
      demand_mwh: 200,
      shortage_mwh: 50,
    });
  });

  it("rejects an hour whose net demand disagrees with its supply totals", () => {
    expect(() =>
      settleHour(
        singleUnit,
        {hour: 3, demand: 200, netDemand: 150, gasPricePencePerTherm: 50},
        {wind: 0, solar: 0},
      ),
    ).toThrow("Shortage reconciliation failed for hour 3");
  });
});
