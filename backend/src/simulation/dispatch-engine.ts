import { GasPrice } from "@meritstack/domain";
import type { HourLabel, HourlyResult } from "@meritstack/domain";

import type { MeritOrderStack, MeritOrderUnit } from "./merit-order";

const SHORTAGE_TOLERANCE_MWH = 1e-9;

export enum DispatchBranch {
  Curtailment = "curtailment",
  Dispatch = "dispatch",
  Shortage = "shortage",
}

export interface UnitDispatch {
  unit: MeritOrderUnit;
  outputMwh: number;
  bidGbpPerMwh: number;
}

export interface HourDispatchInput {
  hour: HourLabel;
  demand: number;
  netDemand: number;
  gasPricePencePerTherm: number;
}

export interface HourDispatch {
  hour: HourLabel;
  branch: DispatchBranch;
  netDemand: number;
  fuelCostGbpPerMwh: number | null;
  marginalPrice: number;
  gasGenerated: number;
  unmetDemand: number;
  curtailed: number;
  dispatched: UnitDispatch[];
}

export interface RenewableOutput {
  wind: number;
  solar: number;
}

export interface SettledHour {
  dispatch: HourDispatch;
  result: HourlyResult;
}

export function shortageTolerance(demand: number): number {
  return SHORTAGE_TOLERANCE_MWH * Math.max(1, Math.abs(demand));
}

function settle(value: number, tolerance: number): number {
  return value > tolerance ? value : 0;
}

export function computeNetDemand(
  demand: readonly number[],
  wind: readonly number[],
  solar: readonly number[],
): number[] {
  return demand.map((value, index) => value - wind[index] - solar[index]);
}

/**
 * Clears one hour against the merit-order stack. Renewables are price takers, so
 * only positive net demand reaches the gas units; the last unit that produced
 * anything sets the price. Capacity exhaustion leaves the remainder unmet.
 */
export function dispatchHour(stack: MeritOrderStack, input: HourDispatchInput): HourDispatch {
  const {hour, demand, netDemand} = input;

  // residue of demand - wind - solar within tolerance counts as covered
  if (netDemand <= shortageTolerance(demand)) {
    return {
      hour,
      branch: DispatchBranch.Curtailment,
      netDemand,
      fuelCostGbpPerMwh: null,
      marginalPrice: 0,
      gasGenerated: 0,
      unmetDemand: 0,
      curtailed: Math.max(0, -netDemand),
      dispatched: [],
    };
  }

  const fuelCost = GasPrice.fromPencePerTherm(input.gasPricePencePerTherm).toEnergyPrice();
  const dispatched: UnitDispatch[] = [];
  let remaining = netDemand;
  let gasGenerated = 0;
  let marginalPrice = 0;

  for (const unit of stack.units) {
    if (remaining <= 0) {
      break;
    }
    const outputMwh = Math.min(unit.capacity, remaining);
    if (outputMwh <= 0) {
      continue;
    }
    const bidGbpPerMwh = fuelCost.atEfficiency(unit.efficiency).gbpPerMwh;
    remaining -= outputMwh;
    gasGenerated += outputMwh;
    marginalPrice = bidGbpPerMwh;
    dispatched.push({unit, outputMwh, bidGbpPerMwh});
  }

  const unmetDemand = settle(remaining, shortageTolerance(demand));
  return {
    hour,
    branch: unmetDemand > 0 ? DispatchBranch.Shortage : DispatchBranch.Dispatch,
    netDemand,
    fuelCostGbpPerMwh: fuelCost.gbpPerMwh,
    marginalPrice,
    gasGenerated,
    unmetDemand,
    curtailed: 0,
    dispatched,
  };
}

/** Shortage from the supply totals alone, independent of the dispatch walk. */
export function reconcileShortage(demand: number, renewables: RenewableOutput, gasGenerated: number): number {
  const totalSupply = renewables.wind + renewables.solar + gasGenerated;
  return settle(Math.max(0, demand - totalSupply), shortageTolerance(demand));
}

export function settleHour(
  stack: MeritOrderStack,
  input: HourDispatchInput,
  renewables: RenewableOutput,
): SettledHour {
  const dispatch = dispatchHour(stack, input);
  const shortage = reconcileShortage(input.demand, renewables, dispatch.gasGenerated);

  if (Math.abs(shortage - dispatch.unmetDemand) > shortageTolerance(input.demand)) {
    throw new Error(
      `Shortage reconciliation failed for hour ${String(input.hour)}: ` +
      `dispatch left ${dispatch.unmetDemand} MWh unmet, supply totals give ${shortage} MWh`,
    );
  }

  return {
    dispatch,
    result: {
      hour: input.hour,
      marginal_price_gbp_per_mwh: dispatch.marginalPrice,
      wind_generated_mwh: renewables.wind,
      solar_generated_mwh: renewables.solar,
      gas_generated_mwh: dispatch.gasGenerated,
      demand_mwh: input.demand,
      shortage_mwh: shortage,
    },
  };
}
