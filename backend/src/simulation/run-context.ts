import type { DispatchInput, HourLabel } from "@meritstack/domain";

import { computeNetDemand } from "./dispatch-engine";
import { assertAlignedHours } from "./input-validator";
import { buildMeritOrderStack, type MeritOrderStack } from "./merit-order";
import { aggregateRenewableGeneration } from "./renewables";

/** Everything the per-hour step reads. Built once per run and never mutated. */
export interface RunContext {
  readonly hours: readonly HourLabel[];
  readonly demand: readonly number[];
  readonly gasPrices: readonly number[];
  readonly windGenerated: readonly number[];
  readonly solarGenerated: readonly number[];
  readonly netDemand: readonly number[];
  readonly stack: MeritOrderStack;
}

export function prepareRunContext(input: DispatchInput): RunContext {
  const hours = assertAlignedHours(input);

  const windGenerated = aggregateRenewableGeneration("wind", input.wind_plants, input.wind_load_factors);
  const solarGenerated = aggregateRenewableGeneration("solar", input.solar_plants, input.solar_load_factors);
  const demand = input.demand.map((point) => point.demand);

  return {
    hours,
    demand,
    gasPrices: input.gas_prices.map((point) => point.price),
    windGenerated,
    solarGenerated,
    netDemand: computeNetDemand(demand, windGenerated, solarGenerated),
    stack: buildMeritOrderStack(input.gas_plants),
  };
}
