import type { DispatchInput, DispatchRunResult } from "@meritstack/domain";

import { settleHour, type HourDispatch } from "./dispatch-engine";
import { assembleResults } from "./result-assembler";
import { prepareRunContext, type RunContext } from "./run-context";

export interface DispatchRun {
  dispatches: HourDispatch[];
  result: DispatchRunResult;
}

export interface MeritOrderSimulation extends DispatchRun {
  context: RunContext;
}

/** Clears every hour of a prepared run. Hours are independent; output keeps hour-index order. */
export function dispatchRun(context: RunContext): DispatchRun {
  const settled = context.hours.map((hour, index) =>
    settleHour(
      context.stack,
      {
        hour,
        demand: context.demand[index],
        netDemand: context.netDemand[index],
        gasPricePencePerTherm: context.gasPrices[index],
      },
      {wind: context.windGenerated[index], solar: context.solarGenerated[index]},
    ),
  );

  return {
    dispatches: settled.map((entry) => entry.dispatch),
    result: assembleResults(settled),
  };
}

export function simulateMeritOrderDispatch(input: DispatchInput): MeritOrderSimulation {
  const context = prepareRunContext(input);
  return {context, ...dispatchRun(context)};
}
