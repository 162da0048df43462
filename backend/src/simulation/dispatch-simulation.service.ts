import { Inject, Injectable, Logger } from "@nestjs/common";
import { describeError, parseDispatchInput } from "@meritstack/domain";
import type { DispatchInput, DispatchRunResult, DispatchSummary } from "@meritstack/domain";

import { RuntimeConfigService } from "../config/runtime-config.service";
import { DispatchBranch, type HourDispatch } from "./dispatch-engine";
import { totalStackCapacity } from "./merit-order";
import { countOutOfRangeLoadFactors } from "./renewables";
import { formatResultTable } from "./result-assembler";
import { prepareRunContext, type RunContext } from "./run-context";
import { dispatchRun } from "./simulate";

@Injectable()
export class DispatchSimulationService {
  private readonly logger = new Logger(DispatchSimulationService.name);

  constructor(
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
  ) {
  }

  /** Validates untyped loader output, then runs the dispatch. */
  runFromPayload(raw: unknown): DispatchRunResult {
    let input: DispatchInput;
    try {
      input = parseDispatchInput(raw);
    } catch (error) {
      this.logger.error(`Dispatch input rejected: ${describeError(error)}`);
      throw error;
    }
    return this.run(input);
  }

  run(input: DispatchInput): DispatchRunResult {
    this.logger.log(
      `Running merit-order dispatch with hours=${input.demand.length}, wind_plants=${input.wind_plants.length}, ` +
      `solar_plants=${input.solar_plants.length}, gas_plants=${input.gas_plants.length}`,
    );

    let context: RunContext;
    try {
      context = prepareRunContext(input);
    } catch (error) {
      this.logger.error(`Dispatch run aborted: ${describeError(error)}`);
      throw error;
    }
    this.logger.verbose("Input hours aligned across demand, gas prices, wind and solar load factors.");
    this.warnOnLoadFactorRange(input);
    this.logger.verbose(
      `Merit order: ${context.stack.units.map((unit) => `${unit.label}(η=${unit.efficiency})`).join(" > ") || "empty"}, ` +
      `capacity=${totalStackCapacity(context.stack)} MW`,
    );

    const {dispatches, result} = dispatchRun(context);
    this.logShortages(dispatches);
    this.logSummary(result.summary);

    if (this.configState.shouldLogHourlyTable()) {
      this.logger.debug(`Hourly results:\n${formatResultTable(result.table)}`);
    }
    return result;
  }

  private warnOnLoadFactorRange(input: DispatchInput): void {
    const wind = countOutOfRangeLoadFactors(input.wind_plants, input.wind_load_factors);
    const solar = countOutOfRangeLoadFactors(input.solar_plants, input.solar_load_factors);
    if (wind + solar > 0) {
      this.logger.warn(`Load factors outside [0, 1]: wind=${wind}, solar=${solar}`);
    }
  }

  private logShortages(dispatches: readonly HourDispatch[]): void {
    for (const dispatch of dispatches) {
      if (dispatch.branch === DispatchBranch.Shortage) {
        this.logger.verbose(
          `Hour ${String(dispatch.hour)} has supply shortage of ${dispatch.unmetDemand.toFixed(2)} MWh.`,
        );
      }
    }
  }

  private logSummary(summary: DispatchSummary): void {
    if (summary.max_net_demand_mwh !== null && summary.min_net_demand_mwh !== null) {
      this.logger.verbose(
        `Net demand range: max=${summary.max_net_demand_mwh.toFixed(2)} MWh, min=${summary.min_net_demand_mwh.toFixed(2)} MWh`,
      );
    }
    const average = summary.average_marginal_price_gbp_per_mwh;
    this.logger.log(average === null ? "Average price: n/a (empty horizon)" : `Average price: £${average.toFixed(2)}/MWh`);
    if (summary.shortage_hours > 0) {
      this.logger.warn(`System shortage detected in ${summary.shortage_hours} hours.`);
    }
  }
}
