import { RESULT_COLUMNS } from "@meritstack/domain";
import type { DispatchRunResult, DispatchSummary, HourlyResult, ResultRow, ResultTable } from "@meritstack/domain";

import { DispatchBranch, type SettledHour } from "./dispatch-engine";

export function toResultRow(result: HourlyResult): ResultRow {
  return {
    Hour: result.hour,
    Marginal_Price_GBP: result.marginal_price_gbp_per_mwh,
    Wind_Generated_MWh: result.wind_generated_mwh,
    Solar_Generated_MWh: result.solar_generated_mwh,
    Gas_Generated_MWh: result.gas_generated_mwh,
    Demand_MWh: result.demand_mwh,
    Supply_Shortage_MWh: result.shortage_mwh,
  };
}

export function buildResultTable(hourly: readonly HourlyResult[]): ResultTable {
  return {
    columns: RESULT_COLUMNS,
    rows: hourly.map(toResultRow),
  };
}

const sum = (values: readonly number[]): number => values.reduce((acc, value) => acc + value, 0);

export function summarizeHours(settled: readonly SettledHour[]): DispatchSummary {
  const hourly = settled.map((entry) => entry.result);
  const netDemand = settled.map((entry) => entry.dispatch.netDemand);
  const prices = hourly.map((result) => result.marginal_price_gbp_per_mwh);

  return {
    hours: hourly.length,
    average_marginal_price_gbp_per_mwh: hourly.length ? sum(prices) / hourly.length : null,
    shortage_hours: hourly.filter((result) => result.shortage_mwh > 0).length,
    curtailment_hours: settled.filter((entry) => entry.dispatch.branch === DispatchBranch.Curtailment).length,
    total_shortage_mwh: sum(hourly.map((result) => result.shortage_mwh)),
    total_curtailed_mwh: sum(settled.map((entry) => entry.dispatch.curtailed)),
    total_demand_mwh: sum(hourly.map((result) => result.demand_mwh)),
    total_wind_mwh: sum(hourly.map((result) => result.wind_generated_mwh)),
    total_solar_mwh: sum(hourly.map((result) => result.solar_generated_mwh)),
    total_gas_mwh: sum(hourly.map((result) => result.gas_generated_mwh)),
    max_net_demand_mwh: netDemand.length ? netDemand.reduce((acc, value) => Math.max(acc, value)) : null,
    min_net_demand_mwh: netDemand.length ? netDemand.reduce((acc, value) => Math.min(acc, value)) : null,
  };
}

/** Collects settled hours, already in hour-index order, into the run result. */
export function assembleResults(settled: readonly SettledHour[]): DispatchRunResult {
  const hourly = settled.map((entry) => entry.result);
  return {
    hourly,
    table: buildResultTable(hourly),
    summary: summarizeHours(settled),
  };
}

function formatCell(value: number | string): string {
  return typeof value === "number" ? value.toFixed(2) : value;
}

/** Fixed-width text rendering of the result table, one line per hour. */
export function formatResultTable(table: ResultTable): string {
  const cells = table.rows.map((row) =>
    table.columns.map((column) => (column === "Hour" ? String(row.Hour) : formatCell(row[column]))),
  );
  const widths = table.columns.map((column, index) =>
    Math.max(column.length, ...cells.map((line) => line[index].length)),
  );
  const render = (line: readonly string[]): string =>
    line.map((cell, index) => cell.padStart(widths[index])).join(" ");
  return [render(table.columns), ...cells.map(render)].join("\n");
}
