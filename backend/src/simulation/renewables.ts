import { Duration, Energy, LookupError, Power } from "@meritstack/domain";
import type { LoadFactorTable, RenewableClass, RenewablePlant } from "@meritstack/domain";

const SETTLEMENT_PERIOD = Duration.oneHour();

/**
 * Total generation per hour for one renewable class: the load-factor matrix
 * times the capacity vector. Columns are matched to plants by name.
 */
export function aggregateRenewableGeneration(
  kind: RenewableClass,
  plants: readonly RenewablePlant[],
  table: LoadFactorTable,
): number[] {
  const columns = plants.map((plant) => {
    const factors = Object.prototype.hasOwnProperty.call(table.columns, plant.name)
      ? table.columns[plant.name]
      : undefined;
    if (!factors) {
      throw new LookupError(
        plant.name,
        `${kind}_load_factors`,
        `No ${kind} load factor column for plant '${plant.name}'.`,
      );
    }
    return {capacity: Power.fromMegawatts(plant.capacity), factors};
  });

  return table.hours.map((_hour, index) =>
    columns
      .reduce(
        (total, {capacity, factors}) => total.add(capacity.scale(factors[index]).forDuration(SETTLEMENT_PERIOD)),
        Energy.zero(),
      )
      .megawattHours,
  );
}

/** Load factors outside [0, 1], counted over the columns that belong to a plant. */
export function countOutOfRangeLoadFactors(plants: readonly RenewablePlant[], table: LoadFactorTable): number {
  return plants.reduce((count, plant) => {
    const factors = Object.prototype.hasOwnProperty.call(table.columns, plant.name) ? table.columns[plant.name] : [];
    return count + factors.filter((value) => value < 0 || value > 1).length;
  }, 0);
}
