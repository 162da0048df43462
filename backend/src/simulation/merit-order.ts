import type { ThermalPlant } from "@meritstack/domain";

export interface MeritOrderUnit {
  /** Position of the plant in the caller's list. */
  index: number;
  label: string;
  capacity: number;
  efficiency: number;
}

export interface MeritOrderStack {
  units: readonly MeritOrderUnit[];
  capacities: readonly number[];
  efficiencies: readonly number[];
}

/**
 * Orders gas units by descending efficiency, i.e. ascending bid for any common
 * fuel price. Array#sort is stable, so units of equal efficiency keep their
 * input order. The caller's array is left untouched.
 */
export function buildMeritOrderStack(plants: readonly ThermalPlant[]): MeritOrderStack {
  const units = plants
    .map<MeritOrderUnit>((plant, index) => ({
      index,
      label: plant.name ?? `gas#${index + 1}`,
      capacity: plant.capacity,
      efficiency: plant.efficiency,
    }))
    .sort((a, b) => b.efficiency - a.efficiency);

  return {
    units,
    capacities: units.map((unit) => unit.capacity),
    efficiencies: units.map((unit) => unit.efficiency),
  };
}

export function totalStackCapacity(stack: MeritOrderStack): number {
  return stack.capacities.reduce((acc, capacity) => acc + capacity, 0);
}
