import type { DispatchInput, ThermalPlant } from "@meritstack/domain";

/**
 * Three hours: a partly-served hour, a shortage hour and a renewable surplus.
 *
 *   hour  demand  wind  solar  net
 *   1     200     70    20     110
 *   2     300     20    0      280
 *   3     120     150   10     -40
 */
export function buildInput(overrides: Partial<DispatchInput> = {}): DispatchInput {
  return {
    wind_plants: [
      {name: "WF1", capacity: 100},
      {name: "WF2", capacity: 50},
    ],
    wind_load_factors: {
      hours: [1, 2, 3],
      columns: {
        WF1: [0.5, 0.2, 1],
        WF2: [0.4, 0, 1],
      },
    },
    solar_plants: [{name: "SP1", capacity: 40}],
    solar_load_factors: {
      hours: [1, 2, 3],
      columns: {
        SP1: [0.5, 0, 0.25],
      },
    },
    gas_plants: [
      {name: "CCGT-B", capacity: 100, efficiency: 0.4},
      {name: "CCGT-A", capacity: 150, efficiency: 0.6},
    ],
    demand: [
      {hour: 1, demand: 200},
      {hour: 2, demand: 300},
      {hour: 3, demand: 120},
    ],
    gas_prices: [
      {hour: 1, price: 50},
      {hour: 2, price: 100},
      {hour: 3, price: 80},
    ],
    ...overrides,
  };
}

/** Gas-only system: no renewable plants, so net demand equals demand. */
export function buildGasOnlyInput(
  demand: number[],
  gasPlants: ThermalPlant[],
  gasPrice = 50,
): DispatchInput {
  const hours = demand.map((_value, index) => index + 1);
  return {
    wind_plants: [],
    wind_load_factors: {hours, columns: {}},
    solar_plants: [],
    solar_load_factors: {hours, columns: {}},
    gas_plants: gasPlants,
    demand: demand.map((value, index) => ({hour: hours[index], demand: value})),
    gas_prices: hours.map((hour) => ({hour, price: gasPrice})),
  };
}
