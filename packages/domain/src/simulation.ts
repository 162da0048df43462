import { z } from "zod";

const finiteNumber = z.number().finite();
const nonNegative = finiteNumber.nonnegative();

export const hourLabelSchema = z.union([z.number().finite(), z.string().min(1)]);

export const renewablePlantSchema = z.object({
  name: z.string().min(1),
  capacity: nonNegative,
});

export const loadFactorTableSchema = z.object({
  hours: z.array(hourLabelSchema),
  columns: z.record(z.string(), z.array(finiteNumber)),
});

export const thermalPlantSchema = z.object({
  name: z.string().min(1).optional(),
  capacity: nonNegative,
  efficiency: finiteNumber.positive(),
});

export const demandPointSchema = z.object({
  hour: hourLabelSchema,
  demand: nonNegative,
});

export const gasPricePointSchema = z.object({
  hour: hourLabelSchema,
  price: finiteNumber,
});

const uniquePlantNames = (plants: { name: string }[], ctx: z.RefinementCtx): void => {
  const seen = new Set<string>();
  plants.forEach((plant, index) => {
    if (seen.has(plant.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, "name"],
        message: `Duplicate plant name '${plant.name}'`,
      });
    }
    seen.add(plant.name);
  });
};

export const dispatchInputSchema = z.object({
  wind_plants: z.array(renewablePlantSchema).superRefine(uniquePlantNames),
  wind_load_factors: loadFactorTableSchema,
  solar_plants: z.array(renewablePlantSchema).superRefine(uniquePlantNames),
  solar_load_factors: loadFactorTableSchema,
  gas_plants: z.array(thermalPlantSchema),
  demand: z.array(demandPointSchema),
  gas_prices: z.array(gasPricePointSchema),
});

export const hourlyResultSchema = z.object({
  hour: hourLabelSchema,
  marginal_price_gbp_per_mwh: finiteNumber,
  wind_generated_mwh: finiteNumber,
  solar_generated_mwh: finiteNumber,
  gas_generated_mwh: nonNegative,
  demand_mwh: nonNegative,
  shortage_mwh: nonNegative,
});

export type HourLabel = z.infer<typeof hourLabelSchema>;
export type RenewablePlant = z.infer<typeof renewablePlantSchema>;
export type LoadFactorTable = z.infer<typeof loadFactorTableSchema>;
export type ThermalPlant = z.infer<typeof thermalPlantSchema>;
export type DemandPoint = z.infer<typeof demandPointSchema>;
export type GasPricePoint = z.infer<typeof gasPricePointSchema>;
export type DispatchInput = z.infer<typeof dispatchInputSchema>;
export type HourlyResult = z.infer<typeof hourlyResultSchema>;

export type RenewableClass = "wind" | "solar";

export const RESULT_COLUMNS = [
  "Hour",
  "Marginal_Price_GBP",
  "Wind_Generated_MWh",
  "Solar_Generated_MWh",
  "Gas_Generated_MWh",
  "Demand_MWh",
  "Supply_Shortage_MWh",
] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

export type ResultRow = { [K in ResultColumn]: K extends "Hour" ? HourLabel : number };

export interface ResultTable {
  columns: readonly ResultColumn[];
  rows: ResultRow[];
}

export interface DispatchSummary {
  hours: number;
  average_marginal_price_gbp_per_mwh: number | null;
  shortage_hours: number;
  curtailment_hours: number;
  total_shortage_mwh: number;
  total_curtailed_mwh: number;
  total_demand_mwh: number;
  total_wind_mwh: number;
  total_solar_mwh: number;
  total_gas_mwh: number;
  max_net_demand_mwh: number | null;
  min_net_demand_mwh: number | null;
}

export interface DispatchRunResult {
  hourly: HourlyResult[];
  table: ResultTable;
  summary: DispatchSummary;
}
