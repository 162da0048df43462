import { AlignmentError } from "@meritstack/domain";
import type { DispatchInput, HourLabel, LoadFactorTable } from "@meritstack/domain";

interface HourSequence {
  key: string;
  label: string;
  hours: readonly HourLabel[];
}

export function sameHours(reference: readonly HourLabel[], candidate: readonly HourLabel[]): boolean {
  if (reference.length !== candidate.length) {
    return false;
  }
  return reference.every((hour, index) => hour === candidate[index]);
}

function assertColumnLengths(key: string, table: LoadFactorTable): void {
  const expected = table.hours.length;
  for (const [name, values] of Object.entries(table.columns)) {
    if (values.length !== expected) {
      throw new AlignmentError(
        `${key}.columns.${name}`,
        `Load factor column '${name}' in ${key} has ${values.length} values for ${expected} hours.`,
      );
    }
  }
}

/**
 * Checks that gas prices and both load-factor tables carry exactly the demand
 * series' hour labels, in the same order. Returns the demand hour index.
 */
export function assertAlignedHours(input: DispatchInput): HourLabel[] {
  const demandHours = input.demand.map((point) => point.hour);

  const sequences: HourSequence[] = [
    {key: "gas_prices", label: "Gas prices", hours: input.gas_prices.map((point) => point.hour)},
    {key: "wind_load_factors", label: "Wind load factors", hours: input.wind_load_factors.hours},
    {key: "solar_load_factors", label: "Solar load factors", hours: input.solar_load_factors.hours},
  ];

  for (const {key, label, hours} of sequences) {
    if (!sameHours(demandHours, hours)) {
      throw new AlignmentError(key, `${label} hours do not align with demand hours.`);
    }
  }

  assertColumnLengths("wind_load_factors", input.wind_load_factors);
  assertColumnLengths("solar_load_factors", input.solar_load_factors);
  return demandHours;
}
