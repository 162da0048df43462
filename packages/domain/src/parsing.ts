import { dispatchInputSchema, hourlyResultSchema } from "./simulation";
import type { DispatchInput, HourlyResult } from "./simulation";

/** Validates loader output against the dispatch input contract. Throws `ZodError` on mismatch. */
export function parseDispatchInput(raw: unknown): DispatchInput {
  return dispatchInputSchema.parse(raw);
}

export function parseHourlyResults(raw: unknown): HourlyResult[] {
  return hourlyResultSchema.array().parse(raw);
}
