export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Raised when an hourly input series does not share the demand series' hour index.
 * `input` names the offending series (e.g. `gas_prices` or `wind_load_factors.columns.WF1`).
 */
export class AlignmentError extends Error {
  override readonly name = "AlignmentError";

  constructor(readonly input: string, message: string) {
    super(message);
  }
}

/** Raised when a renewable plant has no load-factor column of the same name. */
export class LookupError extends Error {
  override readonly name = "LookupError";

  constructor(readonly plant: string, readonly source: string, message: string) {
    super(message);
  }
}
