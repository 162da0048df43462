const PENCE_PER_POUND = 100;
// therms in one MWh of gas
const THERMS_PER_MWH = 34.121;

export class EnergyPrice {
  private readonly _gbpPerMwh: number;

  private constructor(gbpPerMwh: number) {
    if (!Number.isFinite(gbpPerMwh)) {
      throw new TypeError("EnergyPrice requires a finite numeric value in GBP/MWh");
    }
    this._gbpPerMwh = gbpPerMwh;
  }

  static fromGbpPerMwh(value: number): EnergyPrice {
    return new EnergyPrice(value);
  }

  get gbpPerMwh(): number {
    return this._gbpPerMwh;
  }

  toJSON(): number {
    return this._gbpPerMwh;
  }

  /** Cost per MWh of output for a unit converting fuel at the given efficiency. */
  atEfficiency(efficiency: number): EnergyPrice {
    if (!(efficiency > 0)) {
      throw new RangeError(`Efficiency must be positive, got ${efficiency}`);
    }
    return new EnergyPrice(this._gbpPerMwh / efficiency);
  }
}

export class GasPrice {
  private readonly _pencePerTherm: number;

  private constructor(pencePerTherm: number) {
    if (!Number.isFinite(pencePerTherm)) {
      throw new TypeError("GasPrice requires a finite numeric value in pence per therm");
    }
    this._pencePerTherm = pencePerTherm;
  }

  static fromPencePerTherm(value: number): GasPrice {
    return new GasPrice(value);
  }

  toJSON(): number {
    return this._pencePerTherm;
  }

  toEnergyPrice(): EnergyPrice {
    return EnergyPrice.fromGbpPerMwh(this._pencePerTherm / PENCE_PER_POUND * THERMS_PER_MWH);
  }
}
