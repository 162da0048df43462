import type { Duration } from "./duration";
import { Energy } from "./energy";

export class Power {
  private readonly _megawatts: number;

  private constructor(megawatts: number) {
    if (!Number.isFinite(megawatts)) {
      throw new TypeError("Power requires a finite numeric value in megawatts");
    }
    this._megawatts = megawatts;
  }

  static fromMegawatts(value: number): Power {
    return new Power(value);
  }

  get megawatts(): number {
    return this._megawatts;
  }

  toJSON(): number {
    return this._megawatts;
  }

  scale(factor: number): Power {
    return new Power(this._megawatts * factor);
  }

  forDuration(duration: Duration): Energy {
    return Energy.fromPowerAndDuration(this, duration);
  }
}
