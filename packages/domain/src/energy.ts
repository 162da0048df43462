import type { Duration } from "./duration";
import type { Power } from "./power";

export class Energy {
  private readonly _megawattHours: number;

  private constructor(megawattHours: number) {
    if (!Number.isFinite(megawattHours)) {
      throw new TypeError("Energy requires a finite numeric value in megawatt-hours");
    }
    this._megawattHours = megawattHours;
  }

  static fromPowerAndDuration(power: Power, duration: Duration): Energy {
    return new Energy(power.megawatts * duration.hours);
  }

  static zero(): Energy {
    return new Energy(0);
  }

  get megawattHours(): number {
    return this._megawattHours;
  }

  toJSON(): number {
    return this._megawattHours;
  }

  add(other: Energy): Energy {
    return new Energy(this._megawattHours + other._megawattHours);
  }
}
