export class Duration {
  private readonly _hours: number;

  private constructor(hours: number) {
    if (!Number.isFinite(hours)) {
      throw new TypeError("Duration requires a finite numeric value in hours");
    }
    if (hours < 0) {
      throw new RangeError("Duration cannot be negative");
    }
    this._hours = hours;
  }

  static oneHour(): Duration {
    return new Duration(1);
  }

  get hours(): number {
    return this._hours;
  }

  toJSON(): number {
    return this._hours;
  }
}
