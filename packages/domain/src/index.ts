export { EnergyPrice, GasPrice } from "./price";
export { Power } from "./power";
export { Energy } from "./energy";
export { Duration } from "./duration";
export { AlignmentError, LookupError, describeError } from "./errors";
export * from "./simulation";
export * from "./parsing";
