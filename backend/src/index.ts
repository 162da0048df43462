export { bootstrap, resolveLogLevels } from "./main";
export type { BootstrapOptions, ResolvedLogLevels } from "./main";
export { AppModule } from "./app.module";
export { DispatchServicesModule } from "./dispatch-services.module";
export { DispatchSimulationService } from "./simulation/dispatch-simulation.service";
export { simulateMeritOrderDispatch, dispatchRun } from "./simulation/simulate";
export type { DispatchRun, MeritOrderSimulation } from "./simulation/simulate";
export { prepareRunContext } from "./simulation/run-context";
export type { RunContext } from "./simulation/run-context";
export { DispatchBranch, dispatchHour, settleHour } from "./simulation/dispatch-engine";
export type { HourDispatch, UnitDispatch } from "./simulation/dispatch-engine";
export { buildMeritOrderStack } from "./simulation/merit-order";
export type { MeritOrderStack, MeritOrderUnit } from "./simulation/merit-order";
export { buildResultTable, formatResultTable } from "./simulation/result-assembler";
export { setRuntimeConfig } from "./config/runtime-config";
export type { ConfigDocument } from "./config/schemas";
