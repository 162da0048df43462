import { Module } from "@nestjs/common";

import { ConfigFileService } from "./config/config-file.service";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { DispatchSimulationService } from "./simulation/dispatch-simulation.service";

@Module({
  providers: [
    DispatchSimulationService,
    ConfigFileService,
    RuntimeConfigService,
  ],
  exports: [
    DispatchSimulationService,
    ConfigFileService,
    RuntimeConfigService,
  ],
})
export class DispatchServicesModule {}
