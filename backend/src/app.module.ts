import { Module } from "@nestjs/common";

import { DispatchServicesModule } from "./dispatch-services.module";

@Module({
  imports: [DispatchServicesModule],
})
export class AppModule {
}
