import { Injectable } from "@nestjs/common";

import type { ConfigDocument } from "./schemas";
import { requireRuntimeConfig } from "./runtime-config";

@Injectable()
export class RuntimeConfigService {
  private readonly document: ConfigDocument = requireRuntimeConfig();

  getDocument(): ConfigDocument {
    return structuredClone(this.document);
  }

  shouldLogHourlyTable(): boolean {
    return this.document.dispatch?.log_hourly_table ?? false;
  }
}
