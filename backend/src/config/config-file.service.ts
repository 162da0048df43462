import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import YAML from "yaml";

import type { ConfigDocument } from "./schemas";
import { parseConfigDocument } from "./schemas";

const DEFAULT_CONFIG_FILE = "config.yaml";

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  resolvePath(): string {
    const override = process.env.MERITSTACK_CONFIG_PATH?.trim();
    return resolve(process.cwd(), override && override.length > 0 ? override : DEFAULT_CONFIG_FILE);
  }

  async loadDocument(configPath: string = this.resolvePath()): Promise<ConfigDocument> {
    if (!existsSync(configPath)) {
      this.logger.verbose(`No configuration file at ${configPath}; using defaults`);
      return parseConfigDocument({});
    }
    const raw = await readFile(configPath, "utf-8");
    const parsed: unknown = YAML.parse(raw);
    const document = parseConfigDocument(parsed);
    this.logger.verbose(`Loaded configuration from ${configPath}`);
    return document;
  }
}
