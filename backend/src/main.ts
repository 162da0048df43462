import "reflect-metadata";

import type { INestApplicationContext, LogLevel } from "@nestjs/common";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { describeError } from "@meritstack/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { setRuntimeConfig } from "./config/runtime-config";
import type { ConfigDocument } from "./config/schemas";

export interface BootstrapOptions {
  /** Skips the config file lookup. */
  document?: ConfigDocument;
}

const LEVEL_ORDER: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];
const LEVEL_ALIASES = new Map<string, LogLevel>([
  ["fatal", "fatal"],
  ["error", "error"],
  ["warn", "warn"],
  ["warning", "warn"],
  ["info", "log"],
  ["log", "log"],
  ["debug", "debug"],
  ["verbose", "verbose"],
]);

export interface ResolvedLogLevels {
  levels: LogLevel[];
  normalized: string;
  fallbackUsed: boolean;
}

/**
 * Loads configuration, applies the log level and creates the application context
 * from which callers obtain `DispatchSimulationService`. Safe to call again in the
 * same process; each call replaces the global log levels.
 */
async function bootstrap(options: BootstrapOptions = {}): Promise<INestApplicationContext> {
  const {document, levels} = await configureGlobalLogging(options.document);
  setRuntimeConfig(document);
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(levels);
  app.flushLogs();
  return app;
}

async function configureGlobalLogging(
  provided?: ConfigDocument,
): Promise<{ document: ConfigDocument; levels: LogLevel[] }> {
  const bootstrapLogger = new Logger("bootstrap");

  let document: ConfigDocument;
  try {
    document = provided ?? await new ConfigFileService().loadDocument();
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration for logging: ${describeError(error)}`);
    throw error instanceof Error ? error : new Error(String(error));
  }

  const rawLevel = document.logging?.level ?? "info";
  const {levels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
  if (fallbackUsed) {
    bootstrapLogger.warn(`Unknown logging.level value '${rawLevel}'; defaulting to INFO`);
  }

  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalized.toUpperCase()}`);
  return {document, levels};
}

/** Maps a `logging.level` value onto the Nest levels at or above it. */
function resolveLogLevels(level: unknown): ResolvedLogLevels {
  const key = typeof level === "string" ? level.trim().toLowerCase() : "info";
  const minimum = LEVEL_ALIASES.get(key);
  const threshold = minimum ?? "log";
  return {
    levels: LEVEL_ORDER.slice(0, LEVEL_ORDER.indexOf(threshold) + 1),
    normalized: threshold === "log" ? "info" : threshold,
    fallbackUsed: minimum === undefined,
  };
}

export { bootstrap, resolveLogLevels };
