import type { ConfigDocument } from "./schemas";

let current: ConfigDocument | null = null;

/** Stores the document `bootstrap()` loaded; services read it through `RuntimeConfigService`. */
export function setRuntimeConfig(document: ConfigDocument): void {
  current = document;
}

export function getRuntimeConfig(): ConfigDocument | null {
  return current;
}

export function requireRuntimeConfig(): ConfigDocument {
  if (current === null) {
    throw new Error("Runtime configuration not initialised");
  }
  return current;
}

export function clearRuntimeConfig(): void {
  current = null;
}
