import { defaultConfig } from "./index";

export const CURRENT_SCHEMA_VERSION = 1;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function migrateConfig(raw: unknown): { config: unknown; changed: boolean } {
  if (!isRecord(raw)) {
    return { config: { ...defaultConfig(), schemaVersion: CURRENT_SCHEMA_VERSION }, changed: true };
  }

  const config: Record<string, unknown> = { ...raw };
  const schemaVersion = typeof config.schemaVersion === "number" ? config.schemaVersion : 0;
  let changed = false;

  if (schemaVersion < 1) {
    // Unversioned files kept the keyword list at the top level.
    if (Array.isArray(config.keywords)) {
      const search = isRecord(config.search) ? config.search : {};
      config.search = { keywords: config.keywords, ...search };
      delete config.keywords;
    }
    config.schemaVersion = 1;
    changed = true;
  }

  if (config.schemaVersion !== CURRENT_SCHEMA_VERSION) {
    config.schemaVersion = CURRENT_SCHEMA_VERSION;
    changed = true;
  }

  return { config, changed };
}
