import os from "os";
import path from "path";
import { DelayRange } from "../automation/timing";
import { AppConfig, defaultConfig, RecoveryMode } from "./index";
import { CURRENT_SCHEMA_VERSION, isRecord } from "./migrate";

const RECOVERY_MODES: RecoveryMode[] = ["manual", "cooldown"];
export const MAX_WORKERS = 8;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function expandHome(value: string): string {
  if (!value.startsWith("~")) {
    return value;
  }

  return path.join(os.homedir(), value.slice(1));
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function pickString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function pickInteger(value: unknown, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.floor(value)));
}

function pickKeywords(value: unknown, fallback: string[]): string[] {
  if (!isStringArray(value)) {
    return fallback;
  }
  return value.map((item) => item.trim()).filter((item) => item.length > 0);
}

function pickRange(value: unknown, fallback: DelayRange): DelayRange {
  if (!Array.isArray(value) || value.length !== 2) {
    return fallback;
  }
  const [min, max] = value;
  if (typeof min !== "number" || typeof max !== "number" || min < 0 || max < min) {
    return fallback;
  }
  return [min, max];
}

function pickRecoveryMode(value: unknown, fallback: RecoveryMode): RecoveryMode {
  return RECOVERY_MODES.find((mode) => mode === value) ?? fallback;
}

export function validateConfig(raw: unknown): AppConfig {
  const base = defaultConfig();
  const config = isRecord(raw) ? raw : {};

  const schemaVersion =
    typeof config.schemaVersion === "number" ? config.schemaVersion : CURRENT_SCHEMA_VERSION;

  const appRaw = section(config, "app");
  const dataDir = expandHome(pickString(appRaw.dataDir, base.app.dataDir));
  const app: AppConfig["app"] = {
    dataDir,
    storePath: expandHome(pickString(appRaw.storePath, path.join(dataDir, "jobs.json"))),
    headless: pickBoolean(appRaw.headless, base.app.headless),
    slowMoMs: pickInteger(appRaw.slowMoMs, base.app.slowMoMs, 0),
    site: pickString(appRaw.site, base.app.site),
  };

  const searchRaw = section(config, "search");
  const search: AppConfig["search"] = {
    keywords: pickKeywords(searchRaw.keywords, base.search.keywords),
    pagesPerKeyword: pickInteger(searchRaw.pagesPerKeyword, base.search.pagesPerKeyword, 1),
    workerCount: pickInteger(searchRaw.workerCount, base.search.workerCount, 1, MAX_WORKERS),
    cutoffDays: pickInteger(searchRaw.cutoffDays, base.search.cutoffDays, 0),
    maxRetries: pickInteger(searchRaw.maxRetries, base.search.maxRetries, 0),
    emptyPageThreshold: pickInteger(searchRaw.emptyPageThreshold, base.search.emptyPageThreshold, 1),
    navigationTimeoutMs: pickInteger(searchRaw.navigationTimeoutMs, base.search.navigationTimeoutMs, 1000),
  };

  const filterRaw = section(config, "filter");
  const filter: AppConfig["filter"] = {
    tooSenior: pickKeywords(filterRaw.tooSenior, base.filter.tooSenior),
    entryLevel: pickKeywords(filterRaw.entryLevel, base.filter.entryLevel),
    excludeKeywords: pickKeywords(filterRaw.excludeKeywords, base.filter.excludeKeywords),
  };

  const resolverRaw = section(config, "resolver");
  const resolver: AppConfig["resolver"] = {
    clickTimeoutMs: pickInteger(resolverRaw.clickTimeoutMs, base.resolver.clickTimeoutMs, 500),
    settleMs: pickInteger(resolverRaw.settleMs, base.resolver.settleMs, 0),
    minLinkTextLength: pickInteger(resolverRaw.minLinkTextLength, base.resolver.minLinkTextLength, 0),
  };

  const pacingRaw = section(config, "pacing");
  const pacing: AppConfig["pacing"] = {
    pageDelayMs: pickRange(pacingRaw.pageDelayMs, base.pacing.pageDelayMs),
    keywordDelayMs: pickRange(pacingRaw.keywordDelayMs, base.pacing.keywordDelayMs),
  };

  const antiBotRaw = section(config, "antiBot");
  const antiBot: AppConfig["antiBot"] = {
    maxRecoveryAttempts: pickInteger(antiBotRaw.maxRecoveryAttempts, base.antiBot.maxRecoveryAttempts, 1),
    recovery: pickRecoveryMode(antiBotRaw.recovery, base.antiBot.recovery),
    cooldownMs: pickInteger(antiBotRaw.cooldownMs, base.antiBot.cooldownMs, 0),
    manualWaitMs: pickInteger(antiBotRaw.manualWaitMs, base.antiBot.manualWaitMs, 1000),
  };

  return {
    schemaVersion,
    app,
    search,
    filter,
    resolver,
    pacing,
    antiBot,
  };
}
