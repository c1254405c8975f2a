import fs from "fs";
import os from "os";
import path from "path";
import { DelayRange } from "../automation/timing";
import { DEFAULT_SENIORITY_POLICY, SeniorityPolicy } from "../discovery/filterJobs";
import { validateConfig } from "./validate";
import { migrateConfig } from "./migrate";

export type RecoveryMode = "manual" | "cooldown";

export interface AppConfig {
  schemaVersion: number;
  app: {
    dataDir: string;
    storePath: string;
    headless: boolean;
    slowMoMs: number;
    site: string;
  };
  search: {
    keywords: string[];
    pagesPerKeyword: number;
    workerCount: number;
    cutoffDays: number;
    maxRetries: number;
    emptyPageThreshold: number;
    navigationTimeoutMs: number;
  };
  filter: SeniorityPolicy;
  resolver: {
    clickTimeoutMs: number;
    settleMs: number;
    minLinkTextLength: number;
  };
  pacing: {
    pageDelayMs: DelayRange;
    keywordDelayMs: DelayRange;
  };
  antiBot: {
    maxRecoveryAttempts: number;
    recovery: RecoveryMode;
    cooldownMs: number;
    manualWaitMs: number;
  };
}

export function defaultDataDir(): string {
  return path.join(os.homedir(), ".jobscout");
}

export function defaultConfig(): AppConfig {
  const dataDir = defaultDataDir();
  return {
    schemaVersion: 1,
    app: {
      dataDir,
      storePath: path.join(dataDir, "jobs.json"),
      headless: false,
      slowMoMs: 200,
      site: "eluta",
    },
    search: {
      keywords: [],
      pagesPerKeyword: 5,
      workerCount: 2,
      cutoffDays: 14,
      maxRetries: 2,
      emptyPageThreshold: 2,
      navigationTimeoutMs: 30000,
    },
    filter: {
      tooSenior: [...DEFAULT_SENIORITY_POLICY.tooSenior],
      entryLevel: [...DEFAULT_SENIORITY_POLICY.entryLevel],
      excludeKeywords: [],
    },
    resolver: {
      clickTimeoutMs: 8000,
      settleMs: 3000,
      minLinkTextLength: 10,
    },
    pacing: {
      pageDelayMs: [2000, 5000],
      keywordDelayMs: [5000, 10000],
    },
    antiBot: {
      maxRecoveryAttempts: 3,
      recovery: "manual",
      cooldownMs: 300000,
      manualWaitMs: 120000,
    },
  };
}

export function configPath(): string {
  const override = process.env.JOBSCOUT_CONFIG;
  if (override && override.length > 0) {
    return path.resolve(override);
  }
  return path.join(defaultDataDir(), "config.json");
}

export function loadConfig(): AppConfig {
  const filePath = configPath();
  if (!fs.existsSync(filePath)) {
    return defaultConfig();
  }

  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  const migrated = migrateConfig(parsed);
  const validated = validateConfig(migrated.config);
  if (migrated.changed) {
    saveConfig(validated);
  }
  return validated;
}

export function saveConfig(config: AppConfig): void {
  const filePath = configPath();
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2));
}
