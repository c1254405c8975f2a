import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultConfig, loadConfig } from "../../src/config";
import { migrateConfig } from "../../src/config/migrate";
import { validateConfig } from "../../src/config/validate";

describe("validateConfig", () => {
  it("fills every section from the defaults", () => {
    expect(validateConfig({})).toEqual(defaultConfig());
    expect(validateConfig("not an object")).toEqual(defaultConfig());
  });

  it("clamps and cleans search settings", () => {
    const config = validateConfig({
      search: { keywords: [" data analyst ", "", "sql"], workerCount: 20, pagesPerKeyword: "5", cutoffDays: 7.9 },
    });
    expect(config.search.keywords).toEqual(["data analyst", "sql"]);
    expect(config.search.workerCount).toBe(8);
    expect(config.search.pagesPerKeyword).toBe(5);
    expect(config.search.cutoffDays).toBe(7);
    expect(validateConfig({ search: { workerCount: 0 } }).search.workerCount).toBe(1);
  });

  it("rejects malformed delay ranges and unknown recovery modes", () => {
    const config = validateConfig({
      pacing: { pageDelayMs: [5000, 1000], keywordDelayMs: [1000, 2000] },
      antiBot: { recovery: "robot" },
    });
    expect(config.pacing.pageDelayMs).toEqual([2000, 5000]);
    expect(config.pacing.keywordDelayMs).toEqual([1000, 2000]);
    expect(config.antiBot.recovery).toBe("manual");
    expect(validateConfig({ antiBot: { recovery: "cooldown" } }).antiBot.recovery).toBe("cooldown");
  });

  it("expands the home directory and derives the store path", () => {
    const config = validateConfig({ app: { dataDir: "~/scout" } });
    expect(config.app.dataDir).toBe(path.join(os.homedir(), "scout"));
    expect(config.app.storePath).toBe(path.join(os.homedir(), "scout", "jobs.json"));
  });
});

describe("migrateConfig", () => {
  it("moves top-level keywords into the search section", () => {
    expect(migrateConfig({ keywords: ["data analyst"], search: { pagesPerKeyword: 3 } })).toEqual({
      config: { schemaVersion: 1, search: { keywords: ["data analyst"], pagesPerKeyword: 3 } },
      changed: true,
    });
  });

  it("leaves a current file alone", () => {
    const raw = { schemaVersion: 1, search: { keywords: ["sql"] } };
    expect(migrateConfig(raw)).toEqual({ config: raw, changed: false });
  });

  it("replaces a file that is not an object", () => {
    const result = migrateConfig([1, 2, 3]);
    expect(result.changed).toBe(true);
    expect(validateConfig(result.config)).toEqual(defaultConfig());
  });
});

describe("loadConfig", () => {
  let dir: string;
  let previous: string | undefined;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "jobscout-config-"));
    previous = process.env.JOBSCOUT_CONFIG;
    process.env.JOBSCOUT_CONFIG = path.join(dir, "config.json");
  });

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.JOBSCOUT_CONFIG;
    } else {
      process.env.JOBSCOUT_CONFIG = previous;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns the defaults when no file exists", () => {
    expect(loadConfig()).toEqual(defaultConfig());
    expect(fs.existsSync(path.join(dir, "config.json"))).toBe(false);
  });

  it("migrates an old file and writes it back", () => {
    const filePath = path.join(dir, "config.json");
    fs.writeFileSync(filePath, JSON.stringify({ keywords: ["data analyst"] }));

    const config = loadConfig();
    expect(config.search.keywords).toEqual(["data analyst"]);

    const saved: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    expect(saved).toMatchObject({ schemaVersion: 1, search: { keywords: ["data analyst"] } });
  });
});
