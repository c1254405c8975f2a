import crypto from "crypto";
import fs from "fs";
import path from "path";
import { createCooldownRecovery, createManualRecovery, RecoveryHandler } from "../antibot";
import { createPlaywrightLauncher, SessionLauncher } from "../automation";
import { AppConfig, configPath, defaultConfig, loadConfig, saveConfig } from "../config";
import { MAX_WORKERS } from "../config/validate";
import { ScrapeOrchestrator, ScrapeSettings } from "../core/orchestrator";
import { ScrapeStats } from "../core/stats";
import { createLogger, createRunLogger, Logger } from "../logging";
import { createSiteRegistry } from "../sites";
import { FileJobStore, JobQuery } from "../storage/jobStore";
import { SiteAdapter } from "../types/site";

export async function runCli(args: string[] = process.argv.slice(2)): Promise<void> {
  const command = args[0] ?? "";

  switch (command) {
    case "init":
      await handleInit();
      return;
    case "config":
      await handleConfig(args.slice(1));
      return;
    case "scrape":
      await handleScrape(args.slice(1));
      return;
    case "jobs":
      await handleJobs(args.slice(1));
      return;
    case "stats":
      await handleStats();
      return;
    case "clear":
      await handleClear(args.slice(1));
      return;
    default:
      printHelp();
      return;
  }
}

async function handleInit(): Promise<void> {
  const config = defaultConfig();
  saveConfig(config);
  process.stdout.write(`Initialized config at ${configPath()}\n`);
}

async function handleConfig(args: string[]): Promise<void> {
  const subcommand = args[0] ?? "";
  if (subcommand !== "show") {
    process.stderr.write("Unknown config command. Use: jobscout config show\n");
    return;
  }

  const config = loadConfig();
  process.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
}

export interface ScrapeRequest {
  keywords: string[];
  site: string;
  pagesPerKeyword: number;
  workerCount: number;
  cutoffDays: number;
  headless: boolean;
}

export function parseScrapeArgs(args: string[], config: AppConfig): ScrapeRequest {
  const keywords = readMultiFlag(args, "--keyword");
  return {
    keywords: keywords.length > 0 ? keywords : config.search.keywords,
    site: readFlag(args, "--site") ?? config.app.site,
    pagesPerKeyword: readPositiveInt(args, "--pages", config.search.pagesPerKeyword),
    workerCount: Math.min(MAX_WORKERS, readPositiveInt(args, "--workers", config.search.workerCount)),
    cutoffDays: readPositiveInt(args, "--cutoff-days", config.search.cutoffDays),
    headless: hasFlag(args, "--headless") || config.app.headless,
  };
}

export function buildScrapeSettings(config: AppConfig, request: ScrapeRequest): Partial<ScrapeSettings> {
  return {
    headless: request.headless,
    cutoffDays: request.cutoffDays,
    policy: config.filter,
    maxRetries: config.search.maxRetries,
    maxRecoveryAttempts: config.antiBot.maxRecoveryAttempts,
    navigationTimeoutMs: config.search.navigationTimeoutMs,
    pageDelayMs: config.pacing.pageDelayMs,
    keywordDelayMs: config.pacing.keywordDelayMs,
    emptyPageThreshold: config.search.emptyPageThreshold,
    resolver: {
      clickTimeoutMs: config.resolver.clickTimeoutMs,
      settleMs: config.resolver.settleMs,
      minLinkTextLength: config.resolver.minLinkTextLength,
      navigationTimeoutMs: config.search.navigationTimeoutMs,
    },
  };
}

function createRecovery(
  config: AppConfig,
  adapter: SiteAdapter,
  launcher: SessionLauncher,
  logger: Logger
): RecoveryHandler {
  if (config.antiBot.recovery === "cooldown") {
    return createCooldownRecovery({ cooldownMs: config.antiBot.cooldownMs, logger });
  }
  return createManualRecovery({
    launcher,
    markers: adapter.verification,
    logger,
    maxWaitMs: config.antiBot.manualWaitMs,
  });
}

async function handleScrape(args: string[]): Promise<void> {
  const config = loadConfig();
  const request = parseScrapeArgs(args, config);
  if (request.keywords.length === 0) {
    process.stderr.write("No keywords configured. Use --keyword <value> or set search.keywords in the config.\n");
    return;
  }

  const adapter = createSiteRegistry().get(request.site);
  if (!adapter) {
    process.stderr.write(`Unknown site '${request.site}'. Use eluta or indeed.\n`);
    return;
  }

  const runId = generateRunId();
  const logDir = path.join(config.app.dataDir, "runs", runId);
  fs.mkdirSync(logDir, { recursive: true });
  const runLogger = createRunLogger(logDir, runId);
  writeRunManifest(logDir, {
    runId,
    startedAt: new Date().toISOString(),
    site: adapter.name,
    keywords: request.keywords,
    pagesPerKeyword: request.pagesPerKeyword,
    workerCount: request.workerCount,
  });

  const logger = createLogger("scrape");
  const launcher = createPlaywrightLauncher({
    slowMoMs: config.app.slowMoMs,
    navigationTimeoutMs: config.search.navigationTimeoutMs,
  });
  const orchestrator = new ScrapeOrchestrator({
    adapter,
    store: new FileJobStore(config.app.storePath),
    launcher,
    recovery: createRecovery(config, adapter, launcher, logger.child("recovery")),
    settings: buildScrapeSettings(config, request),
    logger,
    runLogger,
    runId,
  });

  const controller = new AbortController();
  const onInterrupt = () => {
    process.stdout.write("Stopping after the current pages finish...\n");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);
  let stats: ScrapeStats;
  try {
    stats = await orchestrator.run({
      keywords: request.keywords,
      pagesPerKeyword: request.pagesPerKeyword,
      workerCount: request.workerCount,
      signal: controller.signal,
    });
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }

  for (const line of formatStats(stats)) {
    process.stdout.write(`${line}\n`);
  }
  const logPath = runLogger.getLogPath();
  if (logPath) {
    process.stdout.write(`Run log: ${logPath}\n`);
  }
}

async function handleJobs(args: string[]): Promise<void> {
  const subcommand = args[0] ?? "";
  if (subcommand !== "list") {
    process.stderr.write("Unknown jobs command. Use: jobscout jobs list [--limit N]\n");
    return;
  }

  const config = loadConfig();
  const store = new FileJobStore(config.app.storePath);
  const query: JobQuery = { limit: readPositiveInt(args, "--limit", 20) };
  const company = readFlag(args, "--company");
  if (company) {
    query.company = company;
  }
  const sinceDays = readFlag(args, "--since-days");
  if (sinceDays !== undefined) {
    const days = Number(sinceDays);
    if (Number.isFinite(days) && days >= 0) {
      query.since = new Date(Date.now() - days * 24 * 60 * 60 * 1000);
    }
  }
  if (hasFlag(args, "--unapplied")) {
    query.applied = false;
  }

  const records = await store.list(query);
  if (records.length === 0) {
    process.stdout.write("No jobs stored. Run: jobscout scrape --keyword <value>\n");
    return;
  }

  for (const { job } of records) {
    process.stdout.write(`${job.company} | ${job.title} | ${job.location} | ${job.atsVendor}\n`);
    process.stdout.write(`  ${job.applyUrl}\n`);
  }
}

async function handleStats(): Promise<void> {
  const config = loadConfig();
  const stats = await new FileJobStore(config.app.storePath).stats();
  process.stdout.write(`Stored jobs: ${stats.total}\n`);
  printCounts("By site", stats.bySite);
  printCounts("By ATS", stats.byVendor);
  printCounts("By company", stats.byCompany);
}

async function handleClear(args: string[]): Promise<void> {
  if (!hasFlag(args, "--yes")) {
    process.stderr.write("Refusing to clear the job store without --yes.\n");
    return;
  }
  const config = loadConfig();
  const removed = await new FileJobStore(config.app.storePath).clearAll();
  process.stdout.write(`Removed ${removed} job(s).\n`);
}

export function formatStats(stats: ScrapeStats): string[] {
  const lines = [
    `Keywords processed: ${stats.keywordsProcessed}`,
    `Pages scraped: ${stats.pagesScraped}`,
    `Jobs found: ${stats.jobsFound}`,
    `Jobs saved: ${stats.jobsSaved}`,
    `Duplicates skipped: ${stats.duplicatesSkipped}`,
    `Errors encountered: ${stats.errorsEncountered}`,
    `Elapsed: ${(stats.elapsedMs / 1000).toFixed(1)}s`,
  ];
  if (stats.candidatesLost > 0) {
    lines.push(`Candidates lost on reload: ${stats.candidatesLost}`);
  }
  if (stats.suspectedCount > 0 || stats.abandonedWorkers > 0) {
    lines.push(
      `Verification: ${stats.suspectedCount} suspected, ${stats.recoveredCount} recovered, ${stats.abandonedWorkers} abandoned`
    );
  }
  for (const [keyword, counts] of Object.entries(stats.perKeyword)) {
    lines.push(`  ${keyword}: ${counts.pagesScraped} page(s), ${counts.jobsFound} found, ${counts.jobsSaved} saved`);
  }
  return lines;
}

function printCounts(label: string, counts: Partial<Record<string, number>>): void {
  process.stdout.write(`${label}:\n`);
  for (const [key, count] of Object.entries(counts)) {
    process.stdout.write(`  ${key}: ${count ?? 0}\n`);
  }
}

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) {
    return undefined;
  }

  return args[index + 1];
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

function readMultiFlag(args: string[], name: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    if (args[i] === name && typeof args[i + 1] === "string") {
      values.push(...splitList(args[i + 1]));
    }
  }
  return values;
}

function readPositiveInt(args: string[], name: string, fallback: number): number {
  const value = Number(readFlag(args, name) ?? fallback);
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function generateRunId(): string {
  const stamp = new Date().toISOString().replace(/[-:.TZ]/g, "");
  const random = crypto.randomBytes(3).toString("hex");
  return `${stamp}_${random}`;
}

function writeRunManifest(
  logDir: string,
  payload: {
    runId: string;
    startedAt: string;
    site: string;
    keywords: string[];
    pagesPerKeyword: number;
    workerCount: number;
  }
): void {
  const manifestPath = path.join(logDir, "manifest.json");
  fs.writeFileSync(manifestPath, JSON.stringify(payload, null, 2), "utf8");
}

function printHelp(): void {
  process.stdout.write("jobscout <command>\n\n");
  process.stdout.write("Commands:\n");
  process.stdout.write("  init\n");
  process.stdout.write("  config show\n");
  process.stdout.write(
    "  scrape [--keyword <value>]... [--pages N] [--workers N] [--cutoff-days N] [--site eluta|indeed] [--headless]\n"
  );
  process.stdout.write("  jobs list [--limit N] [--company <name>] [--since-days N] [--unapplied]\n");
  process.stdout.write("  stats\n");
  process.stdout.write("  clear --yes\n");
}
