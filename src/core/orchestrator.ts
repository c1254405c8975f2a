import crypto from "crypto";
import { RecoveryHandler } from "../antibot/recovery";
import { VerificationTransition } from "../antibot/stateMachine";
import { SessionLauncher } from "../automation/session";
import { createPacer, Pacer } from "../automation/timing";
import { DEFAULT_SENIORITY_POLICY } from "../discovery/filterJobs";
import { ResolverOptions, UrlResolver } from "../discovery/resolver";
import { createNullLogger, Logger } from "../logging/logger";
import { createMemoryRunLogger, RunLogger } from "../logging/runLogger";
import { JobStore } from "../storage/jobStore";
import { SiteAdapter } from "../types/site";
import { mergeStats, ScrapeStats } from "./stats";
import { ScrapeWorker, WorkerReport, WorkerSettings } from "./worker";
import { WorkQueue } from "./workQueue";

export interface ScrapeRunOptions {
  keywords: string[];
  pagesPerKeyword: number;
  workerCount: number;
  signal?: AbortSignal;
}

export interface ScrapeSettings extends WorkerSettings {
  emptyPageThreshold: number;
  resolver: Partial<ResolverOptions>;
}

export const DEFAULT_SCRAPE_SETTINGS: ScrapeSettings = {
  headless: true,
  cutoffDays: 14,
  policy: DEFAULT_SENIORITY_POLICY,
  maxRetries: 2,
  maxRecoveryAttempts: 3,
  navigationTimeoutMs: 30000,
  snapshotTimeoutMs: 15000,
  detectionTimeoutMs: 5000,
  pageDelayMs: [2000, 5000],
  keywordDelayMs: [5000, 10000],
  emptyPageThreshold: 2,
  resolver: {},
};

export interface RunStatus {
  state: "idle" | "running" | "paused" | "stopping" | "stopped";
  runId?: string;
  activeWorkers: number;
  suspendedWorkers: number[];
  pendingItems: number;
  lastMessage?: string;
}

export interface Orchestrator {
  run(options: ScrapeRunOptions): Promise<ScrapeStats>;
  pause(): void;
  resume(): void;
  stop(): void;
  status(): RunStatus;
}

export interface OrchestratorDeps {
  adapter: SiteAdapter;
  store: JobStore;
  launcher: SessionLauncher;
  recovery: RecoveryHandler;
  settings?: Partial<ScrapeSettings>;
  logger?: Logger;
  runLogger?: RunLogger;
  pacer?: Pacer;
  runId?: string;
  now?: () => number;
}

export class ScrapeOrchestrator implements Orchestrator {
  private deps: OrchestratorDeps;
  private settings: ScrapeSettings;
  private logger: Logger;
  private runLogger: RunLogger;
  private pacer: Pacer;
  private now: () => number;
  private queue: WorkQueue | null = null;
  private suspended = new Set<number>();
  private statusState: RunStatus = { state: "idle", activeWorkers: 0, suspendedWorkers: [], pendingItems: 0 };

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.settings = { ...DEFAULT_SCRAPE_SETTINGS, ...deps.settings };
    this.logger = deps.logger ?? createNullLogger();
    this.runLogger = deps.runLogger ?? createMemoryRunLogger();
    this.pacer = deps.pacer ?? createPacer();
    this.now = deps.now ?? Date.now;
  }

  async run(options: ScrapeRunOptions): Promise<ScrapeStats> {
    if (this.queue) {
      throw new Error("A scrape run is already in progress");
    }

    const startedAt = this.now();
    const runId = this.deps.runId ?? crypto.randomUUID();
    const queue = new WorkQueue(options.keywords, options.pagesPerKeyword, this.settings.emptyPageThreshold);
    const workerCount = Math.max(1, Math.floor(options.workerCount));
    this.queue = queue;
    this.suspended.clear();
    this.statusState = {
      state: "running",
      runId,
      activeWorkers: workerCount,
      suspendedWorkers: [],
      pendingItems: queue.pendingCount(),
    };

    const onAbort = () => this.stop();
    if (options.signal?.aborted) {
      this.stop();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    this.logger.info(
      `Run ${runId}: ${options.keywords.length} keyword(s) x ${options.pagesPerKeyword} page(s) on ${this.deps.adapter.name} with ${workerCount} worker(s)`
    );
    this.runLogger.logEvent({ runId, step: "run-start", count: queue.pendingCount(), timestamp: new Date().toISOString() });

    const workers = Array.from({ length: workerCount }, (_value, index) => {
      const id = index + 1;
      const worker = new ScrapeWorker({
        id,
        runId,
        adapter: this.deps.adapter,
        queue,
        store: this.deps.store,
        launcher: this.deps.launcher,
        recovery: this.deps.recovery,
        resolver: new UrlResolver(this.deps.adapter, this.settings.resolver, { pacer: this.pacer }),
        settings: this.settings,
        pacer: this.pacer,
        logger: this.logger.child(`worker-${id}`),
        runLogger: this.runLogger,
        onTransition: (transition) => this.trackTransition(transition),
      });
      return worker.run().then((report) => this.workerFinished(report));
    });

    let reports: WorkerReport[];
    try {
      reports = await Promise.all(workers);
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }

    const stats = mergeStats(reports.map((report) => report.stats));
    const leftover = queue.drain();
    if (leftover.length > 0 && !queue.isClosed()) {
      stats.itemsDropped += leftover.length;
      this.logger.warn(`No workers left; dropped ${leftover.length} pending item(s)`);
    }
    stats.elapsedMs = this.now() - startedAt;

    const summary = `Scraped ${stats.pagesScraped} page(s), saved ${stats.jobsSaved} job(s)`;
    this.queue = null;
    this.statusState = {
      ...this.statusState,
      state: "stopped",
      activeWorkers: 0,
      suspendedWorkers: [],
      pendingItems: 0,
      lastMessage: summary,
    };
    this.runLogger.logEvent({
      runId,
      step: "run-end",
      count: stats.jobsSaved,
      status: queue.isClosed() ? "stopped" : "completed",
      timestamp: new Date().toISOString(),
    });
    this.logger.info(summary);
    return stats;
  }

  pause(): void {
    if (this.statusState.state === "running" && this.queue) {
      this.queue.pause();
      this.statusState = { ...this.statusState, state: "paused" };
    }
  }

  resume(): void {
    if (this.statusState.state === "paused" && this.queue) {
      this.queue.resume();
      this.statusState = { ...this.statusState, state: "running" };
    }
  }

  /**
   * Workers finish the item they hold and then exit.
   */
  stop(): void {
    if (this.queue && this.statusState.state !== "stopped") {
      this.queue.close();
      this.statusState = { ...this.statusState, state: "stopping", lastMessage: "Stop requested" };
    }
  }

  status(): RunStatus {
    return {
      ...this.statusState,
      suspendedWorkers: Array.from(this.suspended).sort((a, b) => a - b),
      pendingItems: this.queue ? this.queue.pendingCount() : this.statusState.pendingItems,
    };
  }

  private trackTransition(transition: VerificationTransition): void {
    if (transition.to === "suspected" || transition.to === "verifying") {
      this.suspended.add(transition.workerId);
    } else {
      this.suspended.delete(transition.workerId);
    }
  }

  private workerFinished(report: WorkerReport): WorkerReport {
    const message = `Worker ${report.workerId} exited (${report.exit})`;
    this.suspended.delete(report.workerId);
    this.statusState = {
      ...this.statusState,
      activeWorkers: Math.max(0, this.statusState.activeWorkers - 1),
      lastMessage: message,
    };
    if (report.exit !== "drained") {
      this.logger.warn(message);
    }
    return report;
  }
}
