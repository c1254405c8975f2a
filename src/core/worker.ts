import { detectVerification } from "../antibot/detector";
import { RecoveryHandler, RecoveryResult } from "../antibot/recovery";
import { VerificationStateMachine, VerificationTransition } from "../antibot/stateMachine";
import { SessionCookie, SessionLauncher } from "../automation/session";
import { DelayRange, Pacer, withTimeout } from "../automation/timing";
import { capturePageSnapshot, extractCandidates } from "../discovery/extractor";
import { evaluateJob, SeniorityPolicy } from "../discovery/filterJobs";
import { ListingRestoreError, Resolution, UrlResolver } from "../discovery/resolver";
import { Logger } from "../logging/logger";
import { RunEvent, RunLogger } from "../logging/runLogger";
import { JobStore } from "../storage/jobStore";
import { SessionState } from "../types/context";
import { CandidateRecord, PageSnapshot, ResolvedJob, WorkItem } from "../types/jobs";
import { SiteAdapter } from "../types/site";
import {
  describeError,
  isSessionCrash,
  PageLoadError,
  TimeoutError,
  VerificationAbandonedError,
  WorkerFatalError,
} from "./errors";
import { createEmptyStats, increment, keywordStats, ScrapeStats } from "./stats";
import { PageOutcome, WorkQueue } from "./workQueue";

export interface WorkerSettings {
  headless: boolean;
  cutoffDays: number;
  policy: SeniorityPolicy;
  maxRetries: number;
  maxRecoveryAttempts: number;
  navigationTimeoutMs: number;
  snapshotTimeoutMs: number;
  detectionTimeoutMs: number;
  pageDelayMs: DelayRange;
  keywordDelayMs: DelayRange;
}

export interface WorkerDeps {
  id: number;
  runId: string;
  adapter: SiteAdapter;
  queue: WorkQueue;
  store: JobStore;
  launcher: SessionLauncher;
  recovery: RecoveryHandler;
  resolver: UrlResolver;
  settings: WorkerSettings;
  pacer: Pacer;
  logger: Logger;
  runLogger: RunLogger;
  onTransition?: (transition: VerificationTransition) => void;
}

export type WorkerExit = "drained" | "abandoned" | "fatal";

export interface WorkerReport {
  workerId: number;
  exit: WorkerExit;
  stats: ScrapeStats;
}

/**
 * Owns one browser session and processes work items one at a time until the
 * queue runs dry, its session dies, or verification recovery is abandoned.
 */
export class ScrapeWorker {
  private deps: WorkerDeps;
  private stats = createEmptyStats();
  private machine: VerificationStateMachine;
  private lastKeyword: string | null = null;

  constructor(deps: WorkerDeps) {
    this.deps = deps;
    this.machine = new VerificationStateMachine(deps.id, deps.settings.maxRecoveryAttempts, (transition) =>
      this.handleTransition(transition)
    );
  }

  async run(): Promise<WorkerReport> {
    const { queue, logger } = this.deps;
    let state: SessionState;
    try {
      state = await this.openSession([]);
    } catch (error) {
      logger.error(`Worker ${this.deps.id} could not start a browser session: ${describeError(error)}`);
      this.stats.failedWorkers += 1;
      return this.report("fatal");
    }

    let exit: WorkerExit = "drained";
    try {
      for (;;) {
        const item = await queue.next();
        if (!item) {
          break;
        }
        const result = await this.runItem(item, state);
        if (result !== "continue") {
          exit = result;
          break;
        }
      }
    } finally {
      await this.closeSession(state);
    }
    return this.report(exit);
  }

  private async runItem(item: WorkItem, state: SessionState): Promise<"continue" | WorkerExit> {
    const { queue, logger, settings } = this.deps;
    try {
      const outcome = await this.processItem(item, state);
      queue.complete(item, outcome);
      state.consecutiveFailures = 0;
      return "continue";
    } catch (error) {
      if (error instanceof VerificationAbandonedError) {
        logger.warn(error.message);
        queue.requeue(item);
        return "abandoned";
      }
      if (error instanceof WorkerFatalError || isSessionCrash(error)) {
        logger.error(`Worker ${this.deps.id} session crashed on "${item.keyword}" page ${item.page}: ${describeError(error)}`);
        this.stats.failedWorkers += 1;
        queue.requeue(item);
        return "fatal";
      }

      state.consecutiveFailures += 1;
      this.stats.errorsEncountered += 1;
      const decision = queue.fail(item, settings.maxRetries);
      if (decision === "retry") {
        this.stats.itemsRetried += 1;
      } else {
        this.stats.itemsDropped += 1;
      }
      logger.warn(
        `"${item.keyword}" page ${item.page} failed (attempt ${item.attempts + 1}, ${decision}): ${describeError(error)}`
      );
      this.logEvent({ step: "page-failed", keyword: item.keyword, page: item.page, status: decision, reason: describeError(error) });
      return "continue";
    }
  }

  private async processItem(item: WorkItem, state: SessionState): Promise<PageOutcome> {
    const { adapter, pacer, settings, logger } = this.deps;
    if (this.lastKeyword !== null && this.lastKeyword !== item.keyword) {
      await pacer.pause(settings.keywordDelayMs);
    }
    this.lastKeyword = item.keyword;
    await pacer.pause(settings.pageDelayMs);

    const url = adapter.buildSearchUrl(item.keyword, item.page);
    await this.loadPage(state, url);
    await this.ensureClear(state, url);

    let candidates = await this.snapshotCandidates(state, item);
    this.stats.pagesScraped += 1;
    keywordStats(this.stats, item.keyword).pagesScraped += 1;
    logger.info(`"${item.keyword}" page ${item.page}: ${candidates.length} candidates`);
    this.logEvent({ step: "page", keyword: item.keyword, page: item.page, count: candidates.length, url });

    if (candidates.length === 0) {
      return { empty: true, admitted: 0 };
    }

    let admitted = 0;
    for (let index = 0; index < candidates.length; index += 1) {
      this.stats.candidatesSeen += 1;
      const resolution = await this.resolveCandidate(candidates[index], state, url);
      if (await this.record(resolution.job)) {
        admitted += 1;
      }
      if (!resolution.pageReloaded) {
        continue;
      }
      // A reload is a fresh page load and may land on a verification wall.
      await this.ensureClear(state, url);
      if (index + 1 < candidates.length) {
        // Element handles died with the navigation; re-read the page and carry on.
        const fresh = await this.snapshotCandidates(state, item);
        const lost = candidates.length - Math.max(fresh.length, index + 1);
        if (lost > 0) {
          this.stats.candidatesLost += lost;
          logger.warn(`"${item.keyword}" page ${item.page}: ${lost} candidates missing after reload`);
          this.logEvent({ step: "candidates-lost", keyword: item.keyword, page: item.page, count: lost, url });
        }
        candidates = [...candidates.slice(0, index + 1), ...fresh.slice(index + 1)];
      }
    }
    return { empty: false, admitted };
  }

  private async resolveCandidate(candidate: CandidateRecord, state: SessionState, url: string): Promise<Resolution> {
    let resolution: Resolution;
    try {
      resolution = await this.deps.resolver.resolve(candidate, state);
    } catch (error) {
      if (isSessionCrash(error)) {
        throw new WorkerFatalError(this.deps.id, error);
      }
      if (!(error instanceof ListingRestoreError)) {
        throw new PageLoadError(candidate.listingUrl, error);
      }
      // The candidate was resolved but the page never made it back; reload it here.
      await this.loadPage(state, url);
      resolution = { ...error.resolution, pageReloaded: true, error: error.message };
    }

    increment(this.stats.resolutions, resolution.outcome);
    if (resolution.error) {
      this.stats.errorsEncountered += 1;
      this.deps.logger.warn(`Resolution of "${resolution.job.title}" failed: ${resolution.error}`);
    }
    this.logEvent({
      step: "resolution",
      keyword: candidate.sourceKeyword,
      page: candidate.sourcePage,
      status: resolution.outcome,
      title: resolution.job.title,
      company: resolution.job.company,
      url: resolution.job.applyUrl,
      ats: resolution.job.atsVendor,
    });
    return resolution;
  }

  private async record(job: ResolvedJob): Promise<boolean> {
    const { settings, store, logger } = this.deps;
    const decision = evaluateJob(job, settings.cutoffDays, settings.policy);
    increment(this.stats.filterReasons, decision.reason);
    if (!decision.admitted) {
      return false;
    }

    const counts = keywordStats(this.stats, job.sourceKeyword);
    this.stats.jobsFound += 1;
    counts.jobsFound += 1;
    this.stats.jobs.push(job);

    try {
      const inserted = await store.insert(job);
      if (inserted) {
        this.stats.jobsSaved += 1;
        counts.jobsSaved += 1;
      } else {
        this.stats.duplicatesSkipped += 1;
        counts.duplicatesSkipped += 1;
      }
      this.logEvent({
        step: "store",
        keyword: job.sourceKeyword,
        page: job.sourcePage,
        status: inserted ? "saved" : "duplicate",
        title: job.title,
        company: job.company,
      });
    } catch (error) {
      this.stats.errorsEncountered += 1;
      logger.error(`Failed to store "${job.title}": ${describeError(error)}`);
    }
    return true;
  }

  private async snapshotCandidates(state: SessionState, item: WorkItem): Promise<CandidateRecord[]> {
    const { adapter, settings, logger } = this.deps;
    const url = state.page.url();
    let snapshot: PageSnapshot;
    try {
      snapshot = await withTimeout(capturePageSnapshot(state.page, adapter), settings.snapshotTimeoutMs, "page snapshot");
    } catch (error) {
      if (isSessionCrash(error)) {
        throw new WorkerFatalError(this.deps.id, error);
      }
      if (error instanceof TimeoutError) {
        // The stalled read still holds the page; nothing else may touch it.
        logger.warn(`Worker ${this.deps.id} replacing its session after a stalled snapshot`);
        await this.replaceSession(state, await state.session.cookies());
      }
      throw new PageLoadError(url, error);
    }
    return extractCandidates(snapshot, adapter, { keyword: item.keyword, page: item.page });
  }

  private async loadPage(state: SessionState, url: string): Promise<void> {
    try {
      await state.page.goto(url, this.deps.settings.navigationTimeoutMs);
    } catch (error) {
      if (isSessionCrash(error)) {
        throw new WorkerFatalError(this.deps.id, error);
      }
      throw new PageLoadError(url, error);
    }
  }

  /**
   * Runs verification recovery until the page loads clean, or abandons once
   * the attempt budget is spent.
   */
  private async ensureClear(state: SessionState, url: string): Promise<void> {
    const { adapter, settings, recovery } = this.deps;
    let signal = await detectVerification(state.page, adapter.verification, settings.detectionTimeoutMs);

    while (signal.detected) {
      const reason = `${signal.source}: ${signal.marker}`;
      this.machine.suspect(reason);
      state.suspended = true;
      let recovered = false;
      while (!recovered) {
        if (!this.machine.canAttemptRecovery()) {
          this.machine.abandon("recovery attempts exhausted");
          throw new VerificationAbandonedError(this.deps.id, this.machine.attempts);
        }
        this.machine.beginVerification();
        const cookies = await state.session.cookies();
        let result: RecoveryResult;
        try {
          result = await recovery({ workerId: this.deps.id, url, attempt: this.machine.attempts, reason, cookies });
        } catch (error) {
          result = { recovered: false, reason: describeError(error) };
        }
        if (result.recovered) {
          await this.replaceSession(state, result.cookies ?? cookies);
          this.machine.markRecovered();
          state.suspended = false;
          recovered = true;
        } else {
          this.machine.markFailedAttempt(result.reason);
        }
      }

      await this.loadPage(state, url);
      signal = await detectVerification(state.page, adapter.verification, settings.detectionTimeoutMs);
    }

    this.machine.confirmHealthy();
  }

  private async openSession(cookies: SessionCookie[]): Promise<SessionState> {
    const session = await this.deps.launcher({ headless: this.deps.settings.headless, cookies });
    const page = await session.newPage();
    return { workerId: this.deps.id, session, page, consecutiveFailures: 0, suspended: false };
  }

  /**
   * Recovery never mutates a live session: the old one is closed and a fresh
   * one is launched with the recovered cookies.
   */
  private async replaceSession(state: SessionState, cookies: SessionCookie[]): Promise<void> {
    await this.closeSession(state);
    let fresh: SessionState;
    try {
      fresh = await this.openSession(cookies);
    } catch (error) {
      throw new WorkerFatalError(this.deps.id, error);
    }
    state.session = fresh.session;
    state.page = fresh.page;
  }

  private async closeSession(state: SessionState): Promise<void> {
    try {
      await state.session.close();
    } catch (error) {
      this.deps.logger.warn(`Worker ${this.deps.id} failed to close its session: ${describeError(error)}`);
    }
  }

  private handleTransition(transition: VerificationTransition): void {
    if (transition.to === "suspected" && transition.from !== "verifying") {
      this.stats.suspectedCount += 1;
    } else if (transition.to === "recovered") {
      this.stats.recoveredCount += 1;
    } else if (transition.to === "abandoned") {
      this.stats.abandonedWorkers += 1;
    }
    this.deps.logger.info(
      `Worker ${transition.workerId} verification ${transition.from} -> ${transition.to}` +
        (transition.reason ? ` (${transition.reason})` : "")
    );
    this.logEvent({
      step: "verification",
      status: `${transition.from}->${transition.to}`,
      reason: transition.reason,
      count: transition.attempts,
    });
    this.deps.onTransition?.(transition);
  }

  private logEvent(event: Omit<RunEvent, "runId" | "workerId" | "timestamp">): void {
    this.deps.runLogger.logEvent({
      runId: this.deps.runId,
      workerId: this.deps.id,
      ...event,
      timestamp: new Date().toISOString(),
    });
  }

  private report(exit: WorkerExit): WorkerReport {
    return { workerId: this.deps.id, exit, stats: this.stats };
  }
}
