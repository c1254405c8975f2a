import { WorkItem } from "../types/jobs";

export interface PageOutcome {
  /** The page produced no candidates: pagination has ended. */
  empty: boolean;
  admitted: number;
}

export type FailureDecision = "retry" | "dropped";

interface KeywordLane {
  keyword: string;
  nextPage: number;
  retry: WorkItem | null;
  inFlight: boolean;
  done: boolean;
  zeroAdmitStreak: number;
}

/**
 * Keyword x page work items. Each keyword is a lane that hands out one page
 * at a time in page order, so a page's outcome is known before the next page
 * of the same keyword is dispatched.
 */
export class WorkQueue {
  private lanes: KeywordLane[];
  private pagesPerKeyword: number;
  private emptyPageThreshold: number;
  private waiters: Array<() => void> = [];
  private closed = false;
  private paused = false;

  constructor(keywords: string[], pagesPerKeyword: number, emptyPageThreshold = 2) {
    const unique = Array.from(new Set(keywords.map((keyword) => keyword.trim()).filter((keyword) => keyword)));
    this.lanes = unique.map((keyword) => ({
      keyword,
      nextPage: 1,
      retry: null,
      inFlight: false,
      done: pagesPerKeyword < 1,
      zeroAdmitStreak: 0,
    }));
    this.pagesPerKeyword = pagesPerKeyword;
    this.emptyPageThreshold = Math.max(1, emptyPageThreshold);
  }

  /**
   * Waits for the next dispatchable item. Resolves null once the queue is
   * closed or no lane can produce more work.
   */
  async next(): Promise<WorkItem | null> {
    for (;;) {
      if (this.closed) {
        return null;
      }
      if (!this.paused) {
        const item = this.take();
        if (item) {
          return item;
        }
        if (!this.lanes.some((lane) => lane.inFlight)) {
          return null;
        }
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  complete(item: WorkItem, outcome: PageOutcome): void {
    const lane = this.release(item);
    if (!lane) {
      return;
    }
    if (outcome.empty) {
      lane.done = true;
    } else if (outcome.admitted === 0) {
      lane.zeroAdmitStreak += 1;
      if (lane.zeroAdmitStreak >= this.emptyPageThreshold) {
        lane.done = true;
      }
    } else {
      lane.zeroAdmitStreak = 0;
    }
    this.notify();
  }

  /**
   * Records a transient failure. The item goes back to the front of its lane
   * until it has used up `maxRetries` retries.
   */
  fail(item: WorkItem, maxRetries: number): FailureDecision {
    const lane = this.release(item);
    let decision: FailureDecision = "dropped";
    if (lane && item.attempts < maxRetries) {
      lane.retry = { ...item, attempts: item.attempts + 1 };
      decision = "retry";
    }
    this.notify();
    return decision;
  }

  /**
   * Returns an item whose worker stopped before finishing it, without
   * charging a retry.
   */
  requeue(item: WorkItem): void {
    const lane = this.release(item);
    if (lane) {
      lane.retry = item;
    }
    this.notify();
  }

  /**
   * Removes every item not yet dispatched and returns them.
   */
  drain(): WorkItem[] {
    const remaining: WorkItem[] = [];
    for (const lane of this.lanes) {
      if (lane.retry) {
        remaining.push(lane.retry);
        lane.retry = null;
      }
      if (!lane.done) {
        for (let page = lane.nextPage; page <= this.pagesPerKeyword; page += 1) {
          remaining.push({ keyword: lane.keyword, page, attempts: 0 });
        }
      }
      lane.nextPage = this.pagesPerKeyword + 1;
      lane.done = true;
    }
    this.notify();
    return remaining;
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.notify();
  }

  isClosed(): boolean {
    return this.closed;
  }

  pendingCount(): number {
    return this.lanes.reduce((total, lane) => {
      if (lane.done) {
        return total;
      }
      const fresh = Math.max(0, this.pagesPerKeyword - lane.nextPage + 1);
      return total + fresh + (lane.retry ? 1 : 0);
    }, 0);
  }

  private take(): WorkItem | null {
    for (const lane of this.lanes) {
      if (lane.inFlight || lane.done) {
        continue;
      }
      if (lane.retry) {
        const item = lane.retry;
        lane.retry = null;
        lane.inFlight = true;
        return item;
      }
      if (lane.nextPage <= this.pagesPerKeyword) {
        const item: WorkItem = { keyword: lane.keyword, page: lane.nextPage, attempts: 0 };
        lane.nextPage += 1;
        lane.inFlight = true;
        return item;
      }
      lane.done = true;
    }
    return null;
  }

  private release(item: WorkItem): KeywordLane | undefined {
    const lane = this.lanes.find((candidate) => candidate.keyword === item.keyword);
    if (lane) {
      lane.inFlight = false;
    }
    return lane;
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}
