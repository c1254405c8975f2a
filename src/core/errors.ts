/**
 * Error classes raised by the discovery pipeline. Failures that the pipeline
 * absorbs locally (empty pages, resolution fallbacks, duplicates) are modelled
 * as return values, not errors.
 */

/**
 * A bounded wait elapsed before the awaited operation settled.
 */
export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * A results page could not be rendered or read. The work item is retried.
 */
export class PageLoadError extends Error {
  constructor(url: string, cause: unknown) {
    super(`Failed to load ${url}: ${describeError(cause)}`);
    this.name = "PageLoadError";
  }
}

/**
 * Verification recovery ran out of attempts; the worker stops for good.
 */
export class VerificationAbandonedError extends Error {
  constructor(workerId: number, attempts: number) {
    super(`Worker ${workerId} abandoned after ${attempts} recovery attempts`);
    this.name = "VerificationAbandonedError";
  }
}

/**
 * The worker's browser session is gone. Its work item goes back to the queue.
 */
export class WorkerFatalError extends Error {
  constructor(workerId: number, cause: unknown) {
    super(`Worker ${workerId} failed: ${describeError(cause)}`);
    this.name = "WorkerFatalError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Invalid verification transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const SESSION_CRASH_MARKERS = [
  "target page, context or browser has been closed",
  "browser has been closed",
  "browser has disconnected",
  "target closed",
  "session closed",
];

export function isSessionCrash(error: unknown): boolean {
  const message = describeError(error).toLowerCase();
  return SESSION_CRASH_MARKERS.some((marker) => message.includes(marker));
}
