import { InvalidTransitionError } from "../core/errors";

export type VerificationState = "normal" | "suspected" | "verifying" | "recovered" | "abandoned";

export interface VerificationTransition {
  workerId: number;
  from: VerificationState;
  to: VerificationState;
  attempts: number;
  reason?: string;
  at: string;
}

export type TransitionListener = (transition: VerificationTransition) => void;

const ALLOWED: Record<VerificationState, VerificationState[]> = {
  normal: ["suspected"],
  suspected: ["verifying", "abandoned"],
  // A failed attempt drops back to suspected before the next one.
  verifying: ["recovered", "suspected", "abandoned"],
  recovered: ["normal", "suspected"],
  abandoned: [],
};

/**
 * Per-worker verification lifecycle. The attempt counter survives
 * suspected/verifying/recovered cycles and only resets on a clean page load.
 */
export class VerificationStateMachine {
  private current: VerificationState = "normal";
  private attemptCount = 0;
  private workerId: number;
  private maxAttempts: number;
  private listener?: TransitionListener;
  private now: () => Date;

  constructor(workerId: number, maxAttempts: number, listener?: TransitionListener, now: () => Date = () => new Date()) {
    this.workerId = workerId;
    this.maxAttempts = maxAttempts;
    this.listener = listener;
    this.now = now;
  }

  get state(): VerificationState {
    return this.current;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  isSuspended(): boolean {
    return this.current === "suspected" || this.current === "verifying";
  }

  canAttemptRecovery(): boolean {
    return this.attemptCount < this.maxAttempts;
  }

  suspect(reason: string): void {
    this.transition("suspected", reason);
  }

  beginVerification(): void {
    if (!this.canAttemptRecovery()) {
      throw new InvalidTransitionError(this.current, "verifying");
    }
    this.attemptCount += 1;
    this.transition("verifying");
  }

  markRecovered(): void {
    this.transition("recovered");
  }

  markFailedAttempt(reason?: string): void {
    this.transition("suspected", reason);
  }

  abandon(reason?: string): void {
    this.transition("abandoned", reason);
  }

  /**
   * Called after a page loads without verification markers.
   */
  confirmHealthy(): void {
    if (this.current === "recovered") {
      this.transition("normal");
    }
    if (this.current === "normal") {
      this.attemptCount = 0;
    }
  }

  private transition(to: VerificationState, reason?: string): void {
    const from = this.current;
    if (!ALLOWED[from].includes(to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.current = to;
    this.listener?.({
      workerId: this.workerId,
      from,
      to,
      attempts: this.attemptCount,
      reason,
      at: this.now().toISOString(),
    });
  }
}
