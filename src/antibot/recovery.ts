import { SessionCookie, SessionLauncher } from "../automation/session";
import { createPacer, Pacer } from "../automation/timing";
import { describeError } from "../core/errors";
import { Logger } from "../logging/logger";
import { VerificationMarkers } from "../types/site";
import { detectVerification } from "./detector";

export interface RecoveryRequest {
  workerId: number;
  url: string;
  attempt: number;
  reason: string;
  cookies: SessionCookie[];
}

export interface RecoveryResult {
  recovered: boolean;
  cookies?: SessionCookie[];
  reason?: string;
}

/**
 * Resolves a blocked worker. Implementations may be interactive or automated;
 * they must not hold the caller's session.
 */
export type RecoveryHandler = (request: RecoveryRequest) => Promise<RecoveryResult>;

export interface ManualRecoveryOptions {
  launcher: SessionLauncher;
  markers: VerificationMarkers;
  logger: Logger;
  pollIntervalMs?: number;
  maxWaitMs?: number;
  pacer?: Pacer;
}

/**
 * Opens a visible browser on the blocked URL and polls until the challenge
 * disappears, then hands its cookies back to the worker.
 */
export function createManualRecovery(options: ManualRecoveryOptions): RecoveryHandler {
  const pollIntervalMs = options.pollIntervalMs ?? 2000;
  const maxWaitMs = options.maxWaitMs ?? 120000;
  const pacer = options.pacer ?? createPacer();
  const maxChecks = Math.max(1, Math.ceil(maxWaitMs / pollIntervalMs));

  return async (request) => {
    const session = await options.launcher({ headless: false, cookies: request.cookies });
    try {
      const page = await session.newPage();
      await page.goto(request.url);
      for (let check = 0; check < maxChecks; check += 1) {
        const signal = await detectVerification(page, options.markers);
        if (!signal.detected) {
          return { recovered: true, cookies: await session.cookies() };
        }
        if (check === 0) {
          options.logger.warn(
            `Verification detected for worker ${request.workerId} (${signal.marker}). Complete it in the opened browser window...`
          );
        }
        await pacer.wait(pollIntervalMs);
      }
      return { recovered: false, reason: "manual verification timed out" };
    } catch (error) {
      return { recovered: false, reason: describeError(error) };
    } finally {
      await session.close();
    }
  };
}

export interface CooldownRecoveryOptions {
  cooldownMs: number;
  logger: Logger;
  pacer?: Pacer;
}

/**
 * Waits out a timed block and lets the worker retry with its current cookies.
 */
export function createCooldownRecovery(options: CooldownRecoveryOptions): RecoveryHandler {
  const pacer = options.pacer ?? createPacer();
  return async (request) => {
    options.logger.info(
      `Worker ${request.workerId} cooling down for ${options.cooldownMs}ms (attempt ${request.attempt})`
    );
    await pacer.wait(options.cooldownMs);
    return { recovered: true, cookies: request.cookies };
  };
}
