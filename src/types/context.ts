import { AutomationPage, AutomationSession } from "../automation/session";

/**
 * Browser state owned by exactly one worker. Recovery swaps in a fresh
 * session instead of mutating this one.
 */
export interface SessionState {
  workerId: number;
  session: AutomationSession;
  page: AutomationPage;
  consecutiveFailures: number;
  suspended: boolean;
}
