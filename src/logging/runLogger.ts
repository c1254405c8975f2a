import fs from "fs";
import path from "path";

export interface RunEvent {
  runId: string;
  workerId?: number;
  step: string;
  keyword?: string;
  page?: number;
  status?: string;
  title?: string;
  company?: string;
  url?: string;
  ats?: string;
  reason?: string;
  count?: number;
  timestamp: string;
}

export interface RunLogger {
  logEvent(event: RunEvent): void;
  getLogPath(): string | null;
}

export function createRunLogger(logDir: string, runId: string): RunLogger {
  fs.mkdirSync(logDir, { recursive: true });
  const logPath = path.join(logDir, `run-${runId}.jsonl`);

  return {
    logEvent(event: RunEvent): void {
      const line = JSON.stringify(event);
      fs.appendFileSync(logPath, `${line}\n`, "utf8");
    },
    getLogPath(): string | null {
      return logPath;
    },
  };
}

export function createMemoryRunLogger(): RunLogger & { events: RunEvent[] } {
  const events: RunEvent[] = [];
  return {
    events,
    logEvent(event: RunEvent): void {
      events.push(event);
    },
    getLogPath(): string | null {
      return null;
    },
  };
}
