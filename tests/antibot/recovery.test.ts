import { describe, expect, it } from "vitest";
import { createCooldownRecovery, createManualRecovery, RecoveryRequest } from "../../src/antibot/recovery";
import { SessionCookie } from "../../src/automation/session";
import { Logger } from "../../src/logging/logger";
import { createTestAdapter, FakeBrowser, TEST_HOST } from "../support/fakeBrowser";

const LISTING_URL = `https://${TEST_HOST}/search?q=x&page=3`;
const COOKIES: SessionCookie[] = [{ name: "session", value: "test-cookie", domain: TEST_HOST, path: "/" }];

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const logger: Logger & { lines: string[] } = {
    lines,
    info: (message: string) => lines.push(`INFO ${message}`),
    warn: (message: string) => lines.push(`WARN ${message}`),
    error: (message: string) => lines.push(`ERROR ${message}`),
    child: () => logger,
  };
  return logger;
}

function request(overrides: Partial<RecoveryRequest> = {}): RecoveryRequest {
  return { workerId: 2, url: LISTING_URL, attempt: 1, reason: "selector #captcha", cookies: COOKIES, ...overrides };
}

function recordingPacer() {
  const waits: number[] = [];
  return {
    waits,
    pacer: {
      pause: async () => 0,
      wait: async (ms: number) => {
        waits.push(ms);
      },
    },
  };
}

describe("createCooldownRecovery", () => {
  it("waits out the cooldown and keeps the worker's cookies", async () => {
    const logger = recordingLogger();
    const { pacer, waits } = recordingPacer();
    const recover = createCooldownRecovery({ cooldownMs: 60000, logger, pacer });

    expect(await recover(request({ attempt: 2 }))).toEqual({ recovered: true, cookies: COOKIES });
    expect(waits).toEqual([60000]);
    expect(logger.lines).toEqual(["INFO Worker 2 cooling down for 60000ms (attempt 2)"]);
  });
});

describe("createManualRecovery", () => {
  it("gives up when the challenge never clears", async () => {
    const browser = new FakeBrowser();
    browser.setPage(LISTING_URL, { visibleSelectors: ["#captcha"] });
    const logger = recordingLogger();
    const { pacer, waits } = recordingPacer();
    const recover = createManualRecovery({
      launcher: browser.launcher,
      markers: createTestAdapter().verification,
      logger,
      pollIntervalMs: 1000,
      maxWaitMs: 5000,
      pacer,
    });

    expect(await recover(request())).toEqual({ recovered: false, reason: "manual verification timed out" });
    expect(waits).toEqual([1000, 1000, 1000, 1000, 1000]);
    expect(browser.launches).toEqual([{ headless: false, cookies: COOKIES }]);
    expect(browser.sessions[0].closed).toBe(true);
    expect(logger.lines).toEqual([
      "WARN Verification detected for worker 2 (#captcha). Complete it in the opened browser window...",
    ]);
  });

  it("hands back the session cookies once the page is clear", async () => {
    const browser = new FakeBrowser();
    browser.setPage(LISTING_URL, { title: "Results" });
    const { pacer, waits } = recordingPacer();
    const recover = createManualRecovery({
      launcher: browser.launcher,
      markers: createTestAdapter().verification,
      logger: recordingLogger(),
      pacer,
    });

    expect(await recover(request())).toEqual({ recovered: true, cookies: COOKIES });
    expect(waits).toEqual([]);
    expect(browser.visitsTo(LISTING_URL)).toBe(1);
    expect(browser.sessions[0].closed).toBe(true);
  });

  it("reports a failed navigation as an unrecovered attempt", async () => {
    const browser = new FakeBrowser();
    browser.setPage(LISTING_URL, { gotoError: "net::ERR_CONNECTION_RESET" });
    const recover = createManualRecovery({
      launcher: browser.launcher,
      markers: createTestAdapter().verification,
      logger: recordingLogger(),
      pacer: recordingPacer().pacer,
    });

    expect(await recover(request())).toEqual({ recovered: false, reason: "net::ERR_CONNECTION_RESET" });
    expect(browser.sessions[0].closed).toBe(true);
  });
});
