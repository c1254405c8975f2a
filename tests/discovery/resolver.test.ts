import { beforeEach, describe, expect, it } from "vitest";
import { AutomationPage } from "../../src/automation/session";
import {
  buildResolvedJob,
  DEFAULT_RESOLVER_OPTIONS,
  ListingRestoreError,
  pickBestAnchor,
  scoreAnchor,
  UrlResolver,
} from "../../src/discovery/resolver";
import { SessionState } from "../../src/types/context";
import { CandidateRecord } from "../../src/types/jobs";
import {
  anchorSnapshot,
  ClickBehavior,
  createTestAdapter,
  FakeBrowser,
  FakeSession,
  instantPacer,
  makeCandidate,
  TEST_HOST,
} from "../support/fakeBrowser";

const adapter = createTestAdapter();
const LISTING_URL = `https://${TEST_HOST}/search?q=data%20analyst&page=1`;
const SCRAPED_AT = new Date("2026-03-01T12:00:00.000Z");

function candidateWith(href: string, click: ClickBehavior, text = "Junior Data Analyst"): CandidateRecord {
  return makeCandidate({ listingUrl: LISTING_URL, anchors: [anchorSnapshot({ text, href, click })] });
}

describe("scoreAnchor", () => {
  it("adds up length, job link and role keyword signals", () => {
    expect(scoreAnchor({ text: "Junior Data Analyst", href: "/job/1" }, adapter, DEFAULT_RESOLVER_OPTIONS)).toBe(35);
    expect(scoreAnchor({ text: "Apply", href: "/job/1" }, adapter, DEFAULT_RESOLVER_OPTIONS)).toBe(20);
    expect(scoreAnchor({ text: "Next", href: "#" }, adapter, DEFAULT_RESOLVER_OPTIONS)).toBe(-10);
    expect(scoreAnchor({ text: "See more analyst jobs", href: "/search" }, adapter, DEFAULT_RESOLVER_OPTIONS)).toBe(5);
  });
});

describe("pickBestAnchor", () => {
  it("takes the first highest scorer", () => {
    const anchors = [
      anchorSnapshot({ text: "Acme Corp", href: "/company/acme" }),
      anchorSnapshot({ text: "Junior Data Analyst", href: "/job/1" }),
      anchorSnapshot({ text: "Junior Data Analyst", href: "/job/2" }),
    ];
    expect(pickBestAnchor(anchors, adapter, DEFAULT_RESOLVER_OPTIONS)?.anchor.href).toBe("/job/1");
  });

  it("returns null when nothing scores above zero", () => {
    expect(pickBestAnchor([anchorSnapshot({ text: "Next", href: "#" })], adapter, DEFAULT_RESOLVER_OPTIONS)).toBeNull();
  });
});

describe("buildResolvedJob", () => {
  it("cleans, truncates and freezes the job", () => {
    const job = buildResolvedJob(
      makeCandidate({ listingUrl: LISTING_URL, rawTitle: `  ${"T".repeat(250)} `, rawSalary: "  $50,000 ", postedText: "2 days ago" }),
      { applyUrl: "https://boards.greenhouse.io/acme/jobs/1", resolved: true, site: "example", scrapedAt: SCRAPED_AT }
    );
    expect(job.title).toHaveLength(200);
    expect(job.salary).toBe("$50,000");
    expect(job.atsVendor).toBe("Greenhouse");
    expect(job.age).toEqual({ unit: "day", value: 2 });
    expect(job.scrapedAt).toBe("2026-03-01T12:00:00.000Z");
    expect(Object.isFrozen(job)).toBe(true);
  });
});

describe("UrlResolver", () => {
  let browser: FakeBrowser;
  let session: FakeSession;
  let state: SessionState;
  let resolver: UrlResolver;

  beforeEach(async () => {
    browser = new FakeBrowser();
    browser.setPage(LISTING_URL, { containers: [] });
    session = new FakeSession(browser, []);
    const page: AutomationPage = await session.newPage();
    await page.goto(LISTING_URL);
    state = { workerId: 1, session, page, consecutiveFailures: 0, suspended: false };
    resolver = new UrlResolver(adapter, {}, { pacer: instantPacer(), now: () => SCRAPED_AT });
  });

  function expectListingView(): void {
    expect(state.page.url()).toBe(LISTING_URL);
    expect(session.openPageCount()).toBe(1);
  }

  it("captures the URL of a new tab and closes it", async () => {
    const result = await resolver.resolve(
      candidateWith("/job/1", { kind: "popup", url: "https://acme.wd1.myworkdayjobs.com/en-US/job/1" }),
      state
    );
    expect(result.outcome).toBe("popup");
    expect(result.pageReloaded).toBe(false);
    expect(result.job.applyUrl).toBe("https://acme.wd1.myworkdayjobs.com/en-US/job/1");
    expect(result.job.resolved).toBe(true);
    expect(result.job.atsVendor).toBe("Workday");
    expect(result.job.site).toBe("example");
    expectListingView();
  });

  it("reads an in-place navigation and navigates back", async () => {
    const result = await resolver.resolve(
      candidateWith("/job/2", { kind: "navigate", url: "https://jobs.lever.co/acme/2" }),
      state
    );
    expect(result.outcome).toBe("navigation");
    expect(result.pageReloaded).toBe(true);
    expect(result.job.applyUrl).toBe("https://jobs.lever.co/acme/2");
    expect(result.job.atsVendor).toBe("Lever");
    expectListingView();
  });

  it("keeps the captured URL when navigating back fails", async () => {
    browser.setPage(LISTING_URL, { gotoError: "net::ERR_TIMED_OUT" });
    const error = await resolver
      .resolve(candidateWith("/job/2", { kind: "navigate", url: "https://jobs.lever.co/acme/2" }), state)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ListingRestoreError);
    if (error instanceof ListingRestoreError) {
      expect(error.message).toBe(`Failed to restore ${LISTING_URL}: net::ERR_TIMED_OUT`);
      expect(error.resolution.outcome).toBe("navigation");
      expect(error.resolution.job.applyUrl).toBe("https://jobs.lever.co/acme/2");
    }
  });

  it("falls back to the raw href on timeout without marking it resolved", async () => {
    const result = await resolver.resolve(candidateWith("/job/3", { kind: "timeout" }), state);
    expect(result.outcome).toBe("href-fallback");
    expect(result.job.applyUrl).toBe(`https://${TEST_HOST}/job/3`);
    expect(result.job.resolved).toBe(false);
    expect(result.job.atsVendor).toBe("Unknown");
    expectListingView();
  });

  it("falls back to the listing URL when the href is a placeholder", async () => {
    const result = await resolver.resolve(candidateWith("#", { kind: "timeout" }, "Junior Data Analyst role"), state);
    expect(result.outcome).toBe("timeout");
    expect(result.job.applyUrl).toBe(LISTING_URL);
    expect(result.job.resolved).toBe(false);
    expectListingView();
  });

  it("absorbs click errors and closes stray tabs", async () => {
    const result = await resolver.resolve(
      candidateWith("/job/4", { kind: "throw", message: "element detached", openPopup: true }),
      state
    );
    expect(result.outcome).toBe("error");
    expect(result.error).toBe("element detached");
    expect(result.job.applyUrl).toBe(`https://${TEST_HOST}/job/4`);
    expectListingView();
  });

  it("reports no-link when no anchor scores", async () => {
    const result = await resolver.resolve(
      makeCandidate({ listingUrl: LISTING_URL, anchors: [anchorSnapshot({ text: "Next", href: "#" })] }),
      state
    );
    expect(result.outcome).toBe("no-link");
    expect(result.job.applyUrl).toBe(LISTING_URL);
    expect(result.job.resolved).toBe(false);
    expectListingView();
  });

  it("treats a capture on the listing host as unresolved", async () => {
    const result = await resolver.resolve(
      candidateWith("/job/5", { kind: "popup", url: `https://www.${TEST_HOST}/job/5/details` }),
      state
    );
    expect(result.outcome).toBe("popup");
    expect(result.job.resolved).toBe(false);
    expect(result.job.applyUrl).toBe(`https://${TEST_HOST}/job/5`);
    expectListingView();
  });
});
