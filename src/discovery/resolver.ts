import { AutomationPage } from "../automation/session";
import { createPacer, DelayRange, Pacer } from "../automation/timing";
import { describeError } from "../core/errors";
import { SessionState } from "../types/context";
import { AnchorSnapshot, CandidateRecord, ResolvedJob } from "../types/jobs";
import { SiteAdapter } from "../types/site";
import { classifyAtsVendor } from "./ats";
import { matchesAny } from "./extractor";
import {
  cleanText,
  computeFingerprint,
  containsKeyword,
  FIELD_LIMITS,
  isOnHost,
  isPlaceholderHref,
  toAbsoluteUrl,
} from "./normalize";
import { parsePostedText } from "./recency";

export interface ResolverOptions {
  clickTimeoutMs: number;
  settleMs: number;
  hoverDelayMs: DelayRange;
  minLinkTextLength: number;
  navigationTimeoutMs: number;
  roleKeywords: string[];
  navigationKeywords: string[];
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  clickTimeoutMs: 8000,
  settleMs: 3000,
  hoverDelayMs: [100, 500],
  minLinkTextLength: 10,
  navigationTimeoutMs: 30000,
  roleKeywords: [
    "analyst",
    "developer",
    "engineer",
    "specialist",
    "coordinator",
    "associate",
    "assistant",
    "administrator",
    "designer",
    "consultant",
    "technician",
    "officer",
    "scientist",
    "manager",
  ],
  navigationKeywords: ["next", "more", "previous", "prev", "page", "sign in", "log in", "save", "share"],
};

export const RESOLUTION_OUTCOMES = ["popup", "navigation", "href-fallback", "timeout", "no-link", "error"] as const;

export type ResolutionOutcome = (typeof RESOLUTION_OUTCOMES)[number];

export interface Resolution {
  job: ResolvedJob;
  outcome: ResolutionOutcome;
  /** The worker's page was navigated back, so element handles from before are stale. */
  pageReloaded: boolean;
  error?: string;
}

/**
 * The page could not be put back on the listing view. Carries what was
 * resolved before the cleanup failed.
 */
export class ListingRestoreError extends Error {
  readonly resolution: Resolution;

  constructor(listingUrl: string, cause: unknown, resolution: Resolution) {
    super(`Failed to restore ${listingUrl}: ${describeError(cause)}`);
    this.name = "ListingRestoreError";
    this.resolution = resolution;
  }
}

export interface ResolverDeps {
  pacer?: Pacer;
  now?: () => Date;
}

export class UrlResolver {
  private adapter: SiteAdapter;
  private options: ResolverOptions;
  private pacer: Pacer;
  private now: () => Date;

  constructor(adapter: SiteAdapter, options: Partial<ResolverOptions> = {}, deps: ResolverDeps = {}) {
    this.adapter = adapter;
    this.options = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
    this.pacer = deps.pacer ?? createPacer();
    this.now = deps.now ?? (() => new Date());
  }

  async resolve(candidate: CandidateRecord, state: SessionState): Promise<Resolution> {
    const best = pickBestAnchor(candidate.anchors, this.adapter, this.options);
    const fallbackUrl = listingFallbackUrl(candidate, best?.anchor);
    if (!best) {
      return { job: this.build(candidate, fallbackUrl, null), outcome: "no-link", pageReloaded: false };
    }

    let captured: string | null = null;
    let outcome: ResolutionOutcome = "timeout";
    let error: string | undefined;
    let popup: AutomationPage | null = null;
    let pageReloaded = false;

    try {
      await best.anchor.handle.scrollIntoView();
      await best.anchor.handle.hover();
      await this.pacer.pause(this.options.hoverDelayMs);

      const click = await state.page.clickWithOutcome(best.anchor.handle, this.options.clickTimeoutMs);
      if (click.path === "new-tab") {
        popup = click.page;
        // ATS pages often bounce through several redirects before settling.
        await this.pacer.wait(this.options.settleMs);
        captured = popup.url();
        outcome = "popup";
      } else if (click.path === "same-page-navigation") {
        captured = state.page.url();
        outcome = "navigation";
      } else {
        captured = rawHrefFallback(best.anchor.href, candidate.listingUrl);
        outcome = captured ? "href-fallback" : "timeout";
      }
    } catch (err) {
      captured = null;
      outcome = "error";
      error = describeError(err);
    }

    const job = this.build(candidate, fallbackUrl, captured);
    try {
      pageReloaded = await this.restoreListingView(state, candidate.listingUrl, popup);
    } catch (err) {
      throw new ListingRestoreError(candidate.listingUrl, err, { job, outcome, pageReloaded: true, error });
    }
    return { job, outcome, pageReloaded, error };
  }

  private async restoreListingView(
    state: SessionState,
    listingUrl: string,
    popup: AutomationPage | null
  ): Promise<boolean> {
    if (popup && !popup.isClosed()) {
      await popup.close();
    }
    await state.session.closeOtherPages(state.page);
    if (state.page.url() !== listingUrl) {
      await state.page.goto(listingUrl, this.options.navigationTimeoutMs);
      return true;
    }
    return false;
  }

  private build(candidate: CandidateRecord, fallbackUrl: string, captured: string | null): ResolvedJob {
    const external = captured ? toAbsoluteUrl(captured, candidate.listingUrl) : null;
    const resolved = external !== null && !isOnHost(external, this.adapter.listingHost);
    return buildResolvedJob(candidate, {
      applyUrl: resolved && external ? external : fallbackUrl,
      resolved,
      site: this.adapter.name,
      atsVendors: this.adapter.atsVendors,
      scrapedAt: this.now(),
    });
  }
}

export function buildResolvedJob(
  candidate: CandidateRecord,
  details: {
    applyUrl: string;
    resolved: boolean;
    site: string;
    atsVendors?: SiteAdapter["atsVendors"];
    scrapedAt: Date;
  }
): ResolvedJob {
  const title = cleanText(candidate.rawTitle, FIELD_LIMITS.title);
  const company = cleanText(candidate.rawCompany, FIELD_LIMITS.company);
  const salary = cleanText(candidate.rawSalary, FIELD_LIMITS.salary);
  const job: ResolvedJob = {
    title,
    company,
    location: cleanText(candidate.rawLocation, FIELD_LIMITS.location),
    summary: cleanText(candidate.rawSummary, FIELD_LIMITS.summary),
    salary: salary || undefined,
    applyUrl: details.applyUrl,
    atsVendor: details.resolved ? classifyAtsVendor(details.applyUrl, details.atsVendors) : "Unknown",
    resolved: details.resolved,
    postedText: candidate.postedText,
    age: parsePostedText(candidate.postedText),
    fingerprint: computeFingerprint({ title, company, applyUrl: details.applyUrl }),
    site: details.site,
    sourceKeyword: candidate.sourceKeyword,
    sourcePage: candidate.sourcePage,
    scrapedAt: details.scrapedAt.toISOString(),
  };
  return Object.freeze(job);
}

export function scoreAnchor(
  anchor: Pick<AnchorSnapshot, "text" | "href">,
  adapter: Pick<SiteAdapter, "jobLinkPatterns">,
  options: Pick<ResolverOptions, "minLinkTextLength" | "roleKeywords" | "navigationKeywords">
): number {
  const text = anchor.text.toLowerCase();
  let score = 0;
  if (anchor.text.length >= options.minLinkTextLength) {
    score += 10;
  }
  if (matchesAny(anchor.href, adapter.jobLinkPatterns)) {
    score += 20;
  }
  if (options.roleKeywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
    score += 5;
  }
  if (options.navigationKeywords.some((keyword) => containsKeyword(text, keyword))) {
    score -= 10;
  }
  return score;
}

export function pickBestAnchor(
  anchors: AnchorSnapshot[],
  adapter: Pick<SiteAdapter, "jobLinkPatterns">,
  options: Pick<ResolverOptions, "minLinkTextLength" | "roleKeywords" | "navigationKeywords">
): { anchor: AnchorSnapshot; score: number } | null {
  let best: { anchor: AnchorSnapshot; score: number } | null = null;
  for (const anchor of anchors) {
    const score = scoreAnchor(anchor, adapter, options);
    if (score > 0 && (!best || score > best.score)) {
      best = { anchor, score };
    }
  }
  return best;
}

function rawHrefFallback(href: string, listingUrl: string): string | null {
  if (isPlaceholderHref(href)) {
    return null;
  }
  return toAbsoluteUrl(href, listingUrl);
}

/**
 * Apply URL used when no external URL is captured: the candidate's own
 * detail link when it is a real link, otherwise the results page it came from.
 */
function listingFallbackUrl(candidate: CandidateRecord, anchor: AnchorSnapshot | undefined): string {
  if (anchor && !isPlaceholderHref(anchor.href)) {
    const absolute = toAbsoluteUrl(anchor.href, candidate.listingUrl);
    if (absolute) {
      return absolute;
    }
  }
  return candidate.listingUrl;
}
