import { DEFAULT_ATS_VENDORS } from "../../discovery/ats";
import { SiteAdapter } from "../../types/site";

const RESULTS_PER_PAGE = 10;

export function buildIndeedSearchUrl(keyword: string, page: number, location = ""): string {
  const params = new URLSearchParams();
  if (keyword) params.set("q", keyword);
  if (location) params.set("l", location);
  if (page > 1) params.set("start", String((page - 1) * RESULTS_PER_PAGE));
  return `https://www.indeed.com/jobs?${params.toString()}`;
}

export function createIndeedAdapter(location = ""): SiteAdapter {
  return {
    name: "indeed",
    listingHost: "indeed.com",
    buildSearchUrl: (keyword, page) => buildIndeedSearchUrl(keyword, page, location),
    containerSelectors: ["div.job_seen_beacon", "div.jobsearch-SerpJobCard", "div.tapItem", "div[data-jk]"],
    jobLinkPatterns: [/\/(?:rc\/clk|viewjob|pagead\/clk)\b/i, /[?&]jk=/i],
    excludedLinkPatterns: [/\/cmp\/[^/]+\/reviews/i],
    badgeTokens: ["Featured employer", "Responsive employer"],
    verification: {
      selectors: ["#challenge-stage", ".cf-browser-verification", "#cf-wrapper", "iframe[src*='challenges.cloudflare.com']"],
      titleKeywords: ["just a moment", "security check", "captcha"],
      bodyPhrases: ["additional verification", "verify you are human"],
    },
    atsVendors: DEFAULT_ATS_VENDORS,
  };
}
