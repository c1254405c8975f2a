import { DEFAULT_ATS_VENDORS } from "../../discovery/ats";
import { SiteAdapter } from "../../types/site";

export function buildElutaSearchUrl(keyword: string, page: number): string {
  const query = keyword.trim().split(/\s+/).map(encodeURIComponent).join("+");
  return `https://www.eluta.ca/search?q=${query}+sort%3Arank&page=${page}`;
}

export function createElutaAdapter(): SiteAdapter {
  return {
    name: "eluta",
    listingHost: "eluta.ca",
    buildSearchUrl: buildElutaSearchUrl,
    containerSelectors: [".organic-job", "div.organic-job", "div[data-job-id]"],
    jobLinkPatterns: [/^(?:https?:\/\/(?:www\.)?eluta\.ca)?\/job\//i, /^(?:https?:\/\/(?:www\.)?eluta\.ca)?\/direct\//i],
    excludedLinkPatterns: [
      /canadastop100\.com/i,
      /reviews\./i,
      /top-employer/i,
      /employer-review/i,
      /company-profile/i,
      /employer-profile/i,
      /about-employer/i,
      /top100/i,
    ],
    badgeTokens: ["TOP EMPLOYER", "FEATURED EMPLOYER"],
    verification: {
      selectors: [
        ".captcha",
        "#captcha",
        ".g-recaptcha",
        ".h-captcha",
        "iframe[src*='recaptcha']",
        "iframe[src*='hcaptcha']",
        "iframe[src*='captcha']",
        "[data-testid*='verification']",
        ".verification",
        "#verification",
        ".challenge",
        "#challenge",
        ".cf-browser-verification",
        "#cf-wrapper",
        ".cf-challenge",
        "#bot-check",
        ".bot-detection",
      ],
      titleKeywords: ["verification", "captcha", "challenge", "just a moment", "attention required", "are you a robot"],
      bodyPhrases: ["verify you are human", "prove you are not a robot", "security check"],
    },
    atsVendors: DEFAULT_ATS_VENDORS,
  };
}
