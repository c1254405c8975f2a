import crypto from "crypto";

export const FIELD_LIMITS = {
  title: 200,
  company: 120,
  location: 120,
  summary: 300,
  salary: 60,
} as const;

const TRACKING_PARAMS = [/^utm_/i, /^gclid$/i, /^fbclid$/i, /^ref$/i, /^src$/i];

const PLACEHOLDER_HREFS = new Set(["", "#", "#!", "javascript:void(0)", "javascript:void(0);", "javascript:;"]);

export function cleanText(value: string | undefined, limit?: number): string {
  const collapsed = (value ?? "").replace(/\s+/g, " ").trim();
  if (limit === undefined || collapsed.length <= limit) {
    return collapsed;
  }
  return collapsed.slice(0, limit).trimEnd();
}

export function isPlaceholderHref(href: string | null | undefined): boolean {
  const value = (href ?? "").trim().toLowerCase();
  return PLACEHOLDER_HREFS.has(value) || value.startsWith("javascript:");
}

export function toAbsoluteUrl(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href.trim(), baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
}

export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * True when `url` lives on `listingHost` or one of its subdomains.
 */
export function isOnHost(url: string, listingHost: string): boolean {
  const host = hostOf(url);
  if (!host) {
    return false;
  }
  const target = listingHost.toLowerCase();
  return host === target || host.endsWith(`.${target}`);
}

/**
 * Case-insensitive keyword match bounded by non-alphanumerics, so "intern"
 * does not hit "internal" and "sr." still matches "Sr. Analyst".
 */
export function containsKeyword(haystack: string, keyword: string): boolean {
  const needle = keyword.trim().toLowerCase();
  if (!needle) {
    return false;
  }
  const escaped = needle.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(^|[^a-z0-9])${escaped}([^a-z0-9]|$)`).test(haystack.toLowerCase());
}

export function normalizeApplyUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return value.trim().toLowerCase();
  }

  const params = Array.from(url.searchParams.entries())
    .filter(([key]) => !TRACKING_PARAMS.some((pattern) => pattern.test(key)))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const query = new URLSearchParams(params).toString();
  const pathname = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, "") : url.pathname;
  return `${url.protocol}//${url.host}${pathname}${query ? `?${query}` : ""}`;
}

export function computeFingerprint(job: { title: string; company: string; applyUrl: string }): string {
  const key = [
    cleanText(job.title).toLowerCase(),
    cleanText(job.company).toLowerCase(),
    normalizeApplyUrl(job.applyUrl),
  ].join("\n");
  return crypto.createHash("sha256").update(key).digest("hex");
}
