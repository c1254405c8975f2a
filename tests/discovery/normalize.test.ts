import { describe, expect, it } from "vitest";
import {
  cleanText,
  computeFingerprint,
  containsKeyword,
  isOnHost,
  isPlaceholderHref,
  normalizeApplyUrl,
  toAbsoluteUrl,
} from "../../src/discovery/normalize";

describe("cleanText", () => {
  it("collapses whitespace and truncates", () => {
    expect(cleanText("  Data \n\t Analyst  ")).toBe("Data Analyst");
    expect(cleanText("abcdef", 3)).toBe("abc");
    expect(cleanText(undefined)).toBe("");
  });
});

describe("isPlaceholderHref", () => {
  it("flags empty and script links", () => {
    expect(isPlaceholderHref("")).toBe(true);
    expect(isPlaceholderHref("#")).toBe(true);
    expect(isPlaceholderHref("#!")).toBe(true);
    expect(isPlaceholderHref("javascript:void(0)")).toBe(true);
    expect(isPlaceholderHref("/job/1")).toBe(false);
  });
});

describe("toAbsoluteUrl", () => {
  it("resolves relative links against the listing page", () => {
    expect(toAbsoluteUrl("/job/7", "https://www.eluta.ca/search?q=x")).toBe("https://www.eluta.ca/job/7");
  });

  it("rejects non-http schemes", () => {
    expect(toAbsoluteUrl("mailto:hr@example.test", "https://www.eluta.ca/")).toBeNull();
  });
});

describe("isOnHost", () => {
  it("matches the host and its subdomains", () => {
    expect(isOnHost("https://www.eluta.ca/job/1", "eluta.ca")).toBe(true);
    expect(isOnHost("https://eluta.ca/job/1", "eluta.ca")).toBe(true);
    expect(isOnHost("https://noteluta.ca/job/1", "eluta.ca")).toBe(false);
    expect(isOnHost("not a url", "eluta.ca")).toBe(false);
  });
});

describe("containsKeyword", () => {
  it("matches on word boundaries only", () => {
    expect(containsKeyword("Data Analyst Intern", "intern")).toBe(true);
    expect(containsKeyword("Internal Auditor", "intern")).toBe(false);
    expect(containsKeyword("Sr. Analyst", "sr.")).toBe(true);
    expect(containsKeyword("Requires 5+ years of SQL", "5+ years")).toBe(true);
  });
});

describe("computeFingerprint", () => {
  it("is stable across formatting and tracking parameters", () => {
    const a = computeFingerprint({
      title: "Data Analyst",
      company: "Acme Corp",
      applyUrl: "https://acme.wd1.myworkdayjobs.com/job/1?utm_source=eluta&b=2&a=1",
    });
    const b = computeFingerprint({
      title: "  data   analyst ",
      company: "ACME CORP",
      applyUrl: "https://acme.wd1.myworkdayjobs.com/job/1/?a=1&b=2#apply",
    });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it("differs when the apply URL differs", () => {
    const base = { title: "Data Analyst", company: "Acme Corp" };
    expect(computeFingerprint({ ...base, applyUrl: "https://example.test/job/1" })).not.toBe(
      computeFingerprint({ ...base, applyUrl: "https://example.test/job/2" })
    );
  });
});

describe("normalizeApplyUrl", () => {
  it("drops tracking params, sorts the rest and strips the trailing slash", () => {
    expect(normalizeApplyUrl("https://Example.test/jobs/1/?ref=feed&z=1&a=2&gclid=x")).toBe(
      "https://example.test/jobs/1?a=2&z=1"
    );
  });
});
