import { AutomationElement, AutomationPage } from "../automation/session";
import { AnchorSnapshot, CandidateRecord, ContainerSnapshot, PageSnapshot } from "../types/jobs";
import { SiteAdapter } from "../types/site";
import { cleanText, FIELD_LIMITS } from "./normalize";
import { looksLikeRecency } from "./recency";

const SALARY_PATTERN = /\$[\d,]+(?:\s*-\s*\$[\d,]+)?/;

export interface Provenance {
  keyword: string;
  page: number;
}

/**
 * Reads the result containers of a rendered listing page. The first container
 * selector that matches anything wins.
 */
export async function capturePageSnapshot(page: AutomationPage, adapter: SiteAdapter): Promise<PageSnapshot> {
  let handles: AutomationElement[] = [];
  for (const selector of adapter.containerSelectors) {
    handles = await page.queryAll(selector);
    if (handles.length > 0) {
      break;
    }
  }

  const containers: ContainerSnapshot[] = [];
  for (const handle of handles) {
    const text = await handle.innerText();
    const anchors: AnchorSnapshot[] = [];
    for (const anchor of await handle.queryAll("a")) {
      anchors.push({
        text: cleanText(await anchor.innerText()),
        href: (await anchor.getAttribute("href")) ?? "",
        handle: anchor,
      });
    }
    containers.push({ text, anchors, handle });
  }

  return { url: page.url(), containers };
}

export function extractCandidates(
  snapshot: PageSnapshot,
  adapter: SiteAdapter,
  provenance: Provenance
): CandidateRecord[] {
  const candidates: CandidateRecord[] = [];
  for (const container of snapshot.containers) {
    const candidate = parseContainer(container, snapshot.url, adapter, provenance);
    if (candidate) {
      candidates.push(candidate);
    }
  }
  return candidates;
}

export function isQualifyingContainer(container: ContainerSnapshot, adapter: SiteAdapter): boolean {
  const hasJobLink = container.anchors.some((anchor) => matchesAny(anchor.href, adapter.jobLinkPatterns));
  if (!hasJobLink) {
    return false;
  }
  return !container.anchors.some((anchor) => matchesAny(anchor.href, adapter.excludedLinkPatterns));
}

export function splitSalary(line: string): { title: string; salary?: string } {
  const match = SALARY_PATTERN.exec(line);
  if (!match) {
    return { title: cleanText(line) };
  }
  return {
    title: cleanText(line.replace(match[0], " ")),
    salary: cleanText(match[0]),
  };
}

export function stripBadges(line: string, badgeTokens: string[]): string {
  let value = line;
  for (const token of badgeTokens) {
    const escaped = token.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    value = value.replace(new RegExp(escaped, "gi"), " ");
  }
  return cleanText(value);
}

function parseContainer(
  container: ContainerSnapshot,
  listingUrl: string,
  adapter: SiteAdapter,
  provenance: Provenance
): CandidateRecord | null {
  if (!isQualifyingContainer(container, adapter)) {
    return null;
  }

  const lines = container.text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length < 2) {
    return null;
  }

  const { title, salary } = splitSalary(lines[0]);
  // Cards without a location put the posted date straight after the company.
  const locationIsPosted = lines.length > 2 && looksLikeRecency(lines[2]);
  const rest = lines.slice(locationIsPosted ? 2 : 3);
  const postedIndex = rest.findIndex(looksLikeRecency);
  const summaryLines = rest.filter((_line, index) => index !== postedIndex);

  return {
    rawTitle: title,
    rawCompany: stripBadges(lines[1], adapter.badgeTokens),
    rawLocation: locationIsPosted ? "" : cleanText(lines[2]),
    rawSalary: salary,
    rawSummary: cleanText(summaryLines.join(" "), FIELD_LIMITS.summary),
    postedText: postedIndex >= 0 ? rest[postedIndex] : undefined,
    sourceKeyword: provenance.keyword,
    sourcePage: provenance.page,
    listingUrl,
    anchors: container.anchors,
    listingHandle: container.handle,
  };
}

export function matchesAny(value: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => {
    pattern.lastIndex = 0;
    return pattern.test(value);
  });
}
