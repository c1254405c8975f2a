import { FILTER_REASONS, FilterReason } from "../discovery/filterJobs";
import { RESOLUTION_OUTCOMES, ResolutionOutcome } from "../discovery/resolver";
import { ResolvedJob } from "../types/jobs";

export interface KeywordStats {
  pagesScraped: number;
  jobsFound: number;
  jobsSaved: number;
  duplicatesSkipped: number;
}

export interface ScrapeStats {
  keywordsProcessed: number;
  pagesScraped: number;
  candidatesSeen: number;
  /** Candidates that disappeared when the listing was re-read mid-page. */
  candidatesLost: number;
  /** Candidates admitted by the filter. */
  jobsFound: number;
  jobsSaved: number;
  duplicatesSkipped: number;
  errorsEncountered: number;
  itemsRetried: number;
  itemsDropped: number;
  elapsedMs: number;
  filterReasons: Partial<Record<FilterReason, number>>;
  resolutions: Partial<Record<ResolutionOutcome, number>>;
  suspectedCount: number;
  recoveredCount: number;
  abandonedWorkers: number;
  failedWorkers: number;
  perKeyword: Record<string, KeywordStats>;
  jobs: ResolvedJob[];
}

export function createEmptyStats(): ScrapeStats {
  return {
    keywordsProcessed: 0,
    pagesScraped: 0,
    candidatesSeen: 0,
    candidatesLost: 0,
    jobsFound: 0,
    jobsSaved: 0,
    duplicatesSkipped: 0,
    errorsEncountered: 0,
    itemsRetried: 0,
    itemsDropped: 0,
    elapsedMs: 0,
    filterReasons: {},
    resolutions: {},
    suspectedCount: 0,
    recoveredCount: 0,
    abandonedWorkers: 0,
    failedWorkers: 0,
    perKeyword: {},
    jobs: [],
  };
}

export function keywordStats(stats: ScrapeStats, keyword: string): KeywordStats {
  const existing = stats.perKeyword[keyword];
  if (existing) {
    return existing;
  }
  const created: KeywordStats = { pagesScraped: 0, jobsFound: 0, jobsSaved: 0, duplicatesSkipped: 0 };
  stats.perKeyword[keyword] = created;
  return created;
}

/**
 * Sums worker stats into one report. `elapsedMs` is left to the caller and
 * `keywordsProcessed` is derived from the merged per-keyword table.
 */
export function mergeStats(parts: ScrapeStats[]): ScrapeStats {
  const merged = createEmptyStats();
  for (const part of parts) {
    merged.pagesScraped += part.pagesScraped;
    merged.candidatesSeen += part.candidatesSeen;
    merged.candidatesLost += part.candidatesLost;
    merged.jobsFound += part.jobsFound;
    merged.jobsSaved += part.jobsSaved;
    merged.duplicatesSkipped += part.duplicatesSkipped;
    merged.errorsEncountered += part.errorsEncountered;
    merged.itemsRetried += part.itemsRetried;
    merged.itemsDropped += part.itemsDropped;
    merged.suspectedCount += part.suspectedCount;
    merged.recoveredCount += part.recoveredCount;
    merged.abandonedWorkers += part.abandonedWorkers;
    merged.failedWorkers += part.failedWorkers;
    addCounts(merged.filterReasons, part.filterReasons, FILTER_REASONS);
    addCounts(merged.resolutions, part.resolutions, RESOLUTION_OUTCOMES);
    for (const [keyword, counts] of Object.entries(part.perKeyword)) {
      const target = keywordStats(merged, keyword);
      target.pagesScraped += counts.pagesScraped;
      target.jobsFound += counts.jobsFound;
      target.jobsSaved += counts.jobsSaved;
      target.duplicatesSkipped += counts.duplicatesSkipped;
    }
    merged.jobs.push(...part.jobs);
  }
  merged.keywordsProcessed = Object.values(merged.perKeyword).filter((counts) => counts.pagesScraped > 0).length;
  return merged;
}

export function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function addCounts<K extends string>(
  target: Partial<Record<K, number>>,
  source: Partial<Record<K, number>>,
  keys: readonly K[]
): void {
  for (const key of keys) {
    const count = source[key];
    if (count !== undefined) {
      target[key] = (target[key] ?? 0) + count;
    }
  }
}
