import { ResolvedJob } from "../types/jobs";
import { containsKeyword } from "./normalize";
import { ageInDays } from "./recency";

export interface SeniorityPolicy {
  tooSenior: string[];
  entryLevel: string[];
  excludeKeywords: string[];
}

export const FILTER_REASONS = [
  "admitted",
  "excluded-keyword",
  "too-old",
  "title-entry-level",
  "title-too-senior",
  "summary-entry-level",
  "summary-too-senior",
] as const;

export type FilterReason = (typeof FILTER_REASONS)[number];

export interface FilterDecision {
  admitted: boolean;
  reason: FilterReason;
}

export const DEFAULT_SENIORITY_POLICY: SeniorityPolicy = {
  tooSenior: [
    "senior",
    "sr",
    "sr.",
    "lead",
    "principal",
    "manager",
    "director",
    "supervisor",
    "chief",
    "head",
    "vp",
    "vice president",
    "staff",
    "experienced",
    "expert",
    "3+ years",
    "4+ years",
    "5+ years",
    "10+ years",
  ],
  entryLevel: [
    "junior",
    "jr",
    "entry",
    "entry level",
    "graduate",
    "new grad",
    "trainee",
    "intern",
    "co-op",
    "associate",
    "0-2 years",
    "1-2 years",
    "level i",
  ],
  excludeKeywords: [],
};

type JobFields = Pick<ResolvedJob, "title" | "summary" | "age">;

/**
 * Recency first, then seniority. Title signals outrank summary signals, and
 * an entry-level signal outranks a too-senior one in the same field.
 */
export function evaluateJob(job: JobFields, cutoffDays: number, policy: SeniorityPolicy): FilterDecision {
  if (policy.excludeKeywords.some((keyword) => containsKeyword(job.title, keyword))) {
    return { admitted: false, reason: "excluded-keyword" };
  }
  if (!isRecent(job, cutoffDays)) {
    return { admitted: false, reason: "too-old" };
  }

  if (hasAny(job.title, policy.entryLevel)) {
    return { admitted: true, reason: "title-entry-level" };
  }
  if (hasAny(job.title, policy.tooSenior)) {
    return { admitted: false, reason: "title-too-senior" };
  }
  if (hasAny(job.summary, policy.entryLevel)) {
    return { admitted: true, reason: "summary-entry-level" };
  }
  if (hasAny(job.summary, policy.tooSenior)) {
    return { admitted: false, reason: "summary-too-senior" };
  }
  return { admitted: true, reason: "admitted" };
}

export function admit(job: JobFields, cutoffDays: number, policy: SeniorityPolicy): boolean {
  return evaluateJob(job, cutoffDays, policy).admitted;
}

export function isRecent(job: Pick<ResolvedJob, "age">, cutoffDays: number): boolean {
  const { age } = job;
  switch (age.unit) {
    case "unknown":
    case "minute":
    case "hour":
      return true;
    case "month":
    case "year":
      return false;
    default: {
      const days = ageInDays(age);
      return days === null || days <= cutoffDays;
    }
  }
}

function hasAny(text: string, keywords: string[]): boolean {
  return keywords.some((keyword) => containsKeyword(text, keyword));
}
