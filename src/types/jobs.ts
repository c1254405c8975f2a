import { AutomationElement } from "../automation/session";

export type AtsVendor =
  | "Workday"
  | "Greenhouse"
  | "Lever"
  | "ICIMS"
  | "BambooHR"
  | "SmartRecruiters"
  | "Jobvite"
  | "Taleo"
  | "SuccessFactors"
  | "Unknown";

export type JobAge =
  | { unit: "minute" | "hour" | "day" | "week" | "month" | "year"; value: number }
  | { unit: "unknown" };

export interface AnchorSnapshot {
  text: string;
  href: string;
  handle: AutomationElement;
}

export interface ContainerSnapshot {
  text: string;
  anchors: AnchorSnapshot[];
  handle: AutomationElement;
}

export interface PageSnapshot {
  url: string;
  containers: ContainerSnapshot[];
}

export interface CandidateRecord {
  rawTitle: string;
  rawCompany: string;
  rawLocation: string;
  rawSalary?: string;
  rawSummary: string;
  postedText?: string;
  sourceKeyword: string;
  sourcePage: number;
  listingUrl: string;
  anchors: AnchorSnapshot[];
  listingHandle: AutomationElement;
}

export interface ResolvedJob {
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly summary: string;
  readonly salary?: string;
  readonly applyUrl: string;
  readonly atsVendor: AtsVendor;
  readonly resolved: boolean;
  readonly postedText?: string;
  readonly age: JobAge;
  readonly fingerprint: string;
  readonly site: string;
  readonly sourceKeyword: string;
  readonly sourcePage: number;
  readonly scrapedAt: string;
}

export interface WorkItem {
  keyword: string;
  page: number;
  attempts: number;
}

export interface StoreRecord {
  fingerprint: string;
  job: ResolvedJob;
  firstSeenAt: string;
  appliedAt?: string;
}
