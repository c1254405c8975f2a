import fs from "fs";
import path from "path";
import { computeFingerprint } from "../discovery/normalize";
import { AtsVendor, JobAge, ResolvedJob, StoreRecord } from "../types/jobs";

export interface JobQuery {
  since?: Date;
  company?: string;
  applied?: boolean;
  limit?: number;
}

export interface StoreStats {
  total: number;
  bySite: Record<string, number>;
  byCompany: Record<string, number>;
  byVendor: Partial<Record<AtsVendor, number>>;
}

export interface JobStore {
  /** Resolves false when a job with the same fingerprint is already stored. */
  insert(job: ResolvedJob): Promise<boolean>;
  get(fingerprint: string): Promise<StoreRecord | null>;
  list(query?: JobQuery): Promise<StoreRecord[]>;
  stats(): Promise<StoreStats>;
  markApplied(fingerprint: string, at?: Date): Promise<boolean>;
  clearAll(): Promise<number>;
}

/**
 * Keeps records in memory and funnels every mutation through one promise
 * chain, so concurrent workers never interleave a check-then-insert.
 */
abstract class SerializedJobStore implements JobStore {
  private chain: Promise<void> = Promise.resolve();
  private records: Map<string, StoreRecord> | null = null;
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  protected abstract load(): StoreRecord[];
  protected abstract persist(records: StoreRecord[]): void;

  insert(job: ResolvedJob): Promise<boolean> {
    return this.exclusive((records) => {
      const fingerprint = computeFingerprint(job);
      if (records.has(fingerprint)) {
        return false;
      }
      const stored: ResolvedJob = Object.freeze({ ...job, fingerprint });
      records.set(fingerprint, {
        fingerprint,
        job: stored,
        firstSeenAt: this.now().toISOString(),
      });
      this.persist(Array.from(records.values()));
      return true;
    });
  }

  async get(fingerprint: string): Promise<StoreRecord | null> {
    return this.snapshot().get(fingerprint) ?? null;
  }

  async list(query: JobQuery = {}): Promise<StoreRecord[]> {
    const company = query.company?.trim().toLowerCase();
    const sinceMs = query.since?.getTime();
    const matched = Array.from(this.snapshot().values()).filter((record) => {
      if (sinceMs !== undefined && Date.parse(record.firstSeenAt) < sinceMs) {
        return false;
      }
      if (company && !record.job.company.toLowerCase().includes(company)) {
        return false;
      }
      if (query.applied !== undefined && Boolean(record.appliedAt) !== query.applied) {
        return false;
      }
      return true;
    });
    matched.sort((a, b) => Date.parse(b.firstSeenAt) - Date.parse(a.firstSeenAt));
    return query.limit !== undefined ? matched.slice(0, Math.max(0, query.limit)) : matched;
  }

  async stats(): Promise<StoreStats> {
    const result: StoreStats = { total: 0, bySite: {}, byCompany: {}, byVendor: {} };
    for (const record of this.snapshot().values()) {
      const { site, company, atsVendor } = record.job;
      result.total += 1;
      result.bySite[site] = (result.bySite[site] ?? 0) + 1;
      const companyKey = company || "(unknown)";
      result.byCompany[companyKey] = (result.byCompany[companyKey] ?? 0) + 1;
      result.byVendor[atsVendor] = (result.byVendor[atsVendor] ?? 0) + 1;
    }
    return result;
  }

  markApplied(fingerprint: string, at?: Date): Promise<boolean> {
    return this.exclusive((records) => {
      const record = records.get(fingerprint);
      if (!record) {
        return false;
      }
      records.set(fingerprint, { ...record, appliedAt: (at ?? this.now()).toISOString() });
      this.persist(Array.from(records.values()));
      return true;
    });
  }

  clearAll(): Promise<number> {
    return this.exclusive((records) => {
      const count = records.size;
      records.clear();
      this.persist([]);
      return count;
    });
  }

  private snapshot(): Map<string, StoreRecord> {
    if (!this.records) {
      this.records = new Map(this.load().map((record) => [record.fingerprint, record]));
    }
    return this.records;
  }

  private exclusive<T>(task: (records: Map<string, StoreRecord>) => T): Promise<T> {
    const result = this.chain.then(() => task(this.snapshot()));
    this.chain = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

export class InMemoryJobStore extends SerializedJobStore {
  protected load(): StoreRecord[] {
    return [];
  }

  protected persist(_records: StoreRecord[]): void {
    return;
  }
}

export class FileJobStore extends SerializedJobStore {
  private filePath: string;

  constructor(filePath: string, now?: () => Date) {
    super(now);
    this.filePath = filePath;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  protected load(): StoreRecord[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    if (!Array.isArray(parsed)) {
      throw new Error(`Job store at ${this.filePath} is not a JSON array`);
    }
    return parsed.filter(isStoreRecord).map((record) => ({ ...record, job: Object.freeze(record.job) }));
  }

  protected persist(records: StoreRecord[]): void {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(records, null, 2));
    fs.renameSync(tempPath, this.filePath);
  }
}

const ATS_VENDORS: AtsVendor[] = [
  "Workday",
  "Greenhouse",
  "Lever",
  "ICIMS",
  "BambooHR",
  "SmartRecruiters",
  "Jobvite",
  "Taleo",
  "SuccessFactors",
  "Unknown",
];

const AGE_UNITS = ["minute", "hour", "day", "week", "month", "year"];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === "string";
}

function isAtsVendor(value: unknown): value is AtsVendor {
  return ATS_VENDORS.some((vendor) => vendor === value);
}

function isJobAge(value: unknown): value is JobAge {
  if (!isObject(value)) {
    return false;
  }
  if (value.unit === "unknown") {
    return true;
  }
  return typeof value.unit === "string" && AGE_UNITS.includes(value.unit) && typeof value.value === "number";
}

function isResolvedJob(value: unknown): value is ResolvedJob {
  if (!isObject(value)) {
    return false;
  }
  return (
    typeof value.title === "string" &&
    typeof value.company === "string" &&
    typeof value.location === "string" &&
    typeof value.summary === "string" &&
    isOptionalString(value.salary) &&
    typeof value.applyUrl === "string" &&
    value.applyUrl.length > 0 &&
    isAtsVendor(value.atsVendor) &&
    typeof value.resolved === "boolean" &&
    isOptionalString(value.postedText) &&
    isJobAge(value.age) &&
    typeof value.fingerprint === "string" &&
    typeof value.site === "string" &&
    typeof value.sourceKeyword === "string" &&
    typeof value.sourcePage === "number" &&
    typeof value.scrapedAt === "string"
  );
}

function isStoreRecord(value: unknown): value is StoreRecord {
  return (
    isObject(value) &&
    typeof value.fingerprint === "string" &&
    typeof value.firstSeenAt === "string" &&
    isOptionalString(value.appliedAt) &&
    isResolvedJob(value.job)
  );
}
