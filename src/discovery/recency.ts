import { JobAge } from "../types/jobs";
import { cleanText } from "./normalize";

const RELATIVE_AGE = /\b(\d+|an?|one)\s*\+?\s*(minute|min|hour|hr|day|week|wk|month|year|yr)s?\b/;
const RECENCY_LINE = /\b(ago|today|yesterday|just posted|just now)\b/i;

const UNIT_ALIASES: Record<string, Exclude<JobAge, { unit: "unknown" }>["unit"]> = {
  minute: "minute",
  min: "minute",
  hour: "hour",
  hr: "hour",
  day: "day",
  week: "week",
  wk: "week",
  month: "month",
  year: "year",
  yr: "year",
};

export function parsePostedText(text: string | undefined): JobAge {
  const value = cleanText(text).toLowerCase();
  if (!value) {
    return { unit: "unknown" };
  }

  if (/\b(just now|moments? ago)\b/.test(value)) {
    return { unit: "minute", value: 0 };
  }
  if (/\b(today|just posted)\b/.test(value) || value === "new") {
    return { unit: "hour", value: 0 };
  }
  if (/\byesterday\b/.test(value)) {
    return { unit: "day", value: 1 };
  }

  const match = RELATIVE_AGE.exec(value);
  if (match) {
    const amount = /^\d+$/.test(match[1]) ? Number(match[1]) : 1;
    return { unit: UNIT_ALIASES[match[2]], value: amount };
  }

  const coarse = /\b(month|year)s?\b/.exec(value);
  if (coarse) {
    return { unit: UNIT_ALIASES[coarse[1]], value: 1 };
  }

  return { unit: "unknown" };
}

export function ageInDays(age: JobAge): number | null {
  switch (age.unit) {
    case "minute":
      return age.value / 1440;
    case "hour":
      return age.value / 24;
    case "day":
      return age.value;
    case "week":
      return age.value * 7;
    case "month":
      return age.value * 30;
    case "year":
      return age.value * 365;
    default:
      return null;
  }
}

export function looksLikeRecency(line: string): boolean {
  return line.length <= 40 && RECENCY_LINE.test(line);
}
