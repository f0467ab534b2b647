import { addDays, format, isValid, parse } from "date-fns";

export const ISO_DATE_FORMAT = "yyyy-MM-dd";
const COMPACT_DATE_FORMAT = "yyyyMMdd";

/**
 * Accepts `YYYYMMDD` or `YYYY-MM-DD` and returns the ISO form, or null when the
 * text is not a real calendar date (2025-02-30 is rejected).
 */
export function normalizeDateInput(value: string): string | null {
  const text = value.trim();
  let parsed: Date;
  if (/^\d{8}$/.test(text)) {
    parsed = parse(text, COMPACT_DATE_FORMAT, new Date(2000, 0, 1));
  } else if (/^\d{4}-\d{2}-\d{2}$/.test(text)) {
    parsed = parse(text, ISO_DATE_FORMAT, new Date(2000, 0, 1));
  } else {
    return null;
  }
  return isValid(parsed) ? format(parsed, ISO_DATE_FORMAT) : null;
}

export function toCompactDate(isoDate: string): string {
  return isoDate.replace(/-/g, "");
}

export function isoFromDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

export function dateFromIso(isoDate: string): Date {
  return parse(isoDate, ISO_DATE_FORMAT, new Date(2000, 0, 1));
}

export function shiftIsoDate(isoDate: string, days: number): string {
  return isoFromDate(addDays(dateFromIso(isoDate), days));
}

/**
 * Inclusive list of ISO dates; empty when since > until
 */
export function eachIsoDate(since: string, until: string): string[] {
  const out: string[] = [];
  for (let d = since; d <= until; d = shiftIsoDate(d, 1)) {
    out.push(d);
  }
  return out;
}
