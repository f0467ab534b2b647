import type { GameRecord } from "@shared/schema";
import { eachIsoDate, normalizeDateInput, shiftIsoDate } from "@shared/dates";
import { InvalidOptionsError } from "../types/errors";

export interface PlanInput {
  since?: string;
  until?: string;
  existing: ReadonlyArray<Pick<GameRecord, "date" | "away_result" | "home_result">>;
  recheckDays: number;
  bootstrapSince: string;
  today: string; // YYYY-MM-DD
  /** Dates an earlier run left incomplete */
  incomplete?: readonly string[];
}

export interface TargetPlan {
  dates: string[];
  primary: { since: string; until: string } | null;
  rechecks: string[];
  resumes: string[];
}

function requireDate(value: string, name: string): string {
  const iso = normalizeDateInput(value);
  if (!iso) {
    throw new InvalidOptionsError(`${name} must be YYYYMMDD or YYYY-MM-DD, got "${value}"`, { [name]: value });
  }
  return iso;
}

/**
 * Decide which dates to crawl.
 *
 * The primary range starts the day after the newest stored date (or at the
 * bootstrap date for an empty dataset) and ends yesterday, never later than
 * today. Recent dates whose stored games are still pending are always added
 * so they get rechecked, and so are dates an earlier run could not finish.
 */
export function planTargetDates(input: PlanInput): TargetPlan {
  const today = requireDate(input.today, "today");

  let since: string;
  if (input.since !== undefined) {
    since = requireDate(input.since, "since");
  } else {
    const newest = input.existing.reduce<string | null>(
      (max, row) => (max === null || row.date > max ? row.date : max),
      null
    );
    since = newest ? shiftIsoDate(newest, 1) : requireDate(input.bootstrapSince, "bootstrapSince");
  }

  let until = input.until !== undefined ? requireDate(input.until, "until") : shiftIsoDate(today, -1);
  if (until > today) until = today;

  const primaryDates = eachIsoDate(since, until);

  const windowStart = shiftIsoDate(today, -Math.max(0, input.recheckDays));
  const rechecks = Array.from(
    new Set(
      input.existing
        .filter((row) => row.away_result === "pending" || row.home_result === "pending")
        .map((row) => row.date)
        .filter((date) => date >= windowStart && date <= today)
    )
  ).sort();

  const resumes = Array.from(
    new Set(
      (input.incomplete ?? [])
        .map((date) => normalizeDateInput(date))
        .filter((date): date is string => date !== null && date <= today)
    )
  ).sort();

  const dates = Array.from(new Set([...primaryDates, ...rechecks, ...resumes])).sort();

  return {
    dates,
    primary: primaryDates.length > 0 ? { since, until } : null,
    rechecks,
    resumes,
  };
}
