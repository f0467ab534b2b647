import { z } from "zod";
import { normalizeDateInput } from "./dates";

export const GAME_RESULTS = ["win", "loss", "draw", "pending"] as const;
export type GameResult = typeof GAME_RESULTS[number];

/** Fixed header of the dataset and checkpoint files, in column order. */
export const DATASET_COLUMNS = [
  "date",
  "venue",
  "away_team",
  "home_team",
  "away_score",
  "home_score",
  "away_result",
  "home_result",
  "away_hit",
  "home_hit",
  "away_hr",
  "home_hr",
  "away_ab",
  "home_ab",
  "away_avg",
  "home_avg",
] as const;

export type DatasetColumn = typeof DATASET_COLUMNS[number];

export interface GameRecord {
  date: string; // YYYY-MM-DD
  venue: string;
  away_team: string;
  home_team: string;
  away_score: number;
  home_score: number;
  away_result: GameResult;
  home_result: GameResult;
  away_hit: number;
  home_hit: number;
  away_hr: number;
  home_hr: number;
  away_ab: number;
  home_ab: number;
  away_avg: number;
  home_avg: number;
  event_id?: string; // KBO gameId, kept in memory only
}

/** A row as it arrives from a file or an extractor, before validation. */
export type DatasetRowInput = { [K in DatasetColumn]?: string | number } & { event_id?: string };

const RESULT_ALIASES: Record<string, GameResult> = {
  win: "win",
  w: "win",
  "승": "win",
  loss: "loss",
  l: "loss",
  "패": "loss",
  draw: "draw",
  d: "draw",
  tie: "draw",
  "무": "draw",
  pending: "pending",
  "예정": "pending",
};

export function normalizeResult(value: unknown): GameResult | null {
  const key = String(value ?? "").replace(/\s+/g, "").toLowerCase();
  return RESULT_ALIASES[key] ?? null;
}

/**
 * First non-negative integer found in a value; 0 when none resolves
 */
export function coerceCount(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : 0;
  }
  const match = String(value ?? "").match(/\d+/);
  return match ? parseInt(match[0], 10) : 0;
}

export function battingAverage(hits: number, atBats: number): number {
  if (atBats <= 0) return 0;
  return Math.round((hits / atBats) * 10_000) / 10_000;
}

export function deriveResults(awayScore: number, homeScore: number): [GameResult, GameResult] {
  if (awayScore > homeScore) return ["win", "loss"];
  if (awayScore < homeScore) return ["loss", "win"];
  return ["draw", "draw"];
}

export function compositeKey(row: Pick<GameRecord, "date" | "away_team" | "home_team">): string {
  return `${row.date}|${row.away_team}|${row.home_team}`;
}

const cellSchema = z.union([z.string(), z.number()]).optional();

// Scores must coerce exactly: "5", 5, "5.0". Anything else marks the row as corrupt.
const scoreSchema = cellSchema.transform((value, ctx) => {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  if (typeof value === "string" && /^\s*\d+(?:\.0+)?\s*$/.test(value)) return parseInt(value, 10);
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: "non-coercible score" });
  return z.NEVER;
});

const countSchema = cellSchema.transform((value) => coerceCount(value));

const dateSchema = cellSchema.transform((value, ctx) => {
  const iso = normalizeDateInput(String(value ?? ""));
  if (!iso) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid date" });
    return z.NEVER;
  }
  return iso;
});

const textSchema = cellSchema.transform((value) => String(value ?? "").replace(/\s+/g, " ").trim());

// A venue made only of digits (or shaped like a date) is a mis-parsed identifier
const venueSchema = textSchema
  .refine((venue) => venue.length > 0, { message: "missing venue" })
  .refine((venue) => !/^\d+$/.test(venue) && !/^\d{4}-\d{2}-\d{2}$/.test(venue), {
    message: "venue looks like a raw identifier",
  });

const teamSchema = textSchema.refine((team) => team.length > 0, { message: "missing team" });

/**
 * Validates one row and returns a consistent GameRecord: scores checked,
 * counts coerced, averages recomputed, results re-derived from the runs unless
 * both sides are still pending.
 */
export const datasetRowSchema = z
  .object({
    date: dateSchema,
    venue: venueSchema,
    away_team: teamSchema,
    home_team: teamSchema,
    away_score: scoreSchema,
    home_score: scoreSchema,
    away_result: cellSchema,
    home_result: cellSchema,
    away_hit: countSchema,
    home_hit: countSchema,
    away_hr: countSchema,
    home_hr: countSchema,
    away_ab: countSchema,
    home_ab: countSchema,
    event_id: z.string().optional(),
  })
  .transform((row): GameRecord => {
    const pending =
      normalizeResult(row.away_result) === "pending" && normalizeResult(row.home_result) === "pending";
    const [awayResult, homeResult]: [GameResult, GameResult] = pending
      ? ["pending", "pending"]
      : deriveResults(row.away_score, row.home_score);

    const record: GameRecord = {
      date: row.date,
      venue: row.venue,
      away_team: row.away_team,
      home_team: row.home_team,
      away_score: row.away_score,
      home_score: row.home_score,
      away_result: awayResult,
      home_result: homeResult,
      away_hit: row.away_hit,
      home_hit: row.home_hit,
      away_hr: row.away_hr,
      home_hr: row.home_hr,
      away_ab: row.away_ab,
      home_ab: row.home_ab,
      away_avg: battingAverage(row.away_hit, row.away_ab),
      home_avg: battingAverage(row.home_hit, row.home_ab),
    };
    if (row.event_id) record.event_id = row.event_id;
    return record;
  });
