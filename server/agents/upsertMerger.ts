import {
  compositeKey,
  datasetRowSchema,
  type DatasetRowInput,
  type GameRecord,
} from "@shared/schema";
import { MalformedRecordError } from "../types/errors";

export interface MergeResult {
  rows: GameRecord[];
  /** Valid rows in the batch */
  accepted: number;
  inserted: number;
  replaced: number;
  dropped: number;
  rejections: MalformedRecordError[];
}

/**
 * Validate rows; the invalid ones come back as rejections instead of throwing
 */
export function validateRows(rows: ReadonlyArray<DatasetRowInput>): {
  valid: GameRecord[];
  rejections: MalformedRecordError[];
} {
  const valid: GameRecord[] = [];
  const rejections: MalformedRecordError[] = [];
  for (const row of rows) {
    const parsed = datasetRowSchema.safeParse(row);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      const reason = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      rejections.push(new MalformedRecordError(reason, { date: row.date, away: row.away_team, home: row.home_team }));
    }
  }
  return { valid, rejections };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Dataset order: date, venue, home team, away team */
export function compareRows(a: GameRecord, b: GameRecord): number {
  return (
    compareText(a.date, b.date) ||
    compareText(a.venue, b.venue) ||
    compareText(a.home_team, b.home_team) ||
    compareText(a.away_team, b.away_team)
  );
}

// Keeps the last row for each key, at the position of that last row
function keepLast(rows: GameRecord[], keyOf: (row: GameRecord) => string | undefined): GameRecord[] {
  const lastIndex = new Map<string, number>();
  rows.forEach((row, i) => {
    const key = keyOf(row);
    if (key !== undefined) lastIndex.set(key, i);
  });
  return rows.filter((row, i) => {
    const key = keyOf(row);
    return key === undefined || lastIndex.get(key) === i;
  });
}

/**
 * Merge a batch of freshly extracted rows into the dataset.
 *
 * Every stored row dated within `targetDates` is replaced wholesale by the
 * batch, as is any stored row sharing a batch row's (date, away, home) key.
 * Pure: the caller persists the result.
 */
export function upsertRows(
  existing: ReadonlyArray<DatasetRowInput>,
  batch: ReadonlyArray<DatasetRowInput>,
  targetDates: Iterable<string>
): MergeResult {
  const current = validateRows(existing);
  const incoming = validateRows(batch);
  const dates = new Set(targetDates);
  const batchKeys = new Set(incoming.valid.map(compositeKey));

  const kept = current.valid.filter((row) => !dates.has(row.date) && !batchKeys.has(compositeKey(row)));

  let merged = keepLast([...kept, ...incoming.valid], (row) => row.event_id);
  merged = keepLast(merged, compositeKey);
  merged.sort(compareRows);

  const existingKeys = new Set(current.valid.map(compositeKey));
  let inserted = 0;
  let replaced = 0;
  for (const key of batchKeys) {
    if (existingKeys.has(key)) replaced++;
    else inserted++;
  }

  return {
    rows: merged,
    accepted: incoming.valid.length,
    inserted,
    replaced,
    dropped: current.rejections.length + incoming.rejections.length,
    rejections: [...current.rejections, ...incoming.rejections],
  };
}
