import { readdir, rm } from "node:fs/promises";
import path from "node:path";
import { normalizeDateInput, toCompactDate } from "@shared/dates";
import type { GameRecord } from "@shared/schema";
import { validateRows } from "./agents/upsertMerger";
import { formatDatasetCsv, parseCsvRecords, readTextIfExists, writeFileAtomic } from "./utils/csvTable";
import { withSource } from "./logger";

const log = withSource("checkpoints");

const INCOMPLETE_MARKER = /^(\d{8})\.incomplete$/;

/**
 * Per-date snapshot of extracted rows, so an interrupted run can resume
 * without crawling finished dates again
 */
export interface ICheckpointStore {
  /** Rows stored for the date, or null when no checkpoint exists */
  read(date: string): Promise<GameRecord[] | null>;
  /** Store the date's rows and clear its incomplete mark */
  write(date: string, rows: ReadonlyArray<GameRecord>): Promise<void>;
  /** Remember that the date still has games to crawl */
  markIncomplete(date: string): Promise<void>;
  /** Dates marked incomplete and not checkpointed since, ascending */
  incompleteDates(): Promise<string[]>;
}

export function hasPendingRows(rows: ReadonlyArray<GameRecord>): boolean {
  return rows.some((row) => row.away_result === "pending" || row.home_result === "pending");
}

export class CsvCheckpointStore implements ICheckpointStore {
  constructor(private readonly dir: string) {}

  pathFor(date: string): string {
    return path.join(this.dir, `${toCompactDate(date)}.csv`);
  }

  markerFor(date: string): string {
    return path.join(this.dir, `${toCompactDate(date)}.incomplete`);
  }

  async read(date: string): Promise<GameRecord[] | null> {
    const text = await readTextIfExists(this.pathFor(date));
    if (text === null) return null;
    const { valid, rejections } = validateRows(parseCsvRecords(text));
    if (rejections.length > 0) {
      log.warn({ date, dropped: rejections.length }, "checkpoint contains malformed rows");
    }
    return valid;
  }

  async write(date: string, rows: ReadonlyArray<GameRecord>): Promise<void> {
    await writeFileAtomic(this.pathFor(date), formatDatasetCsv(rows));
    await rm(this.markerFor(date), { force: true });
    log.debug({ date, rows: rows.length }, "checkpoint written");
  }

  async markIncomplete(date: string): Promise<void> {
    await writeFileAtomic(this.markerFor(date), "");
    log.debug({ date }, "date marked incomplete");
  }

  async incompleteDates(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    const dates: string[] = [];
    for (const name of names) {
      const match = INCOMPLETE_MARKER.exec(name);
      const date = match ? normalizeDateInput(match[1]) : null;
      if (date) dates.push(date);
    }
    return dates.sort();
  }
}

export class MemCheckpointStore implements ICheckpointStore {
  private checkpoints: Map<string, GameRecord[]> = new Map();
  private incomplete: Set<string> = new Set();

  async read(date: string): Promise<GameRecord[] | null> {
    const rows = this.checkpoints.get(date);
    return rows ? rows.map((row) => ({ ...row })) : null;
  }

  async write(date: string, rows: ReadonlyArray<GameRecord>): Promise<void> {
    this.checkpoints.set(
      date,
      rows.map(({ event_id: _eventId, ...row }) => row)
    );
    this.incomplete.delete(date);
  }

  async markIncomplete(date: string): Promise<void> {
    this.incomplete.add(date);
  }

  async incompleteDates(): Promise<string[]> {
    return Array.from(this.incomplete).sort();
  }

  has(date: string): boolean {
    return this.checkpoints.has(date);
  }
}
