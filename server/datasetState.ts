import { DATASET_COLUMNS, normalizeResult, type DatasetColumn, type DatasetRowInput, type GameRecord } from "@shared/schema";
import { TeamMapper } from "./utils/scraping/teamMapper";
import { validateRows } from "./agents/upsertMerger";
import type { IDatasetStorage, StoredRow } from "./storage";
import { metrics } from "./metrics";
import { withSource } from "./logger";

const log = withSource("dataset-state");

// Header names used by older dataset files
const COLUMN_ALIASES: Record<string, DatasetColumn> = {
  stadium: "venue",
  away_hits: "away_hit",
  home_hits: "home_hit",
  away_homerun: "away_hr",
  home_homerun: "home_hr",
  away_homeruns: "away_hr",
  home_homeruns: "home_hr",
  away_atbat: "away_ab",
  home_atbat: "home_ab",
  away_atbats: "away_ab",
  home_atbats: "home_ab",
};

const DATASET_COLUMN_SET: ReadonlySet<string> = new Set(DATASET_COLUMNS);

function isDatasetColumn(name: string): name is DatasetColumn {
  return DATASET_COLUMN_SET.has(name);
}

function columnFor(header: string): DatasetColumn | null {
  const name = header.trim().toLowerCase();
  if (isDatasetColumn(name)) return name;
  return COLUMN_ALIASES[name] ?? null;
}

/**
 * Map legacy headers and values of stored rows onto the current schema:
 * aliased column names, Korean result words, team and venue names.
 */
export function normalizeLoadedRows(rows: ReadonlyArray<StoredRow>): DatasetRowInput[] {
  return rows.map((stored) => {
    const row: DatasetRowInput = {};
    for (const [header, raw] of Object.entries(stored)) {
      const column = columnFor(header);
      // The canonical column wins over an alias when a file carries both
      if (!column || (row[column] !== undefined && !isDatasetColumn(header.trim().toLowerCase()))) continue;
      row[column] = raw.trim();
    }
    if (typeof row.away_team === "string") row.away_team = TeamMapper.canonicalTeam(row.away_team);
    if (typeof row.home_team === "string") row.home_team = TeamMapper.canonicalTeam(row.home_team);
    if (typeof row.venue === "string") row.venue = TeamMapper.canonicalVenue(row.venue);
    for (const column of ["away_result", "home_result"] as const) {
      const result = normalizeResult(row[column]);
      if (result) row[column] = result;
    }
    return row;
  });
}

/**
 * Process-wide view of the stored dataset, loaded once and cached until
 * invalidated after a write
 */
export class DatasetState {
  private cache: GameRecord[] | null = null;
  private loading: Promise<GameRecord[]> | null = null;
  // Bumped by invalidate(); a load started under an older generation never fills the cache
  private generation = 0;

  constructor(private readonly storage: IDatasetStorage) {}

  async get(): Promise<GameRecord[]> {
    if (this.cache) return this.cache;
    if (!this.loading) {
      const generation = this.generation;
      const loading: Promise<GameRecord[]> = this.load()
        .then((rows) => {
          if (generation === this.generation) this.cache = rows;
          return rows;
        })
        .finally(() => {
          if (this.loading === loading) this.loading = null;
        });
      this.loading = loading;
    }
    return this.loading;
  }

  invalidate(): void {
    this.generation++;
    this.cache = null;
    this.loading = null;
  }

  private async load(): Promise<GameRecord[]> {
    const stored = await this.storage.load();
    const { valid, rejections } = validateRows(normalizeLoadedRows(stored));
    if (rejections.length > 0) {
      metrics.rowsDroppedTotal.inc(rejections.length);
      log.warn(
        { source: this.storage.describe(), dropped: rejections.length, first: rejections[0]?.message },
        "stored rows failed validation and were dropped"
      );
    }
    return valid;
  }
}
