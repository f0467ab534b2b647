import type { GameRecord } from "@shared/schema";
import { formatDatasetCsv, parseCsvRecords, readTextIfExists, writeFileAtomic } from "./utils/csvTable";
import { withSource } from "./logger";

const log = withSource("storage");

/** Raw dataset line keyed by its header, before normalization */
export type StoredRow = Record<string, string>;

export interface IDatasetStorage {
  /** All stored rows; empty when the dataset does not exist yet */
  load(): Promise<StoredRow[]>;
  /** Replace the whole dataset */
  save(rows: ReadonlyArray<GameRecord>): Promise<void>;
  describe(): string;
}

export class CsvDatasetStorage implements IDatasetStorage {
  constructor(private readonly filePath: string) {}

  async load(): Promise<StoredRow[]> {
    const text = await readTextIfExists(this.filePath);
    if (text === null) {
      log.info({ path: this.filePath }, "dataset not found, starting empty");
      return [];
    }
    const rows = parseCsvRecords(text);
    log.debug({ path: this.filePath, rows: rows.length }, "dataset loaded");
    return rows;
  }

  async save(rows: ReadonlyArray<GameRecord>): Promise<void> {
    await writeFileAtomic(this.filePath, formatDatasetCsv(rows));
    log.info({ path: this.filePath, rows: rows.length }, "dataset written");
  }

  describe(): string {
    return this.filePath;
  }
}

/**
 * In-memory dataset holding the serialized CSV, so a save/load cycle goes
 * through the same formatting as the file-backed store
 */
export class MemDatasetStorage implements IDatasetStorage {
  private content: string | null;
  saveCount = 0;

  constructor(initialCsv: string | null = null) {
    this.content = initialCsv;
  }

  async load(): Promise<StoredRow[]> {
    return this.content === null ? [] : parseCsvRecords(this.content);
  }

  async save(rows: ReadonlyArray<GameRecord>): Promise<void> {
    this.content = formatDatasetCsv(rows);
    this.saveCount++;
  }

  describe(): string {
    return "memory";
  }

  get csv(): string | null {
    return this.content;
  }
}
