import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { DATASET_COLUMNS, type GameRecord } from "@shared/schema";

const recordsSchema = z.array(z.record(z.string()));

/**
 * Parse a headed CSV into one string record per line. A leading BOM is ignored.
 */
export function parseCsvRecords(text: string): Record<string, string>[] {
  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  return recordsSchema.parse(records);
}

/**
 * Serialize rows under the fixed dataset header; averages keep 4 decimals
 */
export function formatDatasetCsv(rows: ReadonlyArray<GameRecord>): string {
  const records = rows.map((row) =>
    Object.fromEntries(
      DATASET_COLUMNS.map((column) => {
        const value = row[column];
        return [column, column === "away_avg" || column === "home_avg" ? Number(value).toFixed(4) : String(value)];
      })
    )
  );
  return stringify(records, { header: true, columns: [...DATASET_COLUMNS] });
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Replace a file in one step: write a sibling temp file, then rename over the target
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, content, "utf8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
