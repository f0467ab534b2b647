import type { GameRecord } from "@shared/schema";

/**
 * One finished game found on a schedule page. Either the KBO gameId was
 * exposed by the review link, or only the matchup cell could be read.
 */
export type DiscoveredEvent =
  | { kind: "id"; gameId: string }
  | { kind: "matchup"; away: string; home: string; venue: string; status: string };

export interface ExtractionContext {
  date: string; // YYYY-MM-DD
  gameId?: string;
  /** Venue seen during discovery, used when the review page has none */
  venue?: string;
}

export interface IScheduleSource {
  readonly readySelector: string;
  scheduleUrl(date: string): string;
  discover(date: string, html: string): DiscoveredEvent[];
  resolveGameId(date: string, event: DiscoveredEvent): string | null;
}

export interface IBoxScoreExtractor {
  readonly readySelector: string;
  reviewUrl(gameId: string): string;
  extract(html: string, context: ExtractionContext): GameRecord;
}

export interface RunOptions {
  since?: string;
  until?: string;
  force?: boolean;
}

export interface RunSummary {
  targetDates: string[];
  datesCrawled: number;
  datesFromCheckpoint: number;
  datesIncomplete: number;
  eventsExtracted: number;
  eventsFailed: number;
  inserted: number;
  replaced: number;
  dropped: number;
  written: boolean;
  durationMs: number;
}
