/**
 * Field strategies for the KBO review page.
 *
 * Every strategy is a pure read of the parsed document and returns null when
 * its source is absent or unreadable; the adapter chains them with firstResolved.
 * Team tables are always read away-then-home.
 */

import type { CheerioAPI } from 'cheerio';
import { HTMLParser, type TableView } from '../../../utils/scraping/parser';
import { TeamMapper } from '../../../utils/scraping/teamMapper';
import { parseGameId } from '../idUtils';
import { sideIndex, type Side, type SidePair, type Strategy } from './chain';
import { classifyCell, countsAsAtBat, isHit, type PlateOutcome } from './plateAppearance';
import { homeRunsFromNotablePlays } from './homeRuns';

export interface TeamLine {
  team: string;
  runs: number;
}

export type ScoreLine = SidePair<TeamLine>;

export const SUMMARY_TABLE = '#tblScoreboard3';
export const OUTCOME_TABLE = '#tblScoreboard1';
export const INNING_TABLE = '#tblScoreboard2';
export const VENUE_SELECTOR = '#txtStadium, #lblStadium, .stadium';
export const GAME_STATE_SELECTOR = '#lblGameState, .game-status';

export const SYNONYMS = {
  runs: ['R', '득점', '점수', 'RUNS'],
  hits: ['H', '안타', 'HIT', 'HITS'],
  homeRuns: ['HR', '홈런', 'HOMERUN'],
  atBats: ['AB', '타수'],
} as const;

const BATTING_TABLES: SidePair<readonly string[]> = {
  away: ['#tblAwayHitter3', '#tblAwayHitter2', '#tblAwayHitter', '#tblHitterAway'],
  home: ['#tblHomeHitter3', '#tblHomeHitter2', '#tblHomeHitter', '#tblHitterHome'],
};

const INNING_GRID: SidePair<string> = { away: '#tblAwayHitter2', home: '#tblHomeHitter2' };

const OUTCOME_TOKENS = new Set(['승', '패', '무', 'W', 'L', 'D']);
const FINAL_MARKERS = ['경기종료', 'final'];

function twoSides(table: TableView | null): [string[], string[]] | null {
  if (!table || table.rows.length < 2) return null;
  return [table.rows[0], table.rows[1]];
}

// ---------------------------------------------------------------------------
// Score and teams
// ---------------------------------------------------------------------------

/** Runs column located by its header in the team summary table */
export const scoreFromRunsHeader: Strategy<ScoreLine> = ($) => {
  const table = HTMLParser.readTable($, [SUMMARY_TABLE]);
  const rows = twoSides(table);
  if (!table || !rows) return null;
  const col = HTMLParser.findColumn(table.headers, SYNONYMS.runs);
  if (col < 0) return null;
  const [away, home] = rows;
  if (col >= away.length || col >= home.length) return null;
  return {
    away: { team: away[0] ?? '', runs: HTMLParser.extractInt(away[col]) },
    home: { team: home[0] ?? '', runs: HTMLParser.extractInt(home[col]) },
  };
};

/** Same table without usable headers: first integer cell after the team cell */
export const scoreFromPosition: Strategy<ScoreLine> = ($) => {
  const rows = twoSides(HTMLParser.readTable($, [SUMMARY_TABLE]));
  if (!rows) return null;
  const lines = rows.map((row) => {
    const runsCell = row.slice(1).find((cell) => HTMLParser.isIntegerCell(cell));
    return runsCell === undefined ? null : { team: row[0] ?? '', runs: HTMLParser.extractInt(runsCell) };
  });
  const [away, home] = lines;
  if (!away || !home) return null;
  return { away, home };
};

function teamCell(row: readonly string[]): string {
  return (
    row.find((cell) => cell.length > 0 && !OUTCOME_TOKENS.has(cell.toUpperCase()) && !HTMLParser.isIntegerCell(cell)) ??
    ''
  );
}

/** Team names from the outcome table, runs summed over the inning line */
export const scoreFromInningLine: Strategy<ScoreLine> = ($) => {
  const teams = twoSides(HTMLParser.readTable($, [OUTCOME_TABLE]));
  const innings = twoSides(HTMLParser.readTable($, [INNING_TABLE]));
  if (!teams || !innings) return null;
  const sum = (row: readonly string[]) =>
    row.filter((cell) => HTMLParser.isIntegerCell(cell)).reduce((acc, cell) => acc + HTMLParser.extractInt(cell), 0);
  return {
    away: { team: teamCell(teams[0]), runs: sum(innings[0]) },
    home: { team: teamCell(teams[1]), runs: sum(innings[1]) },
  };
};

/** Last resort: team codes embedded in the gameId, no runs */
export function scoreFromGameId(gameId: string | undefined): ScoreLine {
  const parsed = gameId ? parseGameId(gameId) : null;
  return {
    away: { team: parsed?.away ?? '', runs: 0 },
    home: { team: parsed?.home ?? '', runs: 0 },
  };
}

// ---------------------------------------------------------------------------
// Declared outcome
// ---------------------------------------------------------------------------

export const outcomeFromTable: Strategy<boolean> = ($) => {
  const rows = twoSides(HTMLParser.readTable($, [OUTCOME_TABLE]));
  if (!rows) return null;
  const declared = rows.every((row) => row.some((cell) => OUTCOME_TOKENS.has(cell.toUpperCase())));
  return declared ? true : null;
};

export const outcomeFromGameState: Strategy<boolean> = ($) => {
  const states = HTMLParser.extractTextArray($, GAME_STATE_SELECTOR).map((s) => s.toLowerCase());
  const final = states.some((state) => FINAL_MARKERS.some((marker) => state.includes(marker)));
  return final ? true : null;
};

// ---------------------------------------------------------------------------
// Batting counts
// ---------------------------------------------------------------------------

/** A side's value from a column of the team summary table */
export function summaryColumn(side: Side, synonyms: readonly string[]): Strategy<number> {
  return ($) => {
    const table = HTMLParser.readTable($, [SUMMARY_TABLE]);
    const rows = twoSides(table);
    if (!table || !rows) return null;
    const col = HTMLParser.findColumn(table.headers, synonyms);
    const row = rows[sideIndex(side)];
    if (col < 0 || col >= row.length) return null;
    return HTMLParser.extractInt(row[col]);
  };
}

/** A column summed over the first per-player batting table that carries it */
export function battingColumnSum(side: Side, synonyms: readonly string[]): Strategy<number> {
  return ($) => {
    for (const selector of BATTING_TABLES[side]) {
      const table = HTMLParser.readTable($, [selector]);
      if (!table) continue;
      const col = HTMLParser.findColumn(table.headers, synonyms);
      if (col < 0) continue;
      return table.rows.reduce((acc, row) => acc + (col < row.length ? HTMLParser.extractInt(row[col]) : 0), 0);
    }
    return null;
  };
}

/** Every classified plate appearance in a side's inning grid; null without a grid */
export function plateAppearances($: CheerioAPI, side: Side): PlateOutcome[] | null {
  const table = HTMLParser.readTable($, [INNING_GRID[side]]);
  if (!table) return null;
  const inningCols = table.headers
    .map((header, index) => (/^\d+$/.test(header) ? index : -1))
    .filter((index) => index >= 0);
  if (inningCols.length === 0) return null;

  const outcomes: PlateOutcome[] = [];
  for (const row of table.rows) {
    for (const col of inningCols) {
      if (col < row.length) outcomes.push(...classifyCell(row[col]));
    }
  }
  return outcomes.length > 0 ? outcomes : null;
}

export function hitsFromPlateAppearances(side: Side): Strategy<number> {
  return ($) => plateAppearances($, side)?.filter(isHit).length ?? null;
}

export function atBatsFromPlateAppearances(side: Side): Strategy<number> {
  return ($) => plateAppearances($, side)?.filter(countsAsAtBat).length ?? null;
}

export function homeRunsFromPlateAppearances(side: Side): Strategy<number> {
  return ($) => plateAppearances($, side)?.filter((outcome) => outcome === 'home_run').length ?? null;
}

export function homeRunsFromNotes(side: Side): Strategy<number> {
  return ($) => homeRunsFromNotablePlays($)?.[side] ?? null;
}

// ---------------------------------------------------------------------------
// Venue
// ---------------------------------------------------------------------------

export const venueFromPage: Strategy<string> = ($) => {
  const raw = HTMLParser.extractTextArray($, VENUE_SELECTOR)[0];
  if (!raw) return null;
  const venue = HTMLParser.stripVenueNoise(raw);
  return venue ? TeamMapper.canonicalVenue(venue) : null;
};

export function venueFromDiscovery(venue: string | undefined): Strategy<string> {
  return () => {
    const cleaned = venue ? HTMLParser.stripVenueNoise(venue) : '';
    return cleaned ? TeamMapper.canonicalVenue(cleaned) : null;
  };
}
