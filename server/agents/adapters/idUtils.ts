import { normalizeDateInput, toCompactDate } from '@shared/dates';
import { TeamMapper } from '../../utils/scraping/teamMapper';

// gameId=20250322LTLG0, gameId:'20250322LTLG0', "gameId":"20250322LTLG0"
const GAME_ID_PATTERN = /gameId["']?\s*[=:]\s*["']?(\d{8}[A-Za-z]{4}\d)/g;

export interface ParsedGameId {
  date: string; // YYYY-MM-DD
  away: string;
  home: string;
  doubleheader: number;
}

/**
 * Build a stable KBO gameId from a date and two team names.
 * Format: `${YYYYMMDD}${AWAY}${HOME}${doubleheader}`
 * - Returns null unless both teams canonicalize to known codes
 */
export function buildStableGameId(
  date: string,
  awayTeam: string,
  homeTeam: string,
  doubleheader = 0
): string | null {
  const iso = normalizeDateInput(date);
  const awayCode = TeamMapper.canonicalTeam(awayTeam);
  const homeCode = TeamMapper.canonicalTeam(homeTeam);
  if (!iso || !TeamMapper.isKnownTeam(awayCode) || !TeamMapper.isKnownTeam(homeCode)) {
    return null;
  }
  return `${toCompactDate(iso)}${awayCode}${homeCode}${doubleheader}`;
}

export function parseGameId(gameId: string): ParsedGameId | null {
  const match = /^(\d{8})([A-Za-z]{2})([A-Za-z]{2})(\d)$/.exec(gameId.trim());
  if (!match) return null;
  const [, compact, awayCode, homeCode, dh] = match;
  const date = normalizeDateInput(compact);
  const away = TeamMapper.teamFromCode(awayCode);
  const home = TeamMapper.teamFromCode(homeCode);
  if (!date || !away || !home) return null;
  return { date, away, home, doubleheader: parseInt(dh, 10) };
}

/**
 * Every gameId mentioned in an href/onclick payload, in order of appearance
 */
export function findGameIds(payload: string): string[] {
  return Array.from(payload.matchAll(GAME_ID_PATTERN), (m) => m[1].toUpperCase());
}
