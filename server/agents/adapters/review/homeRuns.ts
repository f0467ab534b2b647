import type { CheerioAPI } from 'cheerio';
import { HTMLParser } from '../../../utils/scraping/parser';
import { opposite, type Side, type SidePair } from './chain';

export interface HomeRunMention {
  batter: string;
  seasonCount: number;
  pitcher: string | null;
  half: Side | null; // batting side implied by 초/말
}

const PITCHER_TABLES: SidePair<string> = { away: '#tblAwayPitcher', home: '#tblHomePitcher' };

// 오스틴 3호(1회초 2점 반즈)
const MENTION = /([^\s(),]+?)\s*(\d+)\s*호\s*\(([^)]*)\)/g;

export function parseHomeRunMentions(text: string): HomeRunMention[] {
  const mentions: HomeRunMention[] = [];
  for (const match of text.matchAll(MENTION)) {
    const detail = match[3].split(/\s+/).filter(Boolean);
    const named = detail.filter((token) => !/\d/.test(token) && !/^(?:top|bottom|초|말)$/i.test(token));
    mentions.push({
      batter: match[1],
      seasonCount: parseInt(match[2], 10),
      pitcher: named.length > 0 ? named[named.length - 1] : null,
      half: inningHalf(match[3]),
    });
  }
  return mentions;
}

function inningHalf(detail: string): Side | null {
  if (/\d+\s*회\s*초|\btop\b/i.test(detail)) return 'away';
  if (/\d+\s*회\s*말|\bbottom\b/i.test(detail)) return 'home';
  return null;
}

/**
 * Pitchers who appeared for a side, read from the first column of its pitching table
 */
export function pitcherRoster($: CheerioAPI, side: Side): Set<string> {
  const table = HTMLParser.readTable($, [PITCHER_TABLES[side]]);
  const names = (table?.rows ?? []).map((row) => row[0] ?? '').filter(Boolean);
  return new Set(names);
}

/**
 * Batting side of a mention: the opponent of the pitcher's team when exactly
 * one roster lists the pitcher, else the inning half, else null (dropped).
 */
export function attributeMention(mention: HomeRunMention, rosters: SidePair<Set<string>>): Side | null {
  if (mention.pitcher) {
    const onAway = rosters.away.has(mention.pitcher);
    const onHome = rosters.home.has(mention.pitcher);
    if (onAway !== onHome) {
      return opposite(onAway ? 'away' : 'home');
    }
  }
  return mention.half;
}

/**
 * Home runs per side from the notable-plays table; null when the page has none
 */
export function homeRunsFromNotablePlays($: CheerioAPI): SidePair<number> | null {
  const table = HTMLParser.readTable($, ['#tblEtc']);
  if (!table) return null;

  const rosters: SidePair<Set<string>> = { away: pitcherRoster($, 'away'), home: pitcherRoster($, 'home') };
  const counts: SidePair<number> = { away: 0, home: 0 };

  for (const [label = '', ...rest] of table.rows) {
    const heading = label.toUpperCase();
    if (!heading.includes('홈런') && heading !== 'HR') continue;
    for (const mention of parseHomeRunMentions(rest.join(' '))) {
      const side = attributeMention(mention, rosters);
      if (side) counts[side] += 1;
    }
  }
  return counts;
}
