import type { CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { toCompactDate } from '@shared/dates';
import type { DiscoveredEvent, IScheduleSource } from '../types';
import { HTMLParser } from '../../utils/scraping/parser';
import { TeamMapper } from '../../utils/scraping/teamMapper';
import { withSource } from '../../logger';
import { config } from '../../config';
import { buildStableGameId, findGameIds } from './idUtils';

const log = withSource('kbo-schedule');

// Rows carrying any of these never produced a box score
const SKIP_KEYWORDS = ['예정', '취소', '우천', '노게임', 'scheduled', 'cancel', 'postpone', 'rain', 'no game'];

// "LT 2vs3 LG", "롯데 2 vs 3 LG"
const FINISHED_MATCHUP = /^(.+?)\s*(\d+)\s*vs\s*(\d+)\s*(.+)$/i;

// Day cell of the monthly table: "03.22(토)"
const DAY_CELL = /(\d{1,2})\.(\d{1,2})/;

/**
 * KboScheduleAdapter
 *
 * Reads the rendered KBO schedule page for one date and lists the finished
 * games on it. A game is listed by its gameId when its review link exposes
 * one; otherwise by the matchup tuple read from the score cell.
 */
export class KboScheduleAdapter implements IScheduleSource {
  readonly readySelector = 'table tbody tr';

  constructor(private readonly urlTemplate: string = config.sources.scheduleUrl) {}

  scheduleUrl(date: string): string {
    return this.urlTemplate.replace('{date}', toCompactDate(date));
  }

  discover(date: string, html: string): DiscoveredEvent[] {
    const $ = HTMLParser.load(html);
    const compact = toCompactDate(date);
    const monthDay = compact.slice(4);

    const ids = new Set<string>();
    const matchups = new Map<string, DiscoveredEvent>();
    // The day cell spans every row of that day, so it is carried forward
    let currentDay: string | null = null;

    $('table tbody tr').each((_, tr) => {
      const $tr = $(tr);
      const dayText = HTMLParser.extractText($tr.find('td.day').first());
      const dayMatch = DAY_CELL.exec(dayText);
      if (dayMatch) {
        currentDay = dayMatch[1].padStart(2, '0') + dayMatch[2].padStart(2, '0');
      }

      const rowText = HTMLParser.cleanText($tr.text()).toLowerCase();
      if (SKIP_KEYWORDS.some((k) => rowText.includes(k))) return;

      const rowIds = this.reviewGameIds($, tr).filter((id) => id.startsWith(compact));
      if (rowIds.length > 0) {
        rowIds.forEach((id) => ids.add(id));
        return;
      }

      if (currentDay !== null && currentDay !== monthDay) return;
      const matchup = this.readMatchup($, tr);
      if (matchup) {
        matchups.set(`${matchup.away}|${matchup.home}`, matchup);
      }
    });

    const events: DiscoveredEvent[] = Array.from(ids)
      .sort()
      .map((gameId) => ({ kind: 'id', gameId }));

    const sortedMatchups = Array.from(matchups.entries()).sort(([a], [b]) => a.localeCompare(b));
    for (const [, event] of sortedMatchups) {
      // Same game already listed through its review link
      const resolved = this.resolveGameId(date, event);
      if (resolved && ids.has(resolved)) continue;
      events.push(event);
    }

    log.debug({ date, ids: ids.size, matchups: events.length - ids.size }, 'schedule parsed');
    return events;
  }

  /**
   * gameId for a discovered event; for a bare matchup, the id KBO would give
   * the first game of the day between the two teams
   */
  resolveGameId(date: string, event: DiscoveredEvent): string | null {
    if (event.kind === 'id') return event.gameId;
    return buildStableGameId(date, event.away, event.home);
  }

  private reviewGameIds($: CheerioAPI, tr: AnyNode): string[] {
    const found: string[] = [];
    $(tr)
      .find('a')
      .each((_, a) => {
        const $a = $(a);
        const label = HTMLParser.extractText($a).toLowerCase();
        if (!label.includes('리뷰') && !label.includes('review')) return;

        let ids = findGameIds(`${$a.attr('href') ?? ''} ${$a.attr('onclick') ?? ''}`);
        if (ids.length === 0) {
          const parentPayload = `${$a.closest('td').attr('onclick') ?? ''} ${$a.closest('tr').attr('onclick') ?? ''}`;
          ids = findGameIds(parentPayload);
        }
        found.push(...ids);
      });
    return found;
  }

  private readMatchup($: CheerioAPI, tr: AnyNode): Extract<DiscoveredEvent, { kind: 'matchup' }> | null {
    const $tr = $(tr);
    const playText = HTMLParser.extractText($tr.find('td.play').first());
    const match = FINISHED_MATCHUP.exec(playText);
    if (!match) return null;

    const away = TeamMapper.canonicalTeam(match[1]);
    const home = TeamMapper.canonicalTeam(match[4]);
    if (!away || !home) return null;

    const venueCell = $tr
      .find('td')
      .toArray()
      .map((td) => HTMLParser.extractText($(td)))
      .find((text) => TeamMapper.isKnownVenue(HTMLParser.stripVenueNoise(text)));
    const venue = venueCell ? TeamMapper.canonicalVenue(HTMLParser.stripVenueNoise(venueCell)) : '';

    return { kind: 'matchup', away, home, venue, status: 'final' };
  }
}
