import type { CheerioAPI } from 'cheerio';
import { battingAverage, deriveResults, type GameRecord } from '@shared/schema';
import type { ExtractionContext, IBoxScoreExtractor } from '../types';
import { HTMLParser } from '../../utils/scraping/parser';
import { TeamMapper } from '../../utils/scraping/teamMapper';
import { withSource } from '../../logger';
import { config } from '../../config';
import { parseGameId } from './idUtils';
import { firstResolved, type Side } from './review/chain';
import {
  SYNONYMS,
  atBatsFromPlateAppearances,
  battingColumnSum,
  hitsFromPlateAppearances,
  homeRunsFromNotes,
  homeRunsFromPlateAppearances,
  outcomeFromGameState,
  outcomeFromTable,
  scoreFromGameId,
  scoreFromInningLine,
  scoreFromPosition,
  scoreFromRunsHeader,
  summaryColumn,
  venueFromDiscovery,
  venueFromPage,
  type ScoreLine,
} from './review/strategies';

const log = withSource('kbo-review');

interface BattingLine {
  hits: number;
  homeRuns: number;
  atBats: number;
}

/**
 * KboReviewAdapter
 *
 * Turns a rendered KBO game-review page into one dataset row. Each field is
 * read through an ordered chain of strategies ending in a definite default,
 * so extraction itself never throws on a sparse or re-laid-out page.
 *
 * A game showing 0-0 with no declared outcome has not been played yet; it is
 * returned as pending with zeroed statistics and rechecked on a later run.
 */
export class KboReviewAdapter implements IBoxScoreExtractor {
  readonly readySelector = '#tblScoreboard3, #tblScoreboard1';

  constructor(private readonly urlTemplate: string = config.sources.reviewUrl) {}

  reviewUrl(gameId: string): string {
    return this.urlTemplate.replace('{gameId}', encodeURIComponent(gameId));
  }

  extract(html: string, context: ExtractionContext): GameRecord {
    const $ = HTMLParser.load(html);

    const score = this.readScore($, context.gameId);
    const declared = firstResolved($, [outcomeFromTable, outcomeFromGameState], false);
    const venue = firstResolved($, [venueFromPage, venueFromDiscovery(context.venue)], '');

    const base = {
      date: context.date,
      venue,
      away_team: score.away.team,
      home_team: score.home.team,
      away_score: score.away.runs,
      home_score: score.home.runs,
    };
    const eventId = context.gameId ? { event_id: context.gameId } : {};

    if (score.away.runs === 0 && score.home.runs === 0 && !declared) {
      log.debug({ gameId: context.gameId, date: context.date }, 'game not concluded, marked pending');
      return {
        ...base,
        away_result: 'pending',
        home_result: 'pending',
        away_hit: 0,
        home_hit: 0,
        away_hr: 0,
        home_hr: 0,
        away_ab: 0,
        home_ab: 0,
        away_avg: 0,
        home_avg: 0,
        ...eventId,
      };
    }

    const away = this.readBatting($, 'away');
    const home = this.readBatting($, 'home');
    const [awayResult, homeResult] = deriveResults(score.away.runs, score.home.runs);

    return {
      ...base,
      away_result: awayResult,
      home_result: homeResult,
      away_hit: away.hits,
      home_hit: home.hits,
      away_hr: away.homeRuns,
      home_hr: home.homeRuns,
      away_ab: away.atBats,
      home_ab: home.atBats,
      away_avg: battingAverage(away.hits, away.atBats),
      home_avg: battingAverage(home.hits, home.atBats),
      ...eventId,
    };
  }

  private readScore($: CheerioAPI, gameId: string | undefined): ScoreLine {
    const score = firstResolved($, [scoreFromRunsHeader, scoreFromPosition, scoreFromInningLine], scoreFromGameId(gameId));
    const fromId = gameId ? parseGameId(gameId) : null;
    const team = (name: string, side: Side): string => {
      const canonical = name ? TeamMapper.canonicalTeam(name) : '';
      return canonical || (fromId ? fromId[side] : '');
    };
    return {
      away: { team: team(score.away.team, 'away'), runs: score.away.runs },
      home: { team: team(score.home.team, 'home'), runs: score.home.runs },
    };
  }

  private readBatting($: CheerioAPI, side: Side): BattingLine {
    return {
      hits: firstResolved(
        $,
        [summaryColumn(side, SYNONYMS.hits), battingColumnSum(side, SYNONYMS.hits), hitsFromPlateAppearances(side)],
        0
      ),
      atBats: firstResolved(
        $,
        [summaryColumn(side, SYNONYMS.atBats), battingColumnSum(side, SYNONYMS.atBats), atBatsFromPlateAppearances(side)],
        0
      ),
      homeRuns: firstResolved(
        $,
        [
          summaryColumn(side, SYNONYMS.homeRuns),
          battingColumnSum(side, SYNONYMS.homeRuns),
          homeRunsFromNotes(side),
          homeRunsFromPlateAppearances(side),
        ],
        0
      ),
    };
  }
}

