import { describe, it, expect } from 'vitest';
import { buildStableGameId, findGameIds, parseGameId } from '@server/agents/adapters/idUtils';

describe('idUtils', () => {
  it('builds a KBO game id from canonical or aliased team names', () => {
    expect(buildStableGameId('2025-03-22', '롯데', 'LG')).toBe('20250322LTLG0');
    expect(buildStableGameId('20250525', 'SSG', '두산', 2)).toBe('20250525SKOB2');
  });

  it('returns null for an invalid date or unknown team', () => {
    expect(buildStableGameId('2025-02-30', 'LT', 'LG')).toBeNull();
    expect(buildStableGameId('2025-03-22', 'LT', 'Seoul Kings')).toBeNull();
  });

  it('parses game ids', () => {
    expect(parseGameId('20250322LTLG0')).toEqual({ date: '2025-03-22', away: 'LT', home: 'LG', doubleheader: 0 });
    expect(parseGameId('20250322ZZLG0')).toBeNull();
    expect(parseGameId('2025032LTLG0')).toBeNull();
  });

  it('finds ids in href and onclick payloads', () => {
    expect(findGameIds("/Main.aspx?gameDate=20250322&gameId=20250322LTLG0&section=REVIEW")).toEqual(['20250322LTLG0']);
    expect(findGameIds("goReview({gameId:'20250322obsk0'})")).toEqual(['20250322OBSK0']);
    expect(findGameIds('{"gameId":"20250322HTWO1"}')).toEqual(['20250322HTWO1']);
    expect(findGameIds('gameDate=20250322')).toEqual([]);
  });
});
