import { describe, it, expect } from 'vitest';
import { upsertRows, validateRows } from '@server/agents/upsertMerger';
import { compositeKey } from '@shared/schema';
import { makeRecord, pendingRecord } from '../helpers/kboTestUtils';

describe('upsertRows', () => {
  it('recomputes averages from hits and at-bats', () => {
    const row = makeRecord({ away_hit: 7, away_ab: 30, home_hit: 10, home_ab: 33, away_avg: 0.9, home_avg: 0 });
    const { rows } = upsertRows([], [row], ['2025-03-22']);

    expect(rows[0].away_avg).toBe(0.2333);
    expect(rows[0].home_avg).toBe(0.303);
  });

  it('uses 0 as the average when there are no at-bats', () => {
    const { rows } = upsertRows([], [makeRecord({ away_hit: 0, away_ab: 0 })], []);
    expect(rows[0].away_avg).toBe(0);
  });

  it('re-derives results from the runs', () => {
    const row = makeRecord({ away_score: 5, home_score: 3, away_result: 'loss', home_result: 'loss' });
    const { rows } = upsertRows([], [row], []);

    expect(rows[0].away_result).toBe('win');
    expect(rows[0].home_result).toBe('loss');
  });

  it('keeps pending rows pending', () => {
    const { rows } = upsertRows([], [pendingRecord()], []);
    expect(rows[0].away_result).toBe('pending');
    expect(rows[0].home_result).toBe('pending');
  });

  it('replaces every stored row of a targeted date', () => {
    const existing = [
      makeRecord({ date: '2025-04-01', away_team: 'OB', home_team: 'SK', venue: 'Munhak' }),
      makeRecord({ date: '2025-04-01', away_team: 'HH', home_team: 'KT', venue: 'Suwon' }),
      makeRecord({ date: '2025-03-31' }),
    ];
    const batch = [makeRecord({ date: '2025-04-01', away_team: 'OB', home_team: 'SK', venue: 'Munhak', away_score: 9 })];

    const result = upsertRows(existing, batch, ['2025-04-01']);

    expect(result.rows.map(compositeKey)).toEqual(['2025-03-31|LT|LG', '2025-04-01|OB|SK']);
    expect(result.rows[1].away_score).toBe(9);
    expect(result.inserted).toBe(0);
    expect(result.replaced).toBe(1);
  });

  it('replaces a stored row sharing a key even outside the targeted dates', () => {
    const existing = [pendingRecord({ date: '2025-04-01' })];
    const batch = [makeRecord({ date: '2025-04-01' })];

    const result = upsertRows(existing, batch, []);

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0].home_result).toBe('win');
  });

  it('keeps the last row per event id and per key', () => {
    const batch = [
      makeRecord({ event_id: '20250322LTLG0', away_score: 1 }),
      makeRecord({ event_id: '20250322LTLG0', away_score: 3 }),
      makeRecord({ date: '2025-03-23', away_score: 4 }),
      makeRecord({ date: '2025-03-23', away_score: 6 }),
    ];
    const { rows, inserted } = upsertRows([], batch, ['2025-03-22', '2025-03-23']);

    expect(rows.map((r) => r.away_score)).toEqual([3, 6]);
    expect(inserted).toBe(2);
  });

  it('sorts by date, venue, home team and away team', () => {
    const batch = [
      makeRecord({ date: '2025-04-02', venue: 'Sajik', home_team: 'LT', away_team: 'NC' }),
      makeRecord({ date: '2025-04-01', venue: 'Suwon', home_team: 'KT', away_team: 'HH' }),
      makeRecord({ date: '2025-04-01', venue: 'Jamsil', home_team: 'OB', away_team: 'SS' }),
      makeRecord({ date: '2025-04-01', venue: 'Jamsil', home_team: 'LG', away_team: 'HT' }),
    ];
    const { rows } = upsertRows([], batch, []);

    expect(rows.map((r) => `${r.date} ${r.venue} ${r.home_team}`)).toEqual([
      '2025-04-01 Jamsil LG',
      '2025-04-01 Jamsil OB',
      '2025-04-01 Suwon KT',
      '2025-04-02 Sajik LT',
    ]);
  });

  it('drops malformed rows and counts them', () => {
    const batch = [
      makeRecord(),
      { ...makeRecord({ date: '2025-03-23' }), away_score: 'abc' },
      { ...makeRecord({ date: '2025-03-24' }), venue: '20250324' },
      { ...makeRecord(), date: 'yesterday' },
    ];
    const result = upsertRows([], batch, ['2025-03-22']);

    expect(result.rows).toHaveLength(1);
    expect(result.dropped).toBe(3);
    expect(result.accepted).toBe(1);
    expect(result.rejections[0].code).toBe('MALFORMED_RECORD');
  });

  it('is idempotent when the same batch is merged twice', () => {
    const batch = [makeRecord(), makeRecord({ date: '2025-03-23', away_team: 'OB', home_team: 'SK', venue: 'Munhak' })];
    const first = upsertRows([], batch, ['2025-03-22', '2025-03-23']);
    const second = upsertRows(first.rows, batch, ['2025-03-22', '2025-03-23']);

    expect(second.rows).toEqual(first.rows);
  });

  it('never leaves two rows with the same key', () => {
    const existing = [makeRecord(), makeRecord({ date: '2025-03-23' })];
    const batch = [makeRecord({ away_score: 8 }), makeRecord({ date: '2025-03-23', away_score: 1 })];
    const { rows } = upsertRows(existing, batch, []);

    const keys = rows.map(compositeKey);
    expect(new Set(keys).size).toBe(keys.length);
  });
});

describe('validateRows', () => {
  it('accepts scores written as decimals and coerces noisy counts', () => {
    const { valid, rejections } = validateRows([{ ...makeRecord(), away_score: '2.0', away_hit: '7개' }]);

    expect(rejections).toEqual([]);
    expect(valid[0].away_score).toBe(2);
    expect(valid[0].away_hit).toBe(7);
  });
});
