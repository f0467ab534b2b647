import { describe, it, expect } from 'vitest';
import {
  battingAverage,
  coerceCount,
  compositeKey,
  datasetRowSchema,
  deriveResults,
  normalizeResult,
} from '@shared/schema';
import { eachIsoDate, normalizeDateInput, shiftIsoDate, toCompactDate } from '@shared/dates';
import { makeRecord } from '../helpers/kboTestUtils';

describe('dates', () => {
  it('normalizes both accepted spellings', () => {
    expect(normalizeDateInput('20250322')).toBe('2025-03-22');
    expect(normalizeDateInput(' 2025-03-22 ')).toBe('2025-03-22');
  });

  it('rejects impossible or foreign dates', () => {
    expect(normalizeDateInput('2025-02-30')).toBeNull();
    expect(normalizeDateInput('2025/03/22')).toBeNull();
    expect(normalizeDateInput('')).toBeNull();
  });

  it('steps across month ends', () => {
    expect(shiftIsoDate('2025-03-31', 1)).toBe('2025-04-01');
    expect(shiftIsoDate('2025-03-01', -1)).toBe('2025-02-28');
    expect(eachIsoDate('2025-03-30', '2025-04-01')).toEqual(['2025-03-30', '2025-03-31', '2025-04-01']);
    expect(eachIsoDate('2025-04-02', '2025-04-01')).toEqual([]);
  });

  it('compacts ISO dates', () => {
    expect(toCompactDate('2025-03-22')).toBe('20250322');
  });
});

describe('schema helpers', () => {
  it('coerces counts from noisy cells', () => {
    expect(coerceCount('12 (1)')).toBe(12);
    expect(coerceCount(4.7)).toBe(4);
    expect(coerceCount(-3)).toBe(0);
    expect(coerceCount('-')).toBe(0);
  });

  it('rounds batting averages to four places', () => {
    expect(battingAverage(7, 30)).toBe(0.2333);
    expect(battingAverage(10, 33)).toBe(0.303);
    expect(battingAverage(3, 0)).toBe(0);
  });

  it('maps result words in both languages', () => {
    expect(normalizeResult('승')).toBe('win');
    expect(normalizeResult(' L ')).toBe('loss');
    expect(normalizeResult('무')).toBe('draw');
    expect(normalizeResult('forfeit')).toBeNull();
  });

  it('derives results from the runs', () => {
    expect(deriveResults(5, 3)).toEqual(['win', 'loss']);
    expect(deriveResults(2, 12)).toEqual(['loss', 'win']);
    expect(deriveResults(4, 4)).toEqual(['draw', 'draw']);
  });

  it('keys a game by date and teams', () => {
    expect(compositeKey(makeRecord())).toBe('2025-03-22|LT|LG');
  });
});

describe('datasetRowSchema', () => {
  const raw = {
    date: '20250322',
    venue: ' Jamsil ',
    away_team: 'LT',
    home_team: 'LG',
    away_score: '2',
    home_score: '12',
    away_result: 'win',
    home_result: 'loss',
    away_hit: '7',
    home_hit: '10',
    away_hr: '2',
    home_hr: '1',
    away_ab: '30',
    home_ab: '33',
    away_avg: '0.9',
    home_avg: '0.9',
  };

  it('re-derives results and averages from the counts', () => {
    expect(datasetRowSchema.parse(raw)).toEqual(makeRecord());
  });

  it('keeps a game pending only when both sides are pending', () => {
    const pending = datasetRowSchema.parse({ ...raw, away_score: '0', home_score: '0', away_result: '예정', home_result: 'pending' });
    expect([pending.away_result, pending.home_result]).toEqual(['pending', 'pending']);

    const oneSided = datasetRowSchema.parse({ ...raw, away_score: '0', home_score: '0', away_result: 'pending' });
    expect([oneSided.away_result, oneSided.home_result]).toEqual(['draw', 'draw']);
  });

  it('accepts a whole-number score written with decimals', () => {
    expect(datasetRowSchema.parse({ ...raw, home_score: '12.0' }).home_score).toBe(12);
  });

  it('rejects a fractional score', () => {
    expect(datasetRowSchema.safeParse({ ...raw, away_score: '2.5' }).success).toBe(false);
  });

  it('rejects a venue that is a raw identifier', () => {
    expect(datasetRowSchema.safeParse({ ...raw, venue: '20250322' }).success).toBe(false);
    expect(datasetRowSchema.safeParse({ ...raw, venue: '2025-03-22' }).success).toBe(false);
  });

  it('rejects a row without a venue', () => {
    expect(datasetRowSchema.safeParse({ ...raw, venue: '' }).success).toBe(false);
    expect(datasetRowSchema.safeParse({ ...raw, venue: undefined }).success).toBe(false);
  });

  it('rejects a row without a team', () => {
    expect(datasetRowSchema.safeParse({ ...raw, home_team: ' ' }).success).toBe(false);
  });
});
