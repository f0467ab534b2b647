import { describe, it, expect } from 'vitest';
import { planTargetDates } from '@server/agents/rangePlanner';
import { InvalidOptionsError } from '@server/types/errors';
import { makeRecord, pendingRecord } from '../helpers/kboTestUtils';

const base = { recheckDays: 3, bootstrapSince: '20250322', today: '2025-04-10' };

describe('planTargetDates', () => {
  it('bootstraps an empty dataset up to yesterday', () => {
    const plan = planTargetDates({ ...base, existing: [], today: '2025-03-25' });

    expect(plan.dates).toEqual(['2025-03-22', '2025-03-23', '2025-03-24']);
    expect(plan.primary).toEqual({ since: '2025-03-22', until: '2025-03-24' });
    expect(plan.rechecks).toEqual([]);
  });

  it('continues the day after the newest stored date', () => {
    const existing = [makeRecord({ date: '2025-04-06' }), makeRecord({ date: '2025-04-07' })];
    const plan = planTargetDates({ ...base, existing });

    expect(plan.dates).toEqual(['2025-04-08', '2025-04-09']);
  });

  it('accepts explicit compact or ISO bounds', () => {
    const plan = planTargetDates({ ...base, existing: [], since: '20250401', until: '2025-04-03' });

    expect(plan.dates).toEqual(['2025-04-01', '2025-04-02', '2025-04-03']);
  });

  it('clips until to today', () => {
    const plan = planTargetDates({ ...base, existing: [], since: '2025-04-09', until: '2025-04-20' });

    expect(plan.dates).toEqual(['2025-04-09', '2025-04-10']);
    expect(plan.primary).toEqual({ since: '2025-04-09', until: '2025-04-10' });
  });

  it('adds recent pending dates even when the primary range is empty', () => {
    const existing = [
      makeRecord({ date: '2025-04-06' }),
      pendingRecord({ date: '2025-04-08' }),
      pendingRecord({ date: '2025-04-08', away_team: 'OB', home_team: 'SK' }),
      pendingRecord({ date: '2025-04-01' }), // outside the window
      makeRecord({ date: '2025-04-09' }),
    ];
    const plan = planTargetDates({ ...base, existing, since: '2025-04-10', until: '2025-04-09' });

    expect(plan.primary).toBeNull();
    expect(plan.rechecks).toEqual(['2025-04-08']);
    expect(plan.dates).toEqual(['2025-04-08']);
  });

  it('merges rechecks into the primary range without duplicates', () => {
    const existing = [pendingRecord({ date: '2025-04-09' }), pendingRecord({ date: '2025-04-07' })];
    const plan = planTargetDates({ ...base, existing, since: '2025-04-09' });

    expect(plan.dates).toEqual(['2025-04-07', '2025-04-09']);
  });

  it('resumes incomplete dates that are not in the future', () => {
    const existing = [makeRecord({ date: '2025-04-09' }), pendingRecord({ date: '2025-04-08' })];
    const plan = planTargetDates({
      ...base,
      existing,
      incomplete: ['20250402', '2025-04-08', '2025-04-02', '2025-04-11'],
    });

    expect(plan.primary).toBeNull();
    expect(plan.resumes).toEqual(['2025-04-02', '2025-04-08']);
    expect(plan.rechecks).toEqual(['2025-04-08']);
    expect(plan.dates).toEqual(['2025-04-02', '2025-04-08']);
  });

  it('is idempotent for unchanged inputs', () => {
    const input = { ...base, existing: [pendingRecord({ date: '2025-04-08' })] };
    expect(planTargetDates(input)).toEqual(planTargetDates(input));
  });

  it('rejects malformed dates', () => {
    expect(() => planTargetDates({ ...base, existing: [], since: '2025/04/01' })).toThrow(InvalidOptionsError);
  });
});
