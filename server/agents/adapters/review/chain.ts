import type { CheerioAPI } from 'cheerio';

export type Side = 'away' | 'home';

export interface SidePair<T> {
  away: T;
  home: T;
}

/** A single way of reading a value from a review page; null when it does not apply */
export type Strategy<T> = ($: CheerioAPI) => T | null;

/**
 * Run strategies in order and return the first non-null value, or the
 * fallback when none resolves.
 */
export function firstResolved<T>($: CheerioAPI, strategies: ReadonlyArray<Strategy<T>>, fallback: T): T {
  for (const strategy of strategies) {
    const value = strategy($);
    if (value !== null) return value;
  }
  return fallback;
}

export function sideIndex(side: Side): number {
  return side === 'away' ? 0 : 1;
}

export function opposite(side: Side): Side {
  return side === 'away' ? 'home' : 'away';
}
