/**
 * Plate-appearance notation
 *
 * The inning grid of a batting table holds one short note per plate appearance,
 * several per cell separated by "/" when a batter came up twice in an inning
 * ("좌안", "중2", "우홈", "4구", "삼진", "유땅/희번"). English notation (1B, HR,
 * BB, K) is accepted too.
 */

export type PlateOutcome =
  | 'single'
  | 'double'
  | 'triple'
  | 'home_run'
  | 'walk'
  | 'hit_by_pitch'
  | 'sac_fly'
  | 'sac_bunt'
  | 'out';

export const HIT_OUTCOMES: ReadonlySet<PlateOutcome> = new Set(['single', 'double', 'triple', 'home_run']);

const NOT_AT_BAT: ReadonlySet<PlateOutcome> = new Set(['walk', 'hit_by_pitch', 'sac_fly', 'sac_bunt']);

// Checked in order; the first matching rule wins
const RULES: ReadonlyArray<[PlateOutcome, RegExp]> = [
  ['sac_fly', /^(?:희비|희생플라이|SF)$/i],
  ['sac_bunt', /^(?:희번|희생번트|SH|SAC)$/i],
  ['hit_by_pitch', /^(?:사구|몸에맞는볼|HBP)$/i],
  ['walk', /^(?:4구|고4구?|고의4구|볼넷|I?BB)$/i],
  ['home_run', /(?:홈$|홈런$|^HR$)/i],
  ['triple', /^(?:(?:좌|중|우|좌중|우중)3|3루타|3B)$/i],
  ['double', /^(?:(?:좌|중|우|좌중|우중)2|2루타|2B)$/i],
  ['single', /(?:안$|^1루타$|^1B$|^single$)/i],
];

/**
 * Classify one plate-appearance note; null for an empty note
 */
export function classifyPlateAppearance(note: string): PlateOutcome | null {
  const token = note.replace(/\s+/g, '');
  if (!token || token === '-') return null;
  for (const [outcome, pattern] of RULES) {
    if (pattern.test(token)) return outcome;
  }
  return 'out';
}

export function classifyCell(cell: string): PlateOutcome[] {
  const outcomes: PlateOutcome[] = [];
  for (const note of cell.split('/')) {
    const outcome = classifyPlateAppearance(note);
    if (outcome) outcomes.push(outcome);
  }
  return outcomes;
}

export function isHit(outcome: PlateOutcome): boolean {
  return HIT_OUTCOMES.has(outcome);
}

/** Hits and outs count as official at-bats; walks, hit-by-pitches and sacrifices do not */
export function countsAsAtBat(outcome: PlateOutcome): boolean {
  return !NOT_AT_BAT.has(outcome);
}
