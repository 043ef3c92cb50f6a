/**
 * Helpers over the ordered judgment scale.
 *
 * @packageDocumentation
 */

import { JUDGMENT_SCALE, type Judgment } from './types.js';

/**
 * Lower bounds of the judgment bands, best first.
 */
const LEVEL_BANDS: readonly (readonly [number, Judgment])[] = [
  [0.85, 'very-favorable'],
  [0.65, 'favorable'],
  [0.35, 'neutral'],
  [0.15, 'unfavorable'],
];

/**
 * Maps a level in [0,1] onto the judgment scale.
 *
 * @example
 * ```typescript
 * levelToJudgment(0.7); // 'favorable'
 * levelToJudgment(0.5); // 'neutral'
 * ```
 */
export function levelToJudgment(level: number): Judgment {
  for (const [floor, judgment] of LEVEL_BANDS) {
    if (level >= floor) {
      return judgment;
    }
  }
  return 'very-unfavorable';
}

/**
 * Position of a judgment on the scale, 0 (worst) to 4 (best).
 */
export function judgmentRank(judgment: Judgment): number {
  return JUDGMENT_SCALE.indexOf(judgment);
}

/**
 * Side of neutral a judgment falls on: -1, 0 or 1.
 */
export function judgmentPolarity(judgment: Judgment): -1 | 0 | 1 {
  const rank = judgmentRank(judgment);
  if (rank < 2) {
    return -1;
  }
  if (rank > 2) {
    return 1;
  }
  return 0;
}

/**
 * True when two judgments lie strictly on opposite sides of neutral.
 */
export function isOpposingPolarity(a: Judgment, b: Judgment): boolean {
  return judgmentPolarity(a) * judgmentPolarity(b) < 0;
}

export function isJudgment(value: unknown): value is Judgment {
  return typeof value === 'string' && JUDGMENT_SCALE.some((judgment) => judgment === value);
}

/**
 * Clamps a value into [0,1].
 */
export function clampUnit(value: number): number {
  if (value < 0) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}
