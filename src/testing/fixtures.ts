/**
 * Builders for theory results and descriptors used across tests.
 *
 * @packageDocumentation
 */

import { levelToJudgment } from '../theory/judgment.js';
import type {
  Judgment,
  RetrospectiveClaim,
  TheoryDescriptor,
  TheoryId,
  TheoryResult,
} from '../theory/types.js';

export interface ResultOverrides {
  readonly judgment?: Judgment;
  readonly interpretation?: string;
  readonly retrospectiveClaims?: readonly RetrospectiveClaim[];
  readonly payload?: Readonly<Record<string, unknown>>;
}

/**
 * A result whose judgment is derived from its level unless overridden.
 */
export function makeResult(
  theoryId: TheoryId,
  judgmentLevel: number,
  confidence: number,
  overrides: ResultOverrides = {}
): TheoryResult {
  return {
    theoryId,
    judgment: overrides.judgment ?? levelToJudgment(judgmentLevel),
    judgmentLevel,
    confidence,
    payload: overrides.payload ?? {},
    interpretation: overrides.interpretation ?? `${theoryId} reading`,
    retrospectiveClaims: overrides.retrospectiveClaims,
  };
}

export const FLAT_VECTOR: readonly number[] = [0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5];

/**
 * A fast-tier descriptor with no required fields.
 */
export function makeDescriptor(
  id: TheoryId,
  overrides: Partial<TheoryDescriptor> = {}
): TheoryDescriptor {
  return {
    id,
    displayName: id,
    requiredFields: [],
    optionalFields: ['numbers'],
    fieldWeights: { numbers: 1 },
    minCompleteness: 0,
    tier: 'fast',
    affinity: FLAT_VECTOR,
    ...overrides,
  };
}
