/**
 * Retrospective verification types.
 *
 * @packageDocumentation
 */

import type { AnswerShape, RetrospectiveClaim, TheoryId } from '../theory/types.js';

export type VerificationOutcome = 'confirmed' | 'partial' | 'denied' | 'unknown';

/**
 * A question about the user's past tied to one claim of one theory.
 */
export interface VerificationQuestion {
  readonly id: string;
  readonly theoryId: TheoryId;
  readonly claim: RetrospectiveClaim;
  readonly shape: AnswerShape;
  /** Text shown to the user. */
  readonly prompt: string;
  /** True when the claim was derived from the judgment rather than stated by the theory. */
  readonly synthesized: boolean;
}

export interface VerificationFeedback {
  readonly questionId: string;
  readonly answer: string;
  readonly outcome: VerificationOutcome;
}

/**
 * One confidence change applied to one theory.
 */
export interface ConfidenceAdjustment {
  readonly theoryId: TheoryId;
  readonly questionId: string;
  readonly outcome: VerificationOutcome;
  readonly delta: number;
  readonly confidenceBefore: number;
  readonly confidenceAfter: number;
  /** ISO 8601. */
  readonly appliedAt: string;
}
