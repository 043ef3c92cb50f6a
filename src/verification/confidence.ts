/**
 * Confidence adjustment from verification feedback.
 *
 * @packageDocumentation
 */

import type { VerificationConfig } from '../config/types.js';
import { DEFAULT_VERIFICATION } from '../config/defaults.js';
import { clampUnit } from '../theory/judgment.js';
import type { TheoryId, TheoryResult } from '../theory/types.js';
import { Logger } from '../utils/logger.js';
import type {
  ConfidenceAdjustment,
  VerificationFeedback,
  VerificationOutcome,
  VerificationQuestion,
} from './types.js';

export function deltaFor(outcome: VerificationOutcome, config: VerificationConfig): number {
  switch (outcome) {
    case 'confirmed':
      return config.confirmed_delta;
    case 'partial':
      return config.partial_delta;
    case 'denied':
      return config.denied_delta;
    case 'unknown':
      return 0;
  }
}

export interface AdjustmentResult {
  /** Results with adjusted confidences, in input order. */
  readonly results: readonly TheoryResult[];
  readonly adjustments: readonly ConfidenceAdjustment[];
}

export interface ApplyFeedbackOptions {
  readonly config?: VerificationConfig | undefined;
  readonly now?: Date | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Applies feedback in order. Each delta is clamped to [0,1] on its own, so
 * accumulated deltas never leave the range. Feedback for theories no longer
 * in the result set is ignored.
 */
export function applyFeedback(
  results: readonly TheoryResult[],
  questions: readonly VerificationQuestion[],
  feedback: readonly VerificationFeedback[],
  options: ApplyFeedbackOptions = {}
): AdjustmentResult {
  const config = options.config ?? DEFAULT_VERIFICATION;
  const appliedAt = (options.now ?? new Date()).toISOString();
  const logger = options.logger ?? new Logger({ component: 'Verification' });

  const confidence = new Map<TheoryId, number>(
    results.map((result) => [result.theoryId, result.confidence])
  );
  const byId = new Map(questions.map((question) => [question.id, question]));
  const adjustments: ConfidenceAdjustment[] = [];

  for (const entry of feedback) {
    const question = byId.get(entry.questionId);
    const before = question === undefined ? undefined : confidence.get(question.theoryId);
    if (question === undefined || before === undefined) {
      continue;
    }
    const delta = deltaFor(entry.outcome, config);
    const after = clampUnit(before + delta);
    confidence.set(question.theoryId, after);
    adjustments.push({
      theoryId: question.theoryId,
      questionId: question.id,
      outcome: entry.outcome,
      delta,
      confidenceBefore: before,
      confidenceAfter: after,
      appliedAt,
    });
    logger.info('confidence_adjusted', {
      theory: question.theoryId,
      question: question.id,
      outcome: entry.outcome,
      before,
      after,
    });
  }

  return {
    results: results.map((result) => {
      const adjusted = confidence.get(result.theoryId) ?? result.confidence;
      return adjusted === result.confidence
        ? result
        : Object.freeze({ ...result, confidence: adjusted });
    }),
    adjustments,
  };
}
