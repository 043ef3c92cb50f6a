/**
 * The comprehensive report handed to presentation layers.
 *
 * @packageDocumentation
 */

import type { ConflictResolution } from '../resolver/conflict-resolver.js';
import type { RunFailure } from '../runner/theory-runner.js';
import type {
  FieldName,
  Judgment,
  QuestionCategory,
  TheoryId,
  TheoryResult,
} from '../theory/types.js';
import type {
  ConfidenceAdjustment,
  VerificationFeedback,
  VerificationQuestion,
} from '../verification/types.js';

export interface DroppedTheory {
  readonly theoryId: TheoryId;
  readonly reason: string;
}

export interface Verdict {
  readonly judgment: Judgment;
  readonly judgmentLevel: number;
  readonly confidence: number;
  readonly summary: string;
}

/**
 * Serializable aggregate of one analysed session.
 */
export interface ComprehensiveReport {
  readonly sessionId: string;
  readonly question: string;
  readonly category: QuestionCategory;
  readonly selectedTheories: readonly TheoryId[];
  readonly executionOrder: readonly TheoryId[];
  /** Results after confidence adjustment. */
  readonly results: readonly TheoryResult[];
  readonly droppedTheories: readonly DroppedTheory[];
  readonly initialResolution: ConflictResolution;
  readonly finalResolution: ConflictResolution;
  readonly verificationQuestions: readonly VerificationQuestion[];
  readonly verificationFeedback: readonly VerificationFeedback[];
  readonly adjustments: readonly ConfidenceAdjustment[];
  readonly skippedFields: readonly FieldName[];
  readonly verdict: Verdict;
  /** ISO 8601. */
  readonly generatedAt: string;
}

export interface ReportInput {
  readonly sessionId: string;
  readonly question: string;
  readonly category: QuestionCategory;
  readonly selectedTheories: readonly TheoryId[];
  readonly executionOrder: readonly TheoryId[];
  readonly results: readonly TheoryResult[];
  readonly failures: readonly RunFailure[];
  readonly initialResolution: ConflictResolution;
  readonly finalResolution: ConflictResolution;
  readonly verificationQuestions: readonly VerificationQuestion[];
  readonly verificationFeedback: readonly VerificationFeedback[];
  readonly adjustments: readonly ConfidenceAdjustment[];
  readonly skippedFields: readonly FieldName[];
  readonly generatedAt: Date;
}

const JUDGMENT_PHRASES: Readonly<Record<Judgment, string>> = {
  'very-unfavorable': 'The signs are strongly against this for now',
  unfavorable: 'The signs lean against this for now',
  neutral: 'The signs are balanced; the outcome depends on how you act',
  favorable: 'The signs lean in your favour',
  'very-favorable': 'The signs are strongly in your favour',
};

function confidenceWord(confidence: number): string {
  if (confidence >= 0.75) {
    return 'high';
  }
  if (confidence >= 0.5) {
    return 'moderate';
  }
  return 'low';
}

/**
 * One-sentence verdict for a resolution.
 */
export function summarizeVerdict(resolution: ConflictResolution, theoryCount: number): Verdict {
  const agreement =
    resolution.strategy === 'arbitration'
      ? 'after arbitrating a disagreement'
      : resolution.strategy === 'conservative-fallback'
        ? 'although the readings disagree'
        : `across ${String(theoryCount)} readings`;
  return {
    judgment: resolution.judgment,
    judgmentLevel: resolution.judgmentLevel,
    confidence: resolution.confidence,
    summary: `${JUDGMENT_PHRASES[resolution.judgment]} (${confidenceWord(resolution.confidence)} confidence, ${agreement}).`,
  };
}

export function buildReport(input: ReportInput): ComprehensiveReport {
  return {
    sessionId: input.sessionId,
    question: input.question,
    category: input.category,
    selectedTheories: [...input.selectedTheories],
    executionOrder: [...input.executionOrder],
    results: [...input.results],
    droppedTheories: input.failures.map((failure) => ({
      theoryId: failure.theoryId,
      reason: failure.reason,
    })),
    initialResolution: input.initialResolution,
    finalResolution: input.finalResolution,
    verificationQuestions: [...input.verificationQuestions],
    verificationFeedback: [...input.verificationFeedback],
    adjustments: [...input.adjustments],
    skippedFields: [...input.skippedFields],
    verdict: summarizeVerdict(input.finalResolution, input.results.length),
    generatedAt: input.generatedAt.toISOString(),
  };
}
