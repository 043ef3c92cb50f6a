/**
 * Per-session conversation context. Owned and mutated by the flow guard of
 * one session only.
 *
 * @packageDocumentation
 */

import type { AnalysisResult } from '../analysis/pipeline.js';
import { ResultCache } from '../analysis/result-cache.js';
import type { ComprehensiveReport } from '../report/report.js';
import type { FieldName, UserInput } from '../theory/types.js';
import type { VerificationFeedback, VerificationQuestion } from '../verification/types.js';
import type { MessageEntry, MessageRole, Stage } from './types.js';

export interface ConversationContext {
  readonly sessionId: string;
  stage: Stage;
  /** Replaced, never mutated in place. */
  input: UserInput;
  readonly completedStages: Set<Stage>;
  /** Fields the user declined to give. */
  readonly skippedFields: Set<FieldName>;
  /** Failed turns per stage. */
  readonly reprompts: Map<Stage, number>;
  readonly cache: ResultCache;
  analysis: AnalysisResult | undefined;
  questions: readonly VerificationQuestion[];
  readonly feedback: VerificationFeedback[];
  report: ComprehensiveReport | undefined;
  readonly history: MessageEntry[];
  readonly historyLimit: number;
  /** Fires when the session is abandoned. */
  readonly abort: AbortController;
  /** ISO 8601. */
  readonly startedAt: string;
}

export interface CreateContextOptions {
  readonly sessionId: string;
  readonly question: string;
  readonly now: Date;
  readonly historyLimit: number;
}

/**
 * Fresh context in INIT with the question and the session start time.
 */
export function createContext(options: CreateContextOptions): ConversationContext {
  const startedAt = options.now.toISOString();
  return {
    sessionId: options.sessionId,
    stage: 'INIT',
    input: { questionText: options.question.trim(), currentTime: startedAt },
    completedStages: new Set(),
    skippedFields: new Set(),
    reprompts: new Map(),
    cache: new ResultCache(),
    analysis: undefined,
    questions: [],
    feedback: [],
    report: undefined,
    history: [],
    historyLimit: options.historyLimit,
    abort: new AbortController(),
    startedAt,
  };
}

/**
 * Appends a message, dropping the oldest beyond the history limit.
 */
export function recordMessage(
  context: ConversationContext,
  role: MessageRole,
  content: string,
  now: Date
): void {
  context.history.push({ role, stage: context.stage, content, timestamp: now.toISOString() });
  while (context.history.length > context.historyLimit) {
    context.history.shift();
  }
}
