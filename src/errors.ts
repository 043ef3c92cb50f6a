/**
 * Error taxonomy for the divination engine.
 *
 * Every error carries the context (theory, stage, field) needed to tell the
 * user what information is missing or wrong. Errors raised by external
 * collaborators are wrapped in these classes at the boundary.
 *
 * @packageDocumentation
 */

import type { FieldName, TheoryId } from './theory/types.js';
import type { Stage } from './conversation/types.js';

/**
 * Base class for all engine errors.
 */
export class AuguryError extends Error {
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new AuguryError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'AuguryError';
    this.cause = cause;
  }
}

/**
 * A user-supplied value failed its field validator.
 */
export class InputValidationError extends AuguryError {
  /** The field the value was offered for. */
  public readonly field: FieldName;
  /** The rejected raw value. */
  public readonly value: unknown;
  /** The stage the value was offered in, when known. */
  public readonly stage: Stage | undefined;

  constructor(field: FieldName, value: unknown, message: string, stage?: Stage) {
    super(message);
    this.name = 'InputValidationError';
    this.field = field;
    this.value = value;
    this.stage = stage;
  }
}

/**
 * A theory runner failed to produce a result.
 */
export class CalculationError extends AuguryError {
  /** The theory whose calculation failed. */
  public readonly theoryId: TheoryId;

  constructor(theoryId: TheoryId, message: string, cause?: Error) {
    super(message, cause);
    this.name = 'CalculationError';
    this.theoryId = theoryId;
  }
}

/**
 * No theory could produce a result for the current input.
 */
export class InsufficientTheoriesError extends AuguryError {
  /** Fields that would make at least one more theory eligible. */
  public readonly missingFields: readonly FieldName[];

  constructor(message: string, missingFields: readonly FieldName[] = []) {
    super(message);
    this.name = 'InsufficientTheoriesError';
    this.missingFields = missingFields;
  }
}

/**
 * The extraction collaborator did not answer in time.
 */
export class ExtractionTimeoutError extends AuguryError {
  /** The stage the extraction ran for. */
  public readonly stage: Stage;
  /** The timeout that elapsed. */
  public readonly timeoutMs: number;

  constructor(stage: Stage, timeoutMs: number) {
    super(`Extraction for stage ${stage} timed out after ${String(timeoutMs)}ms`);
    this.name = 'ExtractionTimeoutError';
    this.stage = stage;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The extraction collaborator failed.
 */
export class ExtractionProviderError extends AuguryError {
  /** The stage the extraction ran for. */
  public readonly stage: Stage;

  constructor(stage: Stage, message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ExtractionProviderError';
    this.stage = stage;
  }
}

/**
 * The extraction collaborator answered with something that is not a field map.
 */
export class ExtractionParseError extends AuguryError {
  /** The stage the extraction ran for. */
  public readonly stage: Stage;

  constructor(stage: Stage, message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ExtractionParseError';
    this.stage = stage;
  }
}

/**
 * No arbitrator theory could run for a severe conflict.
 */
export class ArbitrationUnavailableError extends AuguryError {
  /** The conflicting pair. */
  public readonly pair: readonly [TheoryId, TheoryId];
  /** Candidates that were considered and rejected. */
  public readonly triedCandidates: readonly TheoryId[];

  constructor(
    pair: readonly [TheoryId, TheoryId],
    message: string,
    triedCandidates: readonly TheoryId[] = []
  ) {
    super(message);
    this.name = 'ArbitrationUnavailableError';
    this.pair = pair;
    this.triedCandidates = triedCandidates;
  }
}

/**
 * An analysis pass was cancelled before its results were joined.
 */
export class AnalysisCancelledError extends AuguryError {
  constructor(message = 'Analysis was cancelled') {
    super(message);
    this.name = 'AnalysisCancelledError';
  }
}

/**
 * Codes for session control failures.
 */
export type SessionErrorCode = 'SESSION_NOT_FOUND' | 'SESSION_CLOSED';

/**
 * A session control call referenced an unknown or finished session.
 */
export class SessionError extends AuguryError {
  public readonly code: SessionErrorCode;
  public readonly sessionId: string;

  constructor(code: SessionErrorCode, sessionId: string, message: string) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
    this.sessionId = sessionId;
  }
}

/**
 * Renders an engine error as a "need more or different information" message.
 *
 * @param error - Any thrown value.
 * @returns A message safe to show to the user.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof InputValidationError) {
    return `I need a different answer for ${error.field}: ${error.message}`;
  }
  if (error instanceof InsufficientTheoriesError) {
    if (error.missingFields.length > 0) {
      return `I need more information before I can read this: ${error.missingFields.join(', ')}`;
    }
    return 'I need more information before I can read this question.';
  }
  if (error instanceof SessionError) {
    return error.message;
  }
  return 'Something went wrong on my side; could you rephrase or add more detail?';
}
