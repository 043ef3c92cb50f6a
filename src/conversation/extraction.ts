/**
 * Natural-language extraction boundary.
 *
 * Extraction is a fallback after the deterministic parsers. A turn waits for
 * it until it answers, fails or times out; every failure degrades the turn to
 * the deterministic result.
 *
 * @packageDocumentation
 */

import {
  AuguryError,
  ExtractionParseError,
  ExtractionProviderError,
  ExtractionTimeoutError,
} from '../errors.js';
import type { FieldName, UserInput } from '../theory/types.js';
import { Logger } from '../utils/logger.js';
import type { CandidateFields } from './parsing.js';
import type { Stage } from './types.js';

/**
 * Recovers candidate field values from free text. Must be side-effect free.
 * Returned values are validated before they are merged.
 */
export interface Extractor {
  extract(
    stage: Stage,
    rawText: string,
    knownFields: UserInput,
    signal?: AbortSignal
  ): Promise<CandidateFields>;
}

export type ExtractionFailure = ExtractionTimeoutError | ExtractionProviderError | ExtractionParseError;

export type ExtractionOutcome =
  | { readonly status: 'ok'; readonly fields: CandidateFields }
  | { readonly status: 'failed'; readonly error: ExtractionFailure };

export interface ExtractOptions {
  readonly timeoutMs: number;
  /** Session signal; aborting it aborts the extraction too. */
  readonly signal?: AbortSignal | undefined;
  readonly logger?: Logger | undefined;
}

function isCandidateFields(value: unknown): value is CandidateFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFailure(stage: Stage, error: unknown): ExtractionFailure {
  if (
    error instanceof ExtractionTimeoutError ||
    error instanceof ExtractionProviderError ||
    error instanceof ExtractionParseError
  ) {
    return error;
  }
  if (error instanceof AuguryError) {
    return new ExtractionProviderError(stage, error.message, error);
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ExtractionProviderError(stage, `Extraction failed: ${cause.message}`, cause);
}

/**
 * Calls the extractor with a timeout. The extractor's signal fires on
 * timeout or when the session signal aborts.
 */
export async function extractWithTimeout(
  extractor: Extractor,
  stage: Stage,
  rawText: string,
  knownFields: UserInput,
  options: ExtractOptions
): Promise<ExtractionOutcome> {
  const logger = options.logger ?? new Logger({ component: 'FlowGuard' });
  const controller = new AbortController();
  const onAbort = (): void => {
    controller.abort();
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new ExtractionTimeoutError(stage, options.timeoutMs));
    }, options.timeoutMs);
  });

  try {
    const raw: unknown = await Promise.race([
      extractor.extract(stage, rawText, knownFields, controller.signal),
      timeout,
    ]);
    if (!isCandidateFields(raw)) {
      throw new ExtractionParseError(stage, 'Extractor returned something other than a field map');
    }
    const fields = Object.keys(raw);
    logger.debug('extraction_completed', { stage, fields });
    return { status: 'ok', fields: raw };
  } catch (error) {
    const failure = toFailure(stage, error);
    logger.warn('extraction_failed', { stage, error: failure.name, message: failure.message });
    return { status: 'failed', error: failure };
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Field names a candidate map offers, in declaration order of the given list.
 */
export function offeredFields(
  candidates: CandidateFields,
  fields: readonly FieldName[]
): FieldName[] {
  return fields.filter((field) => candidates[field] !== undefined);
}
