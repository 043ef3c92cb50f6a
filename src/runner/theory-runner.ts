/**
 * Theory runner boundary and the concurrent join around it.
 *
 * A runner executes one theory. The engine never looks inside a result's
 * payload; it only checks the result against the shared shape before the
 * result may reach conflict resolution.
 *
 * @packageDocumentation
 */

import { AnalysisCancelledError, CalculationError } from '../errors.js';
import { isJudgment } from '../theory/judgment.js';
import type { TheoryDescriptor, TheoryId, TheoryResult, UserInput } from '../theory/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Executes one theory against the collected input.
 *
 * Implementations reject with {@link CalculationError} when the theory
 * cannot produce a reading. Any other rejection is wrapped into one.
 */
export interface TheoryRunner {
  run(descriptor: TheoryDescriptor, input: UserInput, signal?: AbortSignal): Promise<TheoryResult>;
}

/**
 * A theory dropped from a pass, with the reason logged for it.
 */
export interface RunFailure {
  readonly theoryId: TheoryId;
  readonly reason: string;
  readonly error: CalculationError;
}

/**
 * Joined outcome of one pass. Results keep the order the theories were given in.
 */
export interface RunOutcome {
  readonly results: readonly TheoryResult[];
  readonly failures: readonly RunFailure[];
}

export interface RunTheoriesOptions {
  readonly signal?: AbortSignal | undefined;
  readonly logger?: Logger | undefined;
}

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

/**
 * Checks a runner's result against the shared result shape and freezes it.
 *
 * @throws CalculationError when the result does not conform.
 */
export function validateResult(descriptor: TheoryDescriptor, result: TheoryResult): TheoryResult {
  const problems: string[] = [];
  if (result.theoryId !== descriptor.id) {
    problems.push(`theoryId '${result.theoryId}' does not match '${descriptor.id}'`);
  }
  if (!isJudgment(result.judgment)) {
    problems.push(`unknown judgment '${String(result.judgment)}'`);
  }
  if (!inUnitRange(result.judgmentLevel)) {
    problems.push(`judgmentLevel ${String(result.judgmentLevel)} is outside [0,1]`);
  }
  if (!inUnitRange(result.confidence)) {
    problems.push(`confidence ${String(result.confidence)} is outside [0,1]`);
  }
  if (problems.length > 0) {
    throw new CalculationError(descriptor.id, `Malformed result: ${problems.join('; ')}`);
  }

  return Object.freeze({
    ...result,
    payload: Object.freeze({ ...result.payload }),
    retrospectiveClaims:
      result.retrospectiveClaims === undefined
        ? undefined
        : Object.freeze([...result.retrospectiveClaims]),
  });
}

/**
 * Runs one theory and validates its result. Every failure surfaces as a
 * CalculationError.
 */
export async function runOne(
  runner: TheoryRunner,
  descriptor: TheoryDescriptor,
  input: UserInput,
  signal?: AbortSignal
): Promise<TheoryResult> {
  try {
    return validateResult(descriptor, await runner.run(descriptor, input, signal));
  } catch (error) {
    if (error instanceof CalculationError) {
      throw error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new CalculationError(descriptor.id, `Runner failed: ${cause.message}`, cause);
  }
}

/**
 * Runs theories concurrently and joins them. Failing theories are dropped
 * with a logged reason; the rest are returned as one complete set.
 *
 * @throws AnalysisCancelledError when the signal fires before the join.
 */
export async function runTheories(
  runner: TheoryRunner,
  descriptors: readonly TheoryDescriptor[],
  input: UserInput,
  options: RunTheoriesOptions = {}
): Promise<RunOutcome> {
  const logger = options.logger ?? new Logger({ component: 'TheoryRunner' });
  const { signal } = options;

  const settled = await Promise.allSettled(
    descriptors.map((descriptor) => runOne(runner, descriptor, input, signal))
  );

  if (signal?.aborted === true) {
    logger.info('run_discarded', { theories: descriptors.map((d) => d.id) });
    throw new AnalysisCancelledError();
  }

  const results: TheoryResult[] = [];
  const failures: RunFailure[] = [];
  settled.forEach((outcome, index) => {
    const descriptor = descriptors[index];
    if (descriptor === undefined) {
      return;
    }
    if (outcome.status === 'fulfilled') {
      results.push(outcome.value);
      return;
    }
    const error =
      outcome.reason instanceof CalculationError
        ? outcome.reason
        : new CalculationError(descriptor.id, String(outcome.reason));
    failures.push({ theoryId: descriptor.id, reason: error.message, error });
    logger.warn('theory_dropped', { theory: descriptor.id, reason: error.message });
  });

  logger.info('theories_joined', {
    succeeded: results.map((result) => result.theoryId),
    dropped: failures.map((failure) => failure.theoryId),
  });
  return { results, failures };
}
