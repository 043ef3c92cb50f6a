/**
 * Analysis pipeline: select, run, resolve.
 *
 * One pass selects theories for the collected input, runs those without a
 * valid cached result concurrently, joins them and resolves the complete set.
 * Severe conflicts are arbitrated by running one more theory.
 *
 * @packageDocumentation
 */

import { ArbitrationSystem } from '../arbitration/arbitration.js';
import type { Config } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  ArbitrationUnavailableError,
  CalculationError,
  InsufficientTheoriesError,
} from '../errors.js';
import {
  ConflictResolver,
  type ArbitrateFn,
  type ConflictResolution,
} from '../resolver/conflict-resolver.js';
import {
  runOne,
  runTheories,
  type RunFailure,
  type TheoryRunner,
} from '../runner/theory-runner.js';
import { TheorySelector, type SelectionResult } from '../selector/theory-selector.js';
import { getDefaultAffinityTables, type AffinityTables } from '../theory/affinity.js';
import { checkEligibility } from '../theory/completeness.js';
import type { TheoryRegistry } from '../theory/registry.js';
import type { FieldName, TheoryId, TheoryResult, UserInput } from '../theory/types.js';
import { Logger } from '../utils/logger.js';
import type { ResultCache } from './result-cache.js';

/**
 * Outcome of one analysis pass.
 */
export interface AnalysisResult {
  readonly selection: SelectionResult;
  /** Results in execution order. */
  readonly results: readonly TheoryResult[];
  readonly failures: readonly RunFailure[];
  readonly resolution: ConflictResolution;
  /** Theories whose cached result was reused. */
  readonly reused: readonly TheoryId[];
}

export interface AnalysisOptions {
  readonly signal?: AbortSignal | undefined;
  /** Fields the user declined to give. */
  readonly unavailableFields?: readonly FieldName[] | undefined;
}

export interface AnalysisPipelineOptions {
  readonly registry: TheoryRegistry;
  readonly runner: TheoryRunner;
  readonly config?: Config | undefined;
  readonly tables?: AffinityTables | undefined;
  readonly logger?: Logger | undefined;
}

export class AnalysisPipeline {
  private readonly registry: TheoryRegistry;
  private readonly runner: TheoryRunner;
  private readonly selector: TheorySelector;
  private readonly resolver: ConflictResolver;
  private readonly arbitration: ArbitrationSystem;
  private readonly logger: Logger;

  constructor(options: AnalysisPipelineOptions) {
    const config = options.config ?? DEFAULT_CONFIG;
    const tables = options.tables ?? getDefaultAffinityTables();
    const logger = options.logger ?? new Logger({ component: 'AnalysisPipeline' });
    this.registry = options.registry;
    this.runner = options.runner;
    this.logger = logger;
    this.selector = new TheorySelector({
      registry: options.registry,
      tables,
      config: config.selection,
      logger: logger.child('TheorySelector'),
    });
    this.resolver = new ConflictResolver({
      config: config.conflict,
      logger: logger.child('ConflictResolver'),
    });
    this.arbitration = new ArbitrationSystem({
      tables,
      config: config.arbitration,
      logger: logger.child('ArbitrationSystem'),
    });
  }

  /**
   * Runs the eligible fast-tier theories that have no valid cached result.
   *
   * @returns Every fast-tier reading now valid for the input.
   */
  async quickReadings(
    input: UserInput,
    cache: ResultCache,
    options: AnalysisOptions = {}
  ): Promise<TheoryResult[]> {
    const fast = this.registry
      .listByTier('fast')
      .filter((descriptor) => checkEligibility(input, descriptor).eligible);
    const pending = fast.filter((descriptor) => cache.get(descriptor, input) === undefined);

    if (pending.length > 0) {
      const { results } = await runTheories(this.runner, pending, input, {
        signal: options.signal,
        logger: this.logger.child('TheoryRunner'),
      });
      for (const result of results) {
        cache.set(this.registry.get(result.theoryId), input, result);
      }
    }

    const readings = fast.flatMap((descriptor) => {
      const cached = cache.get(descriptor, input);
      return cached === undefined ? [] : [cached];
    });
    this.logger.info('quick_readings', { theories: readings.map((r) => r.theoryId) });
    return readings;
  }

  /**
   * Full pass over the input.
   *
   * @throws InsufficientTheoriesError when nothing can be selected or every
   *   selected theory fails.
   */
  async analyze(
    input: UserInput,
    cache: ResultCache,
    options: AnalysisOptions = {}
  ): Promise<AnalysisResult> {
    const selection = this.selector.select(input, {
      unavailableFields: options.unavailableFields,
    });
    if (selection.selected.length === 0) {
      throw new InsufficientTheoriesError(
        'No theory is eligible for the collected input',
        selection.missingFields
      );
    }

    const descriptors = selection.executionOrder.map((id) => this.registry.get(id));
    const reused = descriptors
      .filter((descriptor) => cache.get(descriptor, input) !== undefined)
      .map((descriptor) => descriptor.id);
    const pending = descriptors.filter((descriptor) => cache.get(descriptor, input) === undefined);

    const { results: fresh, failures } = await runTheories(this.runner, pending, input, {
      signal: options.signal,
      logger: this.logger.child('TheoryRunner'),
    });
    for (const result of fresh) {
      cache.set(this.registry.get(result.theoryId), input, result);
    }
    const failed = new Set(failures.map((failure) => failure.theoryId));

    const results: TheoryResult[] = [];
    for (const descriptor of descriptors) {
      if (failed.has(descriptor.id)) {
        continue;
      }
      const cached = cache.get(descriptor, input);
      if (cached !== undefined) {
        results.push(cached);
      }
    }
    if (results.length === 0) {
      throw new InsufficientTheoriesError(
        'Every selected theory failed to produce a reading',
        selection.missingFields
      );
    }

    const resolution = await this.resolve(results, input, selection, cache, options.signal);
    this.logger.info('analysis_completed', {
      selected: selection.selected,
      reused,
      dropped: failures.map((failure) => failure.theoryId),
      strategy: resolution.strategy,
    });
    return { selection, results, failures, resolution, reused };
  }

  /**
   * Resolves a complete result set, arbitrating with theories outside it.
   * Arbitrator results are cached like any other.
   */
  async resolve(
    results: readonly TheoryResult[],
    input: UserInput,
    selection: SelectionResult,
    cache: ResultCache,
    signal?: AbortSignal
  ): Promise<ConflictResolution> {
    return this.resolver.resolve(results, {
      arbitrate: this.arbitrator(input, selection, cache, signal),
    });
  }

  /**
   * Arbitration delegate trying priority-list candidates until one runs.
   */
  private arbitrator(
    input: UserInput,
    selection: SelectionResult,
    cache: ResultCache,
    signal: AbortSignal | undefined
  ): ArbitrateFn {
    return async (record, pair, results) => {
      const used = [...selection.selected, ...results.map((r) => r.theoryId), ...record.pair];
      const candidates = this.arbitration.candidates(
        input.questionCategory ?? 'other',
        used,
        (id) => {
          const descriptor = this.registry.tryGet(id);
          return descriptor !== undefined && checkEligibility(input, descriptor).eligible;
        }
      );

      const tried: TheoryId[] = [];
      for (const id of candidates) {
        tried.push(id);
        try {
          const descriptor = this.registry.get(id);
          const result =
            cache.get(descriptor, input) ?? (await runOne(this.runner, descriptor, input, signal));
          cache.set(descriptor, input, result);
          return { status: 'completed', outcome: this.arbitration.arbitrate(result, pair) };
        } catch (error) {
          if (!(error instanceof CalculationError)) {
            throw error;
          }
          this.logger.warn('arbitrator_failed', { theory: id, reason: error.message });
        }
      }
      return {
        status: 'unavailable',
        error: new ArbitrationUnavailableError(
          record.pair,
          tried.length === 0 ? 'No eligible arbitrator left' : 'Every arbitrator failed',
          tried
        ),
      };
    };
  }
}
