/**
 * Conflict resolution across theory results.
 *
 * Every unordered pair of results is classified into a tier by the gap
 * between their levels and by polarity. The highest tier over all pairs
 * selects one blend for the whole set:
 *
 * | Tier | Condition                               | Blend                                   |
 * |------|-----------------------------------------|-----------------------------------------|
 * | 1    | gap <= consistent                       | confidence-weighted mode and mean       |
 * | 2    | gap <= minor                            | arithmetic mean of levels               |
 * | 3    | gap <= significant                      | weights confidence^boost                |
 * | 4    | opposite polarity, or gap > significant | arbitration, else conservative fallback |
 *
 * @packageDocumentation
 */

import type { ArbitrationOutcome } from '../arbitration/arbitration.js';
import type { ConflictConfig } from '../config/types.js';
import { DEFAULT_CONFLICT } from '../config/defaults.js';
import { ArbitrationUnavailableError, InsufficientTheoriesError } from '../errors.js';
import { isOpposingPolarity, levelToJudgment } from '../theory/judgment.js';
import type { Judgment, TheoryId, TheoryResult } from '../theory/types.js';
import { Logger } from '../utils/logger.js';

export type ConflictTier = 1 | 2 | 3 | 4;

/**
 * Name of the rule that produced a resolution.
 */
export type ResolutionStrategy =
  | 'consensus'
  | 'simple-average'
  | 'weighted-average'
  | 'arbitration'
  | 'conservative-fallback';

/**
 * Disagreement between two results.
 */
export interface ConflictRecord {
  readonly pair: readonly [TheoryId, TheoryId];
  /** Absolute level gap. */
  readonly delta: number;
  readonly tier: ConflictTier;
  readonly arbitration?: ArbitrationOutcome | undefined;
}

/**
 * One blended verdict over a complete result set.
 */
export interface ConflictResolution {
  readonly strategy: ResolutionStrategy;
  readonly judgment: Judgment;
  readonly judgmentLevel: number;
  readonly confidence: number;
  /** Highest tier observed among the pairs. */
  readonly tier: ConflictTier;
  readonly records: readonly ConflictRecord[];
  /** Normalized blend weight per theory; empty when arbitration decided. */
  readonly weights: Readonly<Record<TheoryId, number>>;
  readonly theoryIds: readonly TheoryId[];
  readonly arbitration?: ArbitrationOutcome | undefined;
}

/**
 * Outcome of asking for arbitration.
 */
export type ArbitrationAttempt =
  | { readonly status: 'completed'; readonly outcome: ArbitrationOutcome }
  | { readonly status: 'unavailable'; readonly error: ArbitrationUnavailableError };

/**
 * Arbitrates the most severe pair of a result set.
 */
export type ArbitrateFn = (
  record: ConflictRecord,
  pair: readonly [TheoryResult, TheoryResult],
  results: readonly TheoryResult[]
) => Promise<ArbitrationAttempt>;

export interface ConflictResolverOptions {
  readonly config?: ConflictConfig | undefined;
  readonly logger?: Logger | undefined;
}

export interface ResolveOptions {
  /** Arbitration delegate. Without one, tier 4 falls back conservatively. */
  readonly arbitrate?: ArbitrateFn | undefined;
}

/** Absorbs float noise in level gaps such as 0.8 - 0.6. */
const GAP_TOLERANCE = 1e-9;

interface Blend {
  readonly level: number;
  readonly confidence: number;
  readonly weights: Record<TheoryId, number>;
}

/**
 * Weighted means of level and confidence. Falls back to equal weights when
 * every raw weight is zero.
 */
function blend(results: readonly TheoryResult[], rawWeights: readonly number[]): Blend {
  const total = rawWeights.reduce((sum, weight) => sum + weight, 0);
  const normalized =
    total > 0 ? rawWeights.map((weight) => weight / total) : results.map(() => 1 / results.length);

  let level = 0;
  let confidence = 0;
  const weights: Record<TheoryId, number> = {};
  results.forEach((result, index) => {
    const weight = normalized[index] ?? 0;
    level += weight * result.judgmentLevel;
    confidence += weight * result.confidence;
    weights[result.theoryId] = (weights[result.theoryId] ?? 0) + weight;
  });
  return { level, confidence, weights };
}

/**
 * Judgment carrying the most total confidence. Ties go to the judgment that
 * appears first in the result order.
 */
function weightedMode(results: readonly TheoryResult[]): Judgment {
  const totals = new Map<Judgment, number>();
  for (const result of results) {
    totals.set(result.judgment, (totals.get(result.judgment) ?? 0) + result.confidence);
  }
  let best: Judgment | undefined;
  let bestTotal = -1;
  for (const [judgment, total] of totals) {
    if (total > bestTotal) {
      best = judgment;
      bestTotal = total;
    }
  }
  return best ?? 'neutral';
}

/**
 * Classifies and blends theory results.
 */
export class ConflictResolver {
  private readonly config: ConflictConfig;
  private readonly logger: Logger;

  constructor(options: ConflictResolverOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFLICT;
    this.logger = options.logger ?? new Logger({ component: 'ConflictResolver' });
  }

  /**
   * Tier of the disagreement between two results. Symmetric in its arguments.
   */
  classify(a: TheoryResult, b: TheoryResult): ConflictTier {
    const delta = Math.abs(a.judgmentLevel - b.judgmentLevel) - GAP_TOLERANCE;
    if (isOpposingPolarity(a.judgment, b.judgment) || delta > this.config.significant_threshold) {
      return 4;
    }
    if (delta <= this.config.consistent_threshold) {
      return 1;
    }
    if (delta <= this.config.minor_threshold) {
      return 2;
    }
    return 3;
  }

  /**
   * Records every unordered pair, in result order.
   */
  compareAll(results: readonly TheoryResult[]): ConflictRecord[] {
    const records: ConflictRecord[] = [];
    for (let i = 0; i < results.length; i++) {
      for (let j = i + 1; j < results.length; j++) {
        const a = results[i];
        const b = results[j];
        if (a === undefined || b === undefined) {
          continue;
        }
        records.push({
          pair: [a.theoryId, b.theoryId],
          delta: Math.abs(a.judgmentLevel - b.judgmentLevel),
          tier: this.classify(a, b),
        });
      }
    }
    return records;
  }

  /**
   * Produces one verdict for a complete result set.
   *
   * @throws InsufficientTheoriesError when the set is empty.
   */
  async resolve(
    results: readonly TheoryResult[],
    options: ResolveOptions = {}
  ): Promise<ConflictResolution> {
    if (results.length === 0) {
      throw new InsufficientTheoriesError('No theory results to resolve');
    }

    const records = this.compareAll(results);
    const tier = records.reduce<ConflictTier>(
      (highest, record) => (record.tier > highest ? record.tier : highest),
      1
    );
    const theoryIds = results.map((result) => result.theoryId);

    const resolution = await this.blendForTier(tier, results, records, theoryIds, options);

    this.logger.info('conflict_resolved', {
      strategy: resolution.strategy,
      tier: resolution.tier,
      judgment: resolution.judgment,
      judgmentLevel: resolution.judgmentLevel,
      confidence: resolution.confidence,
      theories: theoryIds,
    });
    return resolution;
  }

  private async blendForTier(
    tier: ConflictTier,
    results: readonly TheoryResult[],
    records: readonly ConflictRecord[],
    theoryIds: readonly TheoryId[],
    options: ResolveOptions
  ): Promise<ConflictResolution> {
    switch (tier) {
      case 1: {
        const { level, confidence, weights } = blend(
          results,
          results.map((result) => result.confidence)
        );
        return {
          strategy: 'consensus',
          judgment: weightedMode(results),
          judgmentLevel: level,
          confidence,
          tier,
          records,
          weights,
          theoryIds,
        };
      }
      case 2: {
        const { level, confidence, weights } = blend(
          results,
          results.map(() => 1)
        );
        return {
          strategy: 'simple-average',
          judgment: levelToJudgment(level),
          judgmentLevel: level,
          confidence,
          tier,
          records,
          weights,
          theoryIds,
        };
      }
      case 3: {
        const boost = this.config.confidence_boost;
        const { level, confidence, weights } = blend(
          results,
          results.map((result) => result.confidence ** boost)
        );
        return {
          strategy: 'weighted-average',
          judgment: levelToJudgment(level),
          judgmentLevel: level,
          confidence,
          tier,
          records,
          weights,
          theoryIds,
        };
      }
      case 4:
        return this.resolveSevere(results, records, theoryIds, options.arbitrate);
    }
  }

  private async resolveSevere(
    results: readonly TheoryResult[],
    records: readonly ConflictRecord[],
    theoryIds: readonly TheoryId[],
    arbitrate: ArbitrateFn | undefined
  ): Promise<ConflictResolution> {
    const severe = records
      .filter((record) => record.tier === 4)
      .reduce<ConflictRecord | undefined>(
        (worst, record) => (worst === undefined || record.delta > worst.delta ? record : worst),
        undefined
      );
    const a = results.find((result) => result.theoryId === severe?.pair[0]);
    const b = results.find((result) => result.theoryId === severe?.pair[1]);

    if (arbitrate !== undefined && severe !== undefined && a !== undefined && b !== undefined) {
      this.logger.info('arbitration_requested', { pair: severe.pair, delta: severe.delta });
      const attempt = await arbitrate(severe, [a, b], results);
      if (attempt.status === 'completed') {
        const { outcome } = attempt;
        return {
          strategy: 'arbitration',
          judgment: outcome.adoptedJudgment,
          judgmentLevel: outcome.adoptedLevel,
          confidence: outcome.confidence,
          tier: 4,
          records: records.map((record) =>
            record === severe ? { ...record, arbitration: outcome } : record
          ),
          weights: {},
          theoryIds,
          arbitration: outcome,
        };
      }
      this.logger.info('arbitration_unavailable', {
        pair: attempt.error.pair,
        tried: attempt.error.triedCandidates,
        reason: attempt.error.message,
      });
    }

    return this.conservativeFallback(results, records, theoryIds);
  }

  /**
   * Confidence-weighted level pulled toward neutral, with capped confidence.
   */
  private conservativeFallback(
    results: readonly TheoryResult[],
    records: readonly ConflictRecord[],
    theoryIds: readonly TheoryId[]
  ): ConflictResolution {
    const { level, confidence, weights } = blend(
      results,
      results.map((result) => result.confidence)
    );
    const dampened = 0.5 + (level - 0.5) * this.config.neutral_dampening;
    return {
      strategy: 'conservative-fallback',
      judgment: levelToJudgment(dampened),
      judgmentLevel: dampened,
      confidence: Math.min(confidence, this.config.fallback_confidence_cap),
      tier: 4,
      records,
      weights,
      theoryIds,
    };
  }
}
