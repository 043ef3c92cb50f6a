/**
 * Arbitration of severe conflicts by one additional, unused theory.
 *
 * The arbitrator comes from a category-specific priority list. Its judgment
 * is compared by polarity against both sides of the conflicting pair.
 *
 * @packageDocumentation
 */

import type { ArbitrationConfig } from '../config/types.js';
import { DEFAULT_ARBITRATION } from '../config/defaults.js';
import type { ConflictRecord } from '../resolver/conflict-resolver.js';
import { getDefaultAffinityTables, type AffinityTables } from '../theory/affinity.js';
import { judgmentPolarity, levelToJudgment } from '../theory/judgment.js';
import type { Judgment, QuestionCategory, TheoryId, TheoryResult } from '../theory/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Which side of the pair the arbitrator backed.
 */
export type MatchedSide = 'a' | 'b' | 'both' | 'none';

/**
 * Result of arbitrating one conflicting pair.
 */
export interface ArbitrationOutcome {
  readonly arbitratorId: TheoryId;
  readonly arbitratorResult: TheoryResult;
  readonly pair: readonly [TheoryId, TheoryId];
  readonly matchedSide: MatchedSide;
  readonly adoptedJudgment: Judgment;
  readonly adoptedLevel: number;
  /** Confidence before arbitration: the backed side's, or the pair mean. */
  readonly confidenceBefore: number;
  /** Confidence after arbitration. */
  readonly confidence: number;
  readonly inconclusive: boolean;
}

/**
 * Only the most severe tier is arbitrated.
 */
export function shouldArbitrate(record: ConflictRecord): boolean {
  return record.tier === 4;
}

export interface ArbitrationSystemOptions {
  readonly tables?: AffinityTables | undefined;
  readonly config?: ArbitrationConfig | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Picks arbitrators and turns their results into outcomes.
 */
export class ArbitrationSystem {
  private readonly tables: AffinityTables;
  private readonly config: ArbitrationConfig;
  private readonly logger: Logger;

  constructor(options: ArbitrationSystemOptions = {}) {
    this.tables = options.tables ?? getDefaultAffinityTables();
    this.config = options.config ?? DEFAULT_ARBITRATION;
    this.logger = options.logger ?? new Logger({ component: 'ArbitrationSystem' });
  }

  /**
   * Ranked arbitrators for a category; categories without a list use the
   * default list.
   */
  priorityList(category: QuestionCategory): readonly TheoryId[] {
    return this.tables.arbitration.byCategory.get(category) ?? this.tables.arbitration.fallback;
  }

  /**
   * Candidates from the priority list that were not used in this analysis,
   * in priority order.
   */
  candidates(
    category: QuestionCategory,
    alreadyUsed: Iterable<TheoryId>,
    isAvailable: (id: TheoryId) => boolean = () => true
  ): TheoryId[] {
    const used = new Set(alreadyUsed);
    return this.priorityList(category).filter((id) => !used.has(id) && isAvailable(id));
  }

  /**
   * First unused theory on the category's priority list, if any.
   */
  selectArbitrator(
    category: QuestionCategory,
    alreadyUsed: Iterable<TheoryId>,
    isAvailable?: (id: TheoryId) => boolean
  ): TheoryId | undefined {
    return this.candidates(category, alreadyUsed, isAvailable)[0];
  }

  /**
   * Compares the arbitrator's judgment against both sides of the pair.
   *
   * - One side shares its polarity: that side wins and its confidence rises
   *   to at least the decisive floor.
   * - Neither side does: neutral verdict with capped confidence.
   * - Both do: consensus over the three levels with a small bonus.
   */
  arbitrate(
    arbitratorResult: TheoryResult,
    pair: readonly [TheoryResult, TheoryResult]
  ): ArbitrationOutcome {
    const [a, b] = pair;
    const polarity = judgmentPolarity(arbitratorResult.judgment);
    const matchesA = judgmentPolarity(a.judgment) === polarity;
    const matchesB = judgmentPolarity(b.judgment) === polarity;
    const meanConfidence = (a.confidence + b.confidence) / 2;
    const base = {
      arbitratorId: arbitratorResult.theoryId,
      arbitratorResult,
      pair: [a.theoryId, b.theoryId] as const,
    };

    let outcome: ArbitrationOutcome;
    if (matchesA !== matchesB) {
      const side = matchesA ? a : b;
      outcome = {
        ...base,
        matchedSide: matchesA ? 'a' : 'b',
        adoptedJudgment: side.judgment,
        adoptedLevel: side.judgmentLevel,
        confidenceBefore: side.confidence,
        confidence: Math.min(
          1,
          Math.max(side.confidence + this.config.decisive_bonus, this.config.decisive_confidence)
        ),
        inconclusive: false,
      };
    } else if (matchesA) {
      const level = (a.judgmentLevel + b.judgmentLevel + arbitratorResult.judgmentLevel) / 3;
      outcome = {
        ...base,
        matchedSide: 'both',
        adoptedJudgment: levelToJudgment(level),
        adoptedLevel: level,
        confidenceBefore: meanConfidence,
        confidence: Math.min(1, meanConfidence + this.config.consensus_bonus),
        inconclusive: false,
      };
    } else {
      outcome = {
        ...base,
        matchedSide: 'none',
        adoptedJudgment: 'neutral',
        adoptedLevel: 0.5,
        confidenceBefore: meanConfidence,
        confidence: Math.min(meanConfidence, this.config.inconclusive_cap),
        inconclusive: true,
      };
    }

    this.logger.info('arbitration_completed', {
      arbitrator: outcome.arbitratorId,
      pair: outcome.pair,
      matchedSide: outcome.matchedSide,
      adoptedJudgment: outcome.adoptedJudgment,
      confidence: outcome.confidence,
    });
    return outcome;
  }
}
