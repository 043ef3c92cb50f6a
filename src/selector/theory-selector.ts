/**
 * Theory selection: scores every registered theory against the question and
 * the input collected so far, then picks a bounded, ordered subset.
 *
 * fitness = completeness_weight * completeness
 *         + category_weight * cos(category vector, theory vector)
 *         + personality_weight * personality affinity
 *
 * @packageDocumentation
 */

import type { SelectionConfig } from '../config/types.js';
import { DEFAULT_SELECTION } from '../config/defaults.js';
import {
  categoryVector,
  cosineSimilarity,
  getDefaultAffinityTables,
  type AffinityTables,
} from '../theory/affinity.js';
import { checkEligibility, missingFieldsByWeight } from '../theory/completeness.js';
import type { TheoryRegistry } from '../theory/registry.js';
import {
  EXECUTION_TIERS,
  type FieldName,
  type TheoryDescriptor,
  type TheoryId,
  type UserInput,
} from '../theory/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Score breakdown for one theory.
 */
export interface TheoryScore {
  readonly theoryId: TheoryId;
  /** Final fitness; 0 when the theory is ineligible. */
  readonly fitness: number;
  /** Fitness the theory would have if it were eligible. */
  readonly potential: number;
  readonly completeness: number;
  readonly categoryAffinity: number;
  readonly personalityAffinity: number;
  readonly eligible: boolean;
  readonly missingRequired: readonly FieldName[];
}

/**
 * Outcome of a selection pass.
 */
export interface SelectionResult {
  /** Selected theories, best fitness first. */
  readonly selected: readonly TheoryId[];
  /** Selected theories ordered fast, foundational, deep. */
  readonly executionOrder: readonly TheoryId[];
  /**
   * Fields that would unlock another theory. Non-empty whenever the selection
   * is short of the minimum and some theory could still be unlocked.
   */
  readonly missingFields: readonly FieldName[];
  /** Scores of every registered theory, in declaration order. */
  readonly scores: readonly TheoryScore[];
  /** True when the relaxed threshold contributed theories. */
  readonly usedFallbackThreshold: boolean;
}

/**
 * Per-call selection options.
 */
export interface SelectOptions {
  /** Overrides the configured maximum. */
  readonly maxTheories?: number | undefined;
  /** Overrides the configured minimum. */
  readonly minTheories?: number | undefined;
  /** Theories that must not be selected. */
  readonly exclude?: readonly TheoryId[] | undefined;
  /** Fields the user declined to give; never suggested as missing. */
  readonly unavailableFields?: readonly FieldName[] | undefined;
}

export interface TheorySelectorOptions {
  readonly registry: TheoryRegistry;
  readonly tables?: AffinityTables | undefined;
  readonly config?: SelectionConfig | undefined;
  readonly logger?: Logger | undefined;
}

const TIER_RANK = new Map(EXECUTION_TIERS.map((tier, index) => [tier, index]));

/**
 * Orders theory ids by tier, keeping the given order within a tier.
 */
export function orderByTier(
  ids: readonly TheoryId[],
  registry: TheoryRegistry
): readonly TheoryId[] {
  return ids
    .map((id, index) => ({ id, index, tier: TIER_RANK.get(registry.get(id).tier) ?? 0 }))
    .sort((a, b) => a.tier - b.tier || a.index - b.index)
    .map((entry) => entry.id);
}

/**
 * Scores and selects theories for a question.
 */
export class TheorySelector {
  private readonly registry: TheoryRegistry;
  private readonly tables: AffinityTables;
  private readonly config: SelectionConfig;
  private readonly logger: Logger;

  constructor(options: TheorySelectorOptions) {
    this.registry = options.registry;
    this.tables = options.tables ?? getDefaultAffinityTables();
    this.config = options.config ?? DEFAULT_SELECTION;
    this.logger = options.logger ?? new Logger({ component: 'TheorySelector' });
  }

  /**
   * Scores one theory against the input.
   */
  score(descriptor: TheoryDescriptor, input: UserInput): TheoryScore {
    const { eligible, completeness, missingRequired } = checkEligibility(input, descriptor);
    const categoryAffinity = cosineSimilarity(
      categoryVector(this.tables, input.questionCategory ?? 'other'),
      descriptor.affinity
    );
    const personalityAffinity = this.personalityAffinity(descriptor.id, input);
    const potential =
      this.config.completeness_weight * completeness +
      this.config.category_weight * categoryAffinity +
      this.config.personality_weight * personalityAffinity;

    return {
      theoryId: descriptor.id,
      fitness: eligible ? potential : 0,
      potential,
      completeness,
      categoryAffinity,
      personalityAffinity,
      eligible,
      missingRequired,
    };
  }

  /**
   * Selects theories for the current input.
   *
   * Theories clearing the primary threshold are taken best-first up to the
   * maximum. When fewer than the minimum clear it, the fallback threshold is
   * used instead.
   */
  select(input: UserInput, options: SelectOptions = {}): SelectionResult {
    const maxTheories = options.maxTheories ?? this.config.max_theories;
    const minTheories = Math.min(options.minTheories ?? this.config.min_theories, maxTheories);
    const excluded = new Set(options.exclude ?? []);

    const scores = this.registry.list().map((descriptor) => this.score(descriptor, input));
    const ranked = scores
      .map((score, index) => ({ score, index }))
      .filter(({ score }) => score.eligible && !excluded.has(score.theoryId))
      .sort((a, b) => b.score.fitness - a.score.fitness || a.index - b.index)
      .map(({ score }) => score);

    const primary = ranked.filter((score) => score.fitness >= this.config.fitness_threshold);
    let chosen = primary;
    let usedFallbackThreshold = false;
    if (primary.length < minTheories) {
      const relaxed = ranked.filter((score) => score.fitness >= this.config.fallback_threshold);
      usedFallbackThreshold = relaxed.length > primary.length;
      chosen = relaxed;
    }

    const selected = chosen.slice(0, maxTheories).map((score) => score.theoryId);
    const missingFields =
      selected.length < minTheories
        ? this.suggestMissingFields(scores, new Set([...selected, ...excluded]), input, options)
        : [];

    const result: SelectionResult = {
      selected,
      executionOrder: orderByTier(selected, this.registry),
      missingFields,
      scores,
      usedFallbackThreshold,
    };

    this.logger.info('theories_selected', {
      category: input.questionCategory ?? 'other',
      selected,
      executionOrder: result.executionOrder,
      usedFallbackThreshold,
      missingFields,
    });
    this.logger.debug('theory_scores', {
      scores: scores.map((s) => ({ id: s.theoryId, fitness: s.fitness, eligible: s.eligible })),
    });

    return result;
  }

  private personalityAffinity(theoryId: TheoryId, input: UserInput): number {
    const neutral = this.config.neutral_personality_score;
    if (input.mbtiType === undefined) {
      return neutral;
    }
    return this.tables.personality.get(input.mbtiType)?.get(theoryId) ?? neutral;
  }

  /**
   * Missing fields of the best-scoring theory outside the selection that
   * could still be unlocked.
   */
  private suggestMissingFields(
    scores: readonly TheoryScore[],
    taken: ReadonlySet<TheoryId>,
    input: UserInput,
    options: SelectOptions
  ): readonly FieldName[] {
    const unavailable = new Set(options.unavailableFields ?? []);
    const candidates = scores
      .map((score, index) => ({ score, index }))
      .filter(({ score }) => !taken.has(score.theoryId))
      .sort((a, b) => b.score.potential - a.score.potential || a.index - b.index);

    for (const { score } of candidates) {
      if (score.missingRequired.some((field) => unavailable.has(field))) {
        continue;
      }
      const fields =
        score.missingRequired.length > 0
          ? score.missingRequired
          : missingFieldsByWeight(input, this.registry.get(score.theoryId));
      const open = fields.filter((field) => !unavailable.has(field));
      if (open.length > 0) {
        return open;
      }
    }
    return [];
  }
}
