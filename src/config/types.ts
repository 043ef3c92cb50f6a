/**
 * Configuration types for augury.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Theory selection settings.
 */
export interface SelectionConfig {
  /** Upper bound on theories run per analysis (default: 5). */
  max_theories: number;
  /** Selection size below which the fallback threshold is tried (default: 3). */
  min_theories: number;
  /** Primary fitness threshold (default: 0.3). */
  fitness_threshold: number;
  /** Relaxed threshold used when the primary one leaves too few theories (default: 0.15). */
  fallback_threshold: number;
  /** Weight of input completeness in the fitness score. */
  completeness_weight: number;
  /** Weight of category affinity in the fitness score. */
  category_weight: number;
  /** Weight of personality affinity in the fitness score. */
  personality_weight: number;
  /** Personality score used when no MBTI type is known (default: 0.7). */
  neutral_personality_score: number;
}

/**
 * Conflict tier thresholds and blending factors.
 */
export interface ConflictConfig {
  /** Largest level gap still counted as consistent (tier 1). */
  consistent_threshold: number;
  /** Largest level gap counted as a minor conflict (tier 2). */
  minor_threshold: number;
  /** Largest level gap counted as a significant conflict (tier 3). */
  significant_threshold: number;
  /** Exponent applied to confidences in tier 3 blending; must exceed 1. */
  confidence_boost: number;
  /** Share of the distance from neutral kept by the conservative fallback. */
  neutral_dampening: number;
  /** Confidence cap of the conservative fallback. */
  fallback_confidence_cap: number;
}

/**
 * Arbitration outcome settings.
 */
export interface ArbitrationConfig {
  /** Confidence floor when the arbitrator backs exactly one side. */
  decisive_confidence: number;
  /** Bonus added to the backed side's confidence. */
  decisive_bonus: number;
  /** Confidence cap when the arbitrator backs neither side. */
  inconclusive_cap: number;
  /** Bonus added to the mean confidence when both sides are backed. */
  consensus_bonus: number;
}

/**
 * Confidence deltas applied per verification outcome.
 */
export interface VerificationConfig {
  confirmed_delta: number;
  partial_delta: number;
  denied_delta: number;
}

/**
 * Conversation flow settings.
 */
export interface ConversationConfig {
  /** Timeout for one extraction call in milliseconds. */
  extraction_timeout_ms: number;
  /** Failed turns per stage before the follow-up adds an example. */
  max_reprompts: number;
  /** Messages kept in a session's history. */
  history_limit: number;
  /** Whether fast theories run after the early stages. */
  quick_readings: boolean;
}

export interface LoggingConfig {
  /** Enables debug-level log entries. */
  debug: boolean;
}

/**
 * Complete engine configuration.
 */
export interface Config {
  selection: SelectionConfig;
  conflict: ConflictConfig;
  arbitration: ArbitrationConfig;
  verification: VerificationConfig;
  conversation: ConversationConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging overrides.
 */
export interface PartialConfig {
  selection?: Partial<SelectionConfig>;
  conflict?: Partial<ConflictConfig>;
  arbitration?: Partial<ArbitrationConfig>;
  verification?: Partial<VerificationConfig>;
  conversation?: Partial<ConversationConfig>;
  logging?: Partial<LoggingConfig>;
}
