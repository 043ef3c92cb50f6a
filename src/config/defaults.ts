/**
 * Default configuration values for augury.toml.
 *
 * @packageDocumentation
 */

import type {
  ArbitrationConfig,
  Config,
  ConflictConfig,
  ConversationConfig,
  LoggingConfig,
  SelectionConfig,
  VerificationConfig,
} from './types.js';

export const DEFAULT_SELECTION: SelectionConfig = {
  max_theories: 5,
  min_theories: 3,
  fitness_threshold: 0.3,
  fallback_threshold: 0.15,
  completeness_weight: 0.4,
  category_weight: 0.35,
  personality_weight: 0.25,
  neutral_personality_score: 0.7,
};

/**
 * Tier bands: gap <= 0.2 consistent, <= 0.4 minor, <= 0.5 significant,
 * anything wider (or opposite polarity) severe.
 */
export const DEFAULT_CONFLICT: ConflictConfig = {
  consistent_threshold: 0.2,
  minor_threshold: 0.4,
  significant_threshold: 0.5,
  confidence_boost: 1.5,
  neutral_dampening: 0.5,
  fallback_confidence_cap: 0.5,
};

export const DEFAULT_ARBITRATION: ArbitrationConfig = {
  decisive_confidence: 0.75,
  decisive_bonus: 0.1,
  inconclusive_cap: 0.5,
  consensus_bonus: 0.1,
};

export const DEFAULT_VERIFICATION: VerificationConfig = {
  confirmed_delta: 0.2,
  partial_delta: 0.1,
  denied_delta: -0.15,
};

export const DEFAULT_CONVERSATION: ConversationConfig = {
  extraction_timeout_ms: 8000,
  max_reprompts: 3,
  history_limit: 100,
  quick_readings: true,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  selection: DEFAULT_SELECTION,
  conflict: DEFAULT_CONFLICT,
  arbitration: DEFAULT_ARBITRATION,
  verification: DEFAULT_VERIFICATION,
  conversation: DEFAULT_CONVERSATION,
  logging: DEFAULT_LOGGING,
};
