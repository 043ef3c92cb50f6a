/**
 * TOML configuration parser for augury.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_ARBITRATION,
  DEFAULT_CONFIG,
  DEFAULT_CONFLICT,
  DEFAULT_CONVERSATION,
  DEFAULT_LOGGING,
  DEFAULT_SELECTION,
  DEFAULT_VERIFICATION,
} from './defaults.js';
import type {
  ArbitrationConfig,
  Config,
  ConflictConfig,
  ConversationConfig,
  LoggingConfig,
  PartialConfig,
  SelectionConfig,
  VerificationConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Validates that a value is a number.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated number.
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  if (!Number.isFinite(value)) {
    throw new ConfigParseError(`Invalid value for '${fieldPath}': must be a finite number`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function numberField(
  raw: Record<string, unknown>,
  section: string,
  key: string,
  fallback: number
): number {
  return key in raw ? validateNumber(raw[key], `${section}.${key}`) : fallback;
}

function booleanField(
  raw: Record<string, unknown>,
  section: string,
  key: string,
  fallback: boolean
): boolean {
  return key in raw ? validateBoolean(raw[key], `${section}.${key}`) : fallback;
}

/**
 * Returns a section table, or undefined when the section is absent.
 *
 * @throws ConfigParseError if the section is present but not a table.
 */
function sectionOf(
  parsed: Record<string, unknown>,
  name: string
): Record<string, unknown> | undefined {
  const value = parsed[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected a table`);
  }
  return Object.fromEntries(Object.entries(value));
}

function parseSelection(
  raw: Record<string, unknown> | undefined,
  d: SelectionConfig = DEFAULT_SELECTION
): SelectionConfig {
  if (raw === undefined) {
    return { ...d };
  }
  const s = 'selection';
  return {
    max_theories: numberField(raw, s, 'max_theories', d.max_theories),
    min_theories: numberField(raw, s, 'min_theories', d.min_theories),
    fitness_threshold: numberField(raw, s, 'fitness_threshold', d.fitness_threshold),
    fallback_threshold: numberField(raw, s, 'fallback_threshold', d.fallback_threshold),
    completeness_weight: numberField(raw, s, 'completeness_weight', d.completeness_weight),
    category_weight: numberField(raw, s, 'category_weight', d.category_weight),
    personality_weight: numberField(raw, s, 'personality_weight', d.personality_weight),
    neutral_personality_score: numberField(
      raw,
      s,
      'neutral_personality_score',
      d.neutral_personality_score
    ),
  };
}

function parseConflict(
  raw: Record<string, unknown> | undefined,
  d: ConflictConfig = DEFAULT_CONFLICT
): ConflictConfig {
  if (raw === undefined) {
    return { ...d };
  }
  const s = 'conflict';
  return {
    consistent_threshold: numberField(raw, s, 'consistent_threshold', d.consistent_threshold),
    minor_threshold: numberField(raw, s, 'minor_threshold', d.minor_threshold),
    significant_threshold: numberField(raw, s, 'significant_threshold', d.significant_threshold),
    confidence_boost: numberField(raw, s, 'confidence_boost', d.confidence_boost),
    neutral_dampening: numberField(raw, s, 'neutral_dampening', d.neutral_dampening),
    fallback_confidence_cap: numberField(
      raw,
      s,
      'fallback_confidence_cap',
      d.fallback_confidence_cap
    ),
  };
}

function parseArbitration(
  raw: Record<string, unknown> | undefined,
  d: ArbitrationConfig = DEFAULT_ARBITRATION
): ArbitrationConfig {
  if (raw === undefined) {
    return { ...d };
  }
  const s = 'arbitration';
  return {
    decisive_confidence: numberField(raw, s, 'decisive_confidence', d.decisive_confidence),
    decisive_bonus: numberField(raw, s, 'decisive_bonus', d.decisive_bonus),
    inconclusive_cap: numberField(raw, s, 'inconclusive_cap', d.inconclusive_cap),
    consensus_bonus: numberField(raw, s, 'consensus_bonus', d.consensus_bonus),
  };
}

function parseVerification(
  raw: Record<string, unknown> | undefined,
  d: VerificationConfig = DEFAULT_VERIFICATION
): VerificationConfig {
  if (raw === undefined) {
    return { ...d };
  }
  const s = 'verification';
  return {
    confirmed_delta: numberField(raw, s, 'confirmed_delta', d.confirmed_delta),
    partial_delta: numberField(raw, s, 'partial_delta', d.partial_delta),
    denied_delta: numberField(raw, s, 'denied_delta', d.denied_delta),
  };
}

function parseConversation(
  raw: Record<string, unknown> | undefined,
  d: ConversationConfig = DEFAULT_CONVERSATION
): ConversationConfig {
  if (raw === undefined) {
    return { ...d };
  }
  const s = 'conversation';
  return {
    extraction_timeout_ms: numberField(raw, s, 'extraction_timeout_ms', d.extraction_timeout_ms),
    max_reprompts: numberField(raw, s, 'max_reprompts', d.max_reprompts),
    history_limit: numberField(raw, s, 'history_limit', d.history_limit),
    quick_readings: booleanField(raw, s, 'quick_readings', d.quick_readings),
  };
}

function parseLogging(
  raw: Record<string, unknown> | undefined,
  d: LoggingConfig = DEFAULT_LOGGING
): LoggingConfig {
  if (raw === undefined) {
    return { ...d };
  }
  return {
    debug: booleanField(raw, 'logging', 'debug', d.debug),
  };
}

/**
 * Applies raw section tables over a base configuration, validating types.
 *
 * @param base - Configuration supplying every value the tables leave out.
 * @param parsed - Raw document keyed by section name.
 * @throws ConfigParseError for mistyped values.
 */
export function applyRawSections(base: Config, parsed: Record<string, unknown>): Config {
  return {
    selection: parseSelection(sectionOf(parsed, 'selection'), base.selection),
    conflict: parseConflict(sectionOf(parsed, 'conflict'), base.conflict),
    arbitration: parseArbitration(sectionOf(parsed, 'arbitration'), base.arbitration),
    verification: parseVerification(sectionOf(parsed, 'verification'), base.verification),
    conversation: parseConversation(sectionOf(parsed, 'conversation'), base.conversation),
    logging: parseLogging(sectionOf(parsed, 'logging'), base.logging),
  };
}

/**
 * Merges a partial configuration into a full one.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    selection: { ...base.selection, ...partial.selection },
    conflict: { ...base.conflict, ...partial.conflict },
    arbitration: { ...base.arbitration, ...partial.arbitration },
    verification: { ...base.verification, ...partial.verification },
    conversation: { ...base.conversation, ...partial.conversation },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Parses a TOML string into a Config object.
 *
 * Missing sections and fields take their defaults. Type errors throw;
 * range and ordering checks live in {@link validateConfig}.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [conflict]
 * consistent_threshold = 0.15
 * `);
 * config.conflict.consistent_threshold; // 0.15
 * config.conflict.minor_threshold; // 0.4
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return applyRawSections(getDefaultConfig(), parsed);
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    selection: { ...DEFAULT_CONFIG.selection },
    conflict: { ...DEFAULT_CONFIG.conflict },
    arbitration: { ...DEFAULT_CONFIG.arbitration },
    verification: { ...DEFAULT_CONFIG.verification },
    conversation: { ...DEFAULT_CONFIG.conversation },
    logging: { ...DEFAULT_CONFIG.logging },
  };
}
