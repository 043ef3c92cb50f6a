/**
 * Semantic validation for configuration values.
 *
 * Checks what type checking cannot:
 * - Thresholds and weights lie in their ranges
 * - Conflict bands are ordered
 * - Counts are positive integers and the selection bounds are consistent
 * - Verification deltas have the right signs
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validateRange(
  value: number,
  fieldPath: string,
  min: number,
  max: number,
  errors: ValidationError[]
): void {
  if (value < min || value > max) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be between ${String(min)} and ${String(max)}, got ${String(value)}`,
    });
  }
}

function validatePositiveInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

function validateSelection(config: Config, errors: ValidationError[]): void {
  const s = config.selection;
  validatePositiveInteger(s.max_theories, 'selection.max_theories', errors);
  validatePositiveInteger(s.min_theories, 'selection.min_theories', errors);
  if (s.min_theories > s.max_theories) {
    errors.push({
      field: 'selection.min_theories',
      value: s.min_theories,
      message: `'selection.min_theories' (${String(s.min_theories)}) must not exceed 'selection.max_theories' (${String(s.max_theories)})`,
    });
  }
  validateRange(s.fitness_threshold, 'selection.fitness_threshold', 0, 1, errors);
  validateRange(s.fallback_threshold, 'selection.fallback_threshold', 0, 1, errors);
  if (s.fallback_threshold > s.fitness_threshold) {
    errors.push({
      field: 'selection.fallback_threshold',
      value: s.fallback_threshold,
      message: `'selection.fallback_threshold' must not exceed 'selection.fitness_threshold'`,
    });
  }
  validateRange(s.completeness_weight, 'selection.completeness_weight', 0, 1, errors);
  validateRange(s.category_weight, 'selection.category_weight', 0, 1, errors);
  validateRange(s.personality_weight, 'selection.personality_weight', 0, 1, errors);
  validateRange(s.neutral_personality_score, 'selection.neutral_personality_score', 0, 1, errors);

  const weightSum = s.completeness_weight + s.category_weight + s.personality_weight;
  if (Math.abs(weightSum - 1) > 1e-6) {
    errors.push({
      field: 'selection',
      value: weightSum,
      message: `Selection weights must sum to 1, got ${String(weightSum)}`,
    });
  }
}

function validateConflict(config: Config, errors: ValidationError[]): void {
  const c = config.conflict;
  validateRange(c.consistent_threshold, 'conflict.consistent_threshold', 0, 1, errors);
  validateRange(c.minor_threshold, 'conflict.minor_threshold', 0, 1, errors);
  validateRange(c.significant_threshold, 'conflict.significant_threshold', 0, 1, errors);
  if (
    c.consistent_threshold > c.minor_threshold ||
    c.minor_threshold > c.significant_threshold
  ) {
    errors.push({
      field: 'conflict',
      value: [c.consistent_threshold, c.minor_threshold, c.significant_threshold],
      message:
        'Conflict thresholds must satisfy consistent_threshold <= minor_threshold <= significant_threshold',
    });
  }
  if (c.confidence_boost <= 1) {
    errors.push({
      field: 'conflict.confidence_boost',
      value: c.confidence_boost,
      message: `'conflict.confidence_boost' must be greater than 1, got ${String(c.confidence_boost)}`,
    });
  }
  validateRange(c.neutral_dampening, 'conflict.neutral_dampening', 0, 1, errors);
  validateRange(c.fallback_confidence_cap, 'conflict.fallback_confidence_cap', 0, 1, errors);
}

function validateArbitration(config: Config, errors: ValidationError[]): void {
  const a = config.arbitration;
  validateRange(a.decisive_confidence, 'arbitration.decisive_confidence', 0, 1, errors);
  validateRange(a.decisive_bonus, 'arbitration.decisive_bonus', 0, 1, errors);
  validateRange(a.inconclusive_cap, 'arbitration.inconclusive_cap', 0, 1, errors);
  validateRange(a.consensus_bonus, 'arbitration.consensus_bonus', 0, 1, errors);
}

function validateVerification(config: Config, errors: ValidationError[]): void {
  const v = config.verification;
  validateRange(v.confirmed_delta, 'verification.confirmed_delta', 0, 1, errors);
  validateRange(v.partial_delta, 'verification.partial_delta', 0, 1, errors);
  validateRange(v.denied_delta, 'verification.denied_delta', -1, 0, errors);
  if (v.partial_delta > v.confirmed_delta) {
    errors.push({
      field: 'verification.partial_delta',
      value: v.partial_delta,
      message: `'verification.partial_delta' must not exceed 'verification.confirmed_delta'`,
    });
  }
}

function validateConversation(config: Config, errors: ValidationError[]): void {
  const c = config.conversation;
  validatePositiveInteger(c.extraction_timeout_ms, 'conversation.extraction_timeout_ms', errors);
  validatePositiveInteger(c.max_reprompts, 'conversation.max_reprompts', errors);
  validatePositiveInteger(c.history_limit, 'conversation.history_limit', errors);
}

/**
 * Validates a parsed configuration for semantic correctness.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with all errors found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateSelection(config, errors);
  validateConflict(config, errors);
  validateArbitration(config, errors);
  validateVerification(config, errors);
  validateConversation(config, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
