import { describe, expect, it } from 'vitest';
import {
  ConfigValidationError,
  assertConfigValid,
  getDefaultConfig,
  mergeConfig,
  validateConfig,
} from './index.js';

describe('Config Validator', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(getDefaultConfig())).toEqual({ valid: true, errors: [] });
  });

  it('should reject unordered conflict thresholds', () => {
    const config = mergeConfig(getDefaultConfig(), {
      conflict: { consistent_threshold: 0.45, minor_threshold: 0.4 },
    });
    const result = validateConfig(config);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.field)).toEqual(['conflict']);
  });

  it('should reject a confidence boost of 1 or less', () => {
    const config = mergeConfig(getDefaultConfig(), { conflict: { confidence_boost: 1 } });
    expect(validateConfig(config).errors[0]?.field).toBe('conflict.confidence_boost');
  });

  it('should reject min_theories above max_theories', () => {
    const config = mergeConfig(getDefaultConfig(), {
      selection: { min_theories: 4, max_theories: 3 },
    });
    expect(validateConfig(config).errors.map((e) => e.field)).toEqual(['selection.min_theories']);
  });

  it('should reject non-integer counts', () => {
    const config = mergeConfig(getDefaultConfig(), { conversation: { max_reprompts: 1.5 } });
    expect(validateConfig(config).errors[0]?.message).toBe(
      "'conversation.max_reprompts' must be a positive integer, got 1.5"
    );
  });

  it('should reject selection weights that do not sum to 1', () => {
    const config = mergeConfig(getDefaultConfig(), { selection: { category_weight: 0.5 } });
    expect(validateConfig(config).errors.map((e) => e.field)).toEqual(['selection']);
  });

  it('should reject a positive denied delta', () => {
    const config = mergeConfig(getDefaultConfig(), { verification: { denied_delta: 0.1 } });
    expect(validateConfig(config).errors[0]?.message).toBe(
      "'verification.denied_delta' must be between -1 and 0, got 0.1"
    );
  });

  it('should throw ConfigValidationError listing every error', () => {
    const config = mergeConfig(getDefaultConfig(), {
      conflict: { confidence_boost: 0.5 },
      arbitration: { inconclusive_cap: 2 },
    });
    try {
      assertConfigValid(config);
      expect.unreachable('assertConfigValid should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors).toHaveLength(2);
        expect(error.message).toContain('2 error(s)');
      }
    }
  });
});
