import { describe, expect, it } from 'vitest';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
import { DEFAULT_CONFIG, getDefaultConfig, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should map AUGURY_<SECTION>_<FIELD> variables', () => {
      const result = readEnvOverrides({
        AUGURY_CONFLICT_CONFIDENCE_BOOST: '2.5',
        AUGURY_CONVERSATION_QUICK_READINGS: 'off',
      });

      expect(result.overrides.conflict).toEqual({ confidence_boost: 2.5 });
      expect(result.overrides.conversation).toEqual({ quick_readings: false });
      expect(result.appliedVars).toEqual([
        'AUGURY_CONFLICT_CONFIDENCE_BOOST',
        'AUGURY_CONVERSATION_QUICK_READINGS',
      ]);
    });

    it('should map shortcuts', () => {
      const result = readEnvOverrides({ AUGURY_DEBUG: 'yes', AUGURY_MAX_THEORIES: '4' });
      expect(result.overrides.logging).toEqual({ debug: true });
      expect(result.overrides.selection).toEqual({ max_theories: 4 });
    });

    it('should let the full name win over its shortcut', () => {
      const result = readEnvOverrides({
        AUGURY_DEBUG: 'true',
        AUGURY_LOGGING_DEBUG: 'false',
      });
      expect(result.overrides.logging?.debug).toBe(false);
    });

    it('should skip empty and unrelated variables', () => {
      const result = readEnvOverrides({ AUGURY_DEBUG: '', HOME: '/root', AUGURY_UNKNOWN: '1' });
      expect(result.appliedVars).toEqual([]);
      expect(result.overrides).toEqual({});
    });

    it('should throw EnvCoercionError for bad numbers and booleans', () => {
      expect(() => readEnvOverrides({ AUGURY_MAX_THEORIES: 'many' })).toThrow(EnvCoercionError);
      expect(() => readEnvOverrides({ AUGURY_DEBUG: 'maybe' })).toThrow(
        "Cannot coerce 'AUGURY_DEBUG' value 'maybe' to boolean"
      );
    });

    it('should collect errors when asked', () => {
      const result = readEnvOverrides(
        { AUGURY_MAX_THEORIES: ' ', AUGURY_DEBUG: 'on' },
        { collectErrors: true }
      );
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.envVar).toBe('AUGURY_MAX_THEORIES');
      expect(result.overrides.logging?.debug).toBe(true);
    });
  });

  describe('applyEnvOverrides', () => {
    it('should give env precedence over file values', () => {
      const fromFile = parseConfig('[selection]\nmax_theories = 4\nmin_theories = 2');
      const config = applyEnvOverrides(fromFile, { AUGURY_SELECTION_MAX_THEORIES: '6' });

      expect(config.selection.max_theories).toBe(6);
      expect(config.selection.min_theories).toBe(2);
    });

    it('should leave the config untouched without variables', () => {
      expect(applyEnvOverrides(getDefaultConfig(), {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every variable', () => {
      const docs = getEnvVarDocumentation();
      expect(docs.AUGURY_CONFLICT_SIGNIFICANT_THRESHOLD).toEqual({
        description: 'Override conflict.significant_threshold',
        type: 'number',
      });
      expect(docs.AUGURY_DEBUG?.description).toBe('Override logging.debug (shortcut)');
    });
  });
});
