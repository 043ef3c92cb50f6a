/**
 * Environment variable overrides for configuration.
 *
 * Every field can be overridden with `AUGURY_<SECTION>_<FIELD>`, e.g.
 * `AUGURY_CONFLICT_CONFIDENCE_BOOST=2`. A few shortcuts exist for the
 * settings changed most often.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { applyRawSections } from './parser.js';
import type { Config } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

type SectionName = keyof Config;
type ValueType = 'number' | 'boolean';

interface EnvMapping {
  readonly section: SectionName;
  readonly field: string;
  readonly type: ValueType;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const FIELDS: readonly (readonly [SectionName, string, ValueType])[] = [
  ['selection', 'max_theories', 'number'],
  ['selection', 'min_theories', 'number'],
  ['selection', 'fitness_threshold', 'number'],
  ['selection', 'fallback_threshold', 'number'],
  ['selection', 'completeness_weight', 'number'],
  ['selection', 'category_weight', 'number'],
  ['selection', 'personality_weight', 'number'],
  ['selection', 'neutral_personality_score', 'number'],
  ['conflict', 'consistent_threshold', 'number'],
  ['conflict', 'minor_threshold', 'number'],
  ['conflict', 'significant_threshold', 'number'],
  ['conflict', 'confidence_boost', 'number'],
  ['conflict', 'neutral_dampening', 'number'],
  ['conflict', 'fallback_confidence_cap', 'number'],
  ['arbitration', 'decisive_confidence', 'number'],
  ['arbitration', 'decisive_bonus', 'number'],
  ['arbitration', 'inconclusive_cap', 'number'],
  ['arbitration', 'consensus_bonus', 'number'],
  ['verification', 'confirmed_delta', 'number'],
  ['verification', 'partial_delta', 'number'],
  ['verification', 'denied_delta', 'number'],
  ['conversation', 'extraction_timeout_ms', 'number'],
  ['conversation', 'max_reprompts', 'number'],
  ['conversation', 'history_limit', 'number'],
  ['conversation', 'quick_readings', 'boolean'],
  ['logging', 'debug', 'boolean'],
];

const SHORTCUTS: Readonly<Record<string, EnvMapping>> = {
  AUGURY_DEBUG: { section: 'logging', field: 'debug', type: 'boolean' },
  AUGURY_MAX_THEORIES: { section: 'selection', field: 'max_theories', type: 'number' },
  AUGURY_EXTRACTION_TIMEOUT_MS: {
    section: 'conversation',
    field: 'extraction_timeout_ms',
    type: 'number',
  },
};

/**
 * Mapping from environment variable names to config paths.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  ...Object.entries(SHORTCUTS),
  ...FIELDS.map(([section, field, type]): [string, EnvMapping] => [
    `AUGURY_${section.toUpperCase()}_${field.toUpperCase()}`,
    { section, field, type },
  ]),
]);

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a finite number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (!Number.isFinite(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts true/1/yes/on and false/0/no/off, case-insensitive.
 *
 * @throws EnvCoercionError if the value is none of those.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceValue(value: string, type: ValueType, envVar: string): number | boolean {
  switch (type) {
    case 'number':
      return coerceToNumber(value, envVar);
    case 'boolean':
      return coerceToBoolean(value, envVar);
  }
}

/**
 * Raw override tables keyed by section, ready for {@link applyRawSections}.
 */
export type EnvOverrides = Partial<Record<SectionName, Record<string, number | boolean>>>;

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  overrides: EnvOverrides;
  /** Environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, when collected instead of thrown. */
  errors: EnvCoercionError[];
}

/**
 * Reads AUGURY_* environment variables into override tables.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Overrides, applied variable names and any collected errors.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ AUGURY_DEBUG: 'yes' });
 * overrides.logging; // { debug: true }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: EnvOverrides = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      const coerced = coerceValue(value, mapping.type, envVar);
      const section = overrides[mapping.section] ?? {};
      section[mapping.field] = coerced;
      overrides[mapping.section] = section;
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return applyRawSections(config, overrides);
}

/**
 * Documentation for all supported environment variables.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const shortcut = envVar in SHORTCUTS ? ' (shortcut)' : '';
    docs[envVar] = {
      description: `Override ${mapping.section}.${mapping.field}${shortcut}`,
      type: mapping.type,
    };
  }
  return docs;
}
