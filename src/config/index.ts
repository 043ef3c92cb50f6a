/**
 * Configuration module for augury.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { safeExists, safeReadTextFile } from '../utils/safe-fs.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

export {
  ConfigParseError,
  applyRawSections,
  getDefaultConfig,
  mergeConfig,
  parseConfig,
} from './parser.js';
export type {
  ArbitrationConfig,
  Config,
  ConflictConfig,
  ConversationConfig,
  LoggingConfig,
  PartialConfig,
  SelectionConfig,
  VerificationConfig,
} from './types.js';
export {
  DEFAULT_ARBITRATION,
  DEFAULT_CONFIG,
  DEFAULT_CONFLICT,
  DEFAULT_CONVERSATION,
  DEFAULT_LOGGING,
  DEFAULT_SELECTION,
  DEFAULT_VERIFICATION,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvOverrides, EnvRecord } from './env.js';

/**
 * Default configuration file name, looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'augury.toml';

/**
 * Loads configuration from a TOML file, applies environment overrides and
 * validates the result.
 *
 * A missing file is not an error; defaults are used instead.
 *
 * @param filePath - Path to the TOML file.
 * @param env - Environment to read overrides from.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function loadConfig(
  filePath: string = CONFIG_FILE_NAME,
  env: EnvRecord = process.env
): Promise<Config> {
  const base = (await safeExists(filePath))
    ? parseConfig(await safeReadTextFile(filePath))
    : getDefaultConfig();
  const config = applyEnvOverrides(base, env);
  assertConfigValid(config);
  return config;
}
