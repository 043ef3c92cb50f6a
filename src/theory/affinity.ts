/**
 * Affinity tables: category vectors, theory strength vectors, personality
 * affinities and arbitration priority lists.
 *
 * The tables live in `data/affinity.json` and are validated on load.
 *
 * @packageDocumentation
 */

import { fileURLToPath } from 'node:url';
import { safeReadTextFileSync } from '../utils/safe-fs.js';
import {
  AFFINITY_DIMENSIONS,
  isMbtiType,
  isQuestionCategory,
  type AffinityVector,
  type MbtiType,
  type QuestionCategory,
  type TheoryId,
} from './types.js';

/**
 * Error raised when the affinity data file is malformed.
 */
export class AffinityDataError extends Error {
  /** Path inside the document that failed validation. */
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid affinity data at '${path}': ${message}`);
    this.name = 'AffinityDataError';
    this.path = path;
  }
}

/**
 * Validated affinity tables.
 */
export interface AffinityTables {
  readonly categories: ReadonlyMap<QuestionCategory, AffinityVector>;
  readonly theories: ReadonlyMap<TheoryId, AffinityVector>;
  readonly personality: ReadonlyMap<MbtiType, ReadonlyMap<TheoryId, number>>;
  readonly arbitration: {
    readonly byCategory: ReadonlyMap<QuestionCategory, readonly TheoryId[]>;
    readonly fallback: readonly TheoryId[];
  };
}

const DEFAULT_AFFINITY_PATH = fileURLToPath(new URL('../../data/affinity.json', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new AffinityDataError(path, 'expected an object');
  }
  return value;
}

function parseUnitNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new AffinityDataError(path, 'expected a number in [0,1]');
  }
  return value;
}

function parseVector(value: unknown, path: string): AffinityVector {
  if (!Array.isArray(value) || value.length !== AFFINITY_DIMENSIONS.length) {
    throw new AffinityDataError(
      path,
      `expected an array of ${String(AFFINITY_DIMENSIONS.length)} numbers`
    );
  }
  return value.map((entry: unknown, index) => parseUnitNumber(entry, `${path}[${String(index)}]`));
}

function parseIdList(value: unknown, path: string): TheoryId[] {
  if (!Array.isArray(value)) {
    throw new AffinityDataError(path, 'expected an array of theory ids');
  }
  return value.map((entry: unknown, index) => {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new AffinityDataError(`${path}[${String(index)}]`, 'expected a theory id');
    }
    return entry;
  });
}

/**
 * Validates a parsed affinity document.
 *
 * @param raw - The parsed JSON document.
 * @returns Validated tables.
 * @throws AffinityDataError on any shape violation.
 */
export function parseAffinityTables(raw: unknown): AffinityTables {
  const root = expectRecord(raw, '$');

  const categories = new Map<QuestionCategory, AffinityVector>();
  for (const [key, value] of Object.entries(expectRecord(root.categories, 'categories'))) {
    if (!isQuestionCategory(key)) {
      throw new AffinityDataError(`categories.${key}`, 'unknown question category');
    }
    categories.set(key, parseVector(value, `categories.${key}`));
  }

  const theories = new Map<TheoryId, AffinityVector>();
  for (const [key, value] of Object.entries(expectRecord(root.theories, 'theories'))) {
    theories.set(key, parseVector(value, `theories.${key}`));
  }

  const personality = new Map<MbtiType, ReadonlyMap<TheoryId, number>>();
  for (const [key, value] of Object.entries(expectRecord(root.personality, 'personality'))) {
    if (!isMbtiType(key)) {
      throw new AffinityDataError(`personality.${key}`, 'unknown MBTI type');
    }
    const scores = new Map<TheoryId, number>();
    for (const [theoryId, score] of Object.entries(expectRecord(value, `personality.${key}`))) {
      scores.set(theoryId, parseUnitNumber(score, `personality.${key}.${theoryId}`));
    }
    personality.set(key, scores);
  }

  const arbitrationRaw = expectRecord(root.arbitration, 'arbitration');
  const byCategory = new Map<QuestionCategory, readonly TheoryId[]>();
  let fallback: readonly TheoryId[] = [];
  for (const [key, value] of Object.entries(arbitrationRaw)) {
    if (key === 'default') {
      fallback = parseIdList(value, 'arbitration.default');
      continue;
    }
    if (!isQuestionCategory(key)) {
      throw new AffinityDataError(`arbitration.${key}`, 'unknown question category');
    }
    byCategory.set(key, parseIdList(value, `arbitration.${key}`));
  }

  return { categories, theories, personality, arbitration: { byCategory, fallback } };
}

/**
 * Loads and validates an affinity file.
 *
 * @param filePath - Defaults to the bundled `data/affinity.json`.
 */
export function loadAffinityTables(filePath: string = DEFAULT_AFFINITY_PATH): AffinityTables {
  const text = safeReadTextFileSync(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new AffinityDataError('$', error instanceof Error ? error.message : String(error));
  }
  return parseAffinityTables(parsed);
}

let cachedDefault: AffinityTables | undefined;

/**
 * The bundled affinity tables, loaded once per process.
 */
export function getDefaultAffinityTables(): AffinityTables {
  cachedDefault ??= loadAffinityTables();
  return cachedDefault;
}

/**
 * Uniform vector used for categories without a table entry.
 */
export const UNIFORM_VECTOR: AffinityVector = AFFINITY_DIMENSIONS.map(() => 0.5);

/**
 * Category vector for a question category, uniform when the table has none.
 */
export function categoryVector(
  tables: AffinityTables,
  category: QuestionCategory
): AffinityVector {
  return tables.categories.get(category) ?? UNIFORM_VECTOR;
}

/**
 * Cosine similarity of two vectors; 0 when either has zero length.
 */
export function cosineSimilarity(a: AffinityVector, b: AffinityVector): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const norm = Math.sqrt(normA) * Math.sqrt(normB);
  if (norm === 0) {
    return 0;
  }
  return dot / norm;
}
