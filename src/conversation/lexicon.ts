/**
 * Word lists used by the deterministic parsers, skip and modify detection,
 * and answer classification. Bundled in `data/lexicon.json`.
 *
 * @packageDocumentation
 */

import { fileURLToPath } from 'node:url';
import { safeReadTextFileSync } from '../utils/safe-fs.js';
import {
  isFieldName,
  isQuestionCategory,
  type FieldName,
  type QuestionCategory,
} from '../theory/types.js';

/**
 * Error raised when the lexicon file is malformed.
 */
export class LexiconDataError extends Error {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid lexicon at '${path}': ${message}`);
    this.name = 'LexiconDataError';
    this.path = path;
  }
}

export interface Lexicon {
  /** Keywords per category, in file order. */
  readonly categoryKeywords: ReadonlyMap<QuestionCategory, readonly string[]>;
  readonly skipPhrases: readonly string[];
  /** Verbs that, placed before a field name, ask to change it. */
  readonly changeVerbs: readonly string[];
  /** Markers such as "actually" that turn "my X is Y" into a correction. */
  readonly correctionMarkers: readonly string[];
  readonly affirmations: readonly string[];
  readonly negations: readonly string[];
  /** Phrases that contain a negation word but agree. */
  readonly affirmingIdioms: readonly string[];
  readonly hedges: readonly string[];
  readonly partials: readonly string[];
  /** Phrases naming each field, longest first. */
  readonly fieldAliases: ReadonlyMap<FieldName, readonly string[]>;
  /** Aliases too generic to name a field once the input is collected. */
  readonly bareAliases: readonly string[];
  readonly colors: readonly string[];
  readonly closingPhrases: readonly string[];
}

const DEFAULT_LEXICON_PATH = fileURLToPath(new URL('../../data/lexicon.json', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new LexiconDataError(path, 'expected an object');
  }
  return value;
}

function parseWords(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw new LexiconDataError(path, 'expected an array of strings');
  }
  return value.map((entry: unknown, index) => {
    if (typeof entry !== 'string' || entry.trim().length === 0) {
      throw new LexiconDataError(`${path}[${String(index)}]`, 'expected a non-empty string');
    }
    return entry;
  });
}

/**
 * Validates a parsed lexicon document.
 *
 * @throws LexiconDataError on any shape violation.
 */
export function parseLexicon(raw: unknown): Lexicon {
  const root = expectRecord(raw, '$');

  const categoryKeywords = new Map<QuestionCategory, readonly string[]>();
  for (const [key, value] of Object.entries(
    expectRecord(root.categoryKeywords, 'categoryKeywords')
  )) {
    if (!isQuestionCategory(key)) {
      throw new LexiconDataError(`categoryKeywords.${key}`, 'unknown question category');
    }
    categoryKeywords.set(key, parseWords(value, `categoryKeywords.${key}`));
  }

  const fieldAliases = new Map<FieldName, readonly string[]>();
  for (const [key, value] of Object.entries(expectRecord(root.fieldAliases, 'fieldAliases'))) {
    if (!isFieldName(key)) {
      throw new LexiconDataError(`fieldAliases.${key}`, 'unknown field');
    }
    fieldAliases.set(
      key,
      parseWords(value, `fieldAliases.${key}`).sort((a, b) => b.length - a.length)
    );
  }

  return {
    categoryKeywords,
    skipPhrases: parseWords(root.skipPhrases, 'skipPhrases'),
    changeVerbs: parseWords(root.changeVerbs, 'changeVerbs'),
    correctionMarkers: parseWords(root.correctionMarkers, 'correctionMarkers'),
    affirmations: parseWords(root.affirmations, 'affirmations'),
    negations: parseWords(root.negations, 'negations'),
    affirmingIdioms: parseWords(root.affirmingIdioms, 'affirmingIdioms'),
    hedges: parseWords(root.hedges, 'hedges'),
    partials: parseWords(root.partials, 'partials'),
    fieldAliases,
    bareAliases: parseWords(root.bareAliases, 'bareAliases'),
    colors: parseWords(root.colors, 'colors'),
    closingPhrases: parseWords(root.closingPhrases, 'closingPhrases'),
  };
}

export function loadLexicon(filePath: string = DEFAULT_LEXICON_PATH): Lexicon {
  const text = safeReadTextFileSync(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new LexiconDataError('$', error instanceof Error ? error.message : String(error));
  }
  return parseLexicon(parsed);
}

let cachedDefault: Lexicon | undefined;

export function getDefaultLexicon(): Lexicon {
  cachedDefault ??= loadLexicon();
  return cachedDefault;
}

/**
 * Lowercases, unifies apostrophes and turns punctuation into single spaces.
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[^\p{L}\p{N}'\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Whole-word phrase match on normalized text.
 */
export function containsPhrase(text: string, phrase: string): boolean {
  return ` ${normalizeText(text)} `.includes(` ${normalizeText(phrase)} `);
}

/**
 * First phrase of the list that occurs in the text.
 */
export function findPhrase(text: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => containsPhrase(text, phrase));
}

/**
 * Words of the normalized text.
 */
export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized.length === 0 ? [] : normalized.split(' ');
}

/**
 * Word offsets at which the phrase starts.
 */
export function phraseStarts(words: readonly string[], phrase: string): number[] {
  const target = tokenize(phrase);
  const starts: number[] = [];
  if (target.length === 0) {
    return starts;
  }
  for (let start = 0; start + target.length <= words.length; start++) {
    if (target.every((word, offset) => words[start + offset] === word)) {
      starts.push(start);
    }
  }
  return starts;
}
