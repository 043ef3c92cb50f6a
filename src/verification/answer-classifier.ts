/**
 * Classifies a free-text answer against the shape of the claim it answers.
 *
 * Hedges are checked first, then partial agreement, then stance. Idioms like
 * "no doubt" are set aside before the stance is read; a leading yes or no
 * decides it, otherwise any negation wins over affirmation. Choices next to
 * the expected one count as partial, as does a year one off.
 *
 * @packageDocumentation
 */

import {
  containsPhrase,
  findPhrase,
  getDefaultLexicon,
  phraseStarts,
  tokenize,
  type Lexicon,
} from '../conversation/lexicon.js';
import type { RetrospectiveClaim } from '../theory/types.js';
import type { VerificationOutcome } from './types.js';

const YEAR = /\b(1[89]\d{2}|20\d{2})\b/;

/** Half of the keywords present is a confirmation. */
const KEYWORD_CONFIRM_RATIO = 0.5;

function mentions(words: readonly string[], phrases: readonly string[]): boolean {
  return phrases.some((phrase) => phraseStarts(words, phrase).length > 0);
}

function leads(words: readonly string[], phrases: readonly string[]): boolean {
  return phrases.some((phrase) => phraseStarts(words, phrase).includes(0));
}

/**
 * Yes/no stance of an answer: false for negation, true for affirmation.
 */
function stance(answer: string, lexicon: Lexicon): boolean | undefined {
  const words = tokenize(answer);
  const idiomatic = new Set<number>();
  for (const idiom of lexicon.affirmingIdioms) {
    const size = tokenize(idiom).length;
    for (const start of phraseStarts(words, idiom)) {
      for (let index = start; index < start + size; index++) {
        idiomatic.add(index);
      }
    }
  }
  const rest = words.filter((_, index) => !idiomatic.has(index));

  if (leads(rest, lexicon.affirmations)) {
    return true;
  }
  if (leads(rest, lexicon.negations)) {
    return false;
  }
  if (mentions(rest, lexicon.negations)) {
    return false;
  }
  if (mentions(rest, lexicon.affirmations) || idiomatic.size > 0) {
    return true;
  }
  return undefined;
}

function isPartial(answer: string, lexicon: Lexicon): boolean {
  return findPhrase(answer, lexicon.partials) !== undefined;
}

function classifyYesNo(answer: string, expected: boolean, lexicon: Lexicon): VerificationOutcome {
  if (isPartial(answer, lexicon)) {
    return 'partial';
  }
  const said = stance(answer, lexicon);
  if (said === undefined) {
    return 'unknown';
  }
  return said === expected ? 'confirmed' : 'denied';
}

function classifyChoice(
  answer: string,
  options: readonly string[],
  expected: string,
  lexicon: Lexicon
): VerificationOutcome {
  const expectedIndex = options.indexOf(expected);
  const mentioned = options
    .map((option, index) => ({ option, index }))
    .filter(({ option }) => containsPhrase(answer, option));

  if (mentioned.length === 0) {
    return classifyYesNo(answer, true, lexicon);
  }
  if (mentioned.length > 1) {
    return mentioned.some(({ index }) => index === expectedIndex) ? 'partial' : 'denied';
  }
  const [only] = mentioned;
  if (only === undefined) {
    return 'unknown';
  }
  if (only.index === expectedIndex) {
    return isPartial(answer, lexicon) ? 'partial' : 'confirmed';
  }
  return Math.abs(only.index - expectedIndex) === 1 ? 'partial' : 'denied';
}

function classifyYear(answer: string, expected: number, lexicon: Lexicon): VerificationOutcome {
  const match = YEAR.exec(answer);
  if (match === null) {
    if (isPartial(answer, lexicon)) {
      return 'partial';
    }
    return stance(answer, lexicon) === false ? 'denied' : 'unknown';
  }
  const gap = Math.abs(Number(match[1]) - expected);
  if (gap === 0) {
    return 'confirmed';
  }
  return gap === 1 ? 'partial' : 'denied';
}

function classifyFreeText(
  answer: string,
  keywords: readonly string[],
  lexicon: Lexicon
): VerificationOutcome {
  if (keywords.length === 0) {
    return classifyYesNo(answer, true, lexicon);
  }
  const matched = keywords.filter((keyword) => containsPhrase(answer, keyword)).length;
  if (matched / keywords.length >= KEYWORD_CONFIRM_RATIO) {
    return 'confirmed';
  }
  if (matched > 0 || isPartial(answer, lexicon)) {
    return 'partial';
  }
  return stance(answer, lexicon) === true ? 'partial' : 'denied';
}

/**
 * Outcome of an answer to a claim.
 */
export function classifyAnswer(
  claim: RetrospectiveClaim,
  answer: string,
  lexicon: Lexicon = getDefaultLexicon()
): VerificationOutcome {
  if (answer.trim().length === 0 || findPhrase(answer, lexicon.hedges) !== undefined) {
    return 'unknown';
  }
  switch (claim.kind) {
    case 'yes-no':
      return classifyYesNo(answer, claim.expected, lexicon);
    case 'choice':
      return classifyChoice(answer, claim.options, claim.expected, lexicon);
    case 'year':
      return classifyYear(answer, claim.expected, lexicon);
    case 'free-text':
      return classifyFreeText(answer, claim.keywords, lexicon);
  }
}
