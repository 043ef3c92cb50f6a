/**
 * Deterministic extraction of field values from free text.
 *
 * Parsers are pattern and word-list based. Their output is still passed
 * through the field validators before it is merged.
 *
 * @packageDocumentation
 */

import {
  DIRECTIONS,
  QUESTION_CATEGORIES,
  type FieldName,
  type Gender,
  type QuestionCategory,
} from '../theory/types.js';
import {
  containsPhrase,
  findPhrase,
  normalizeText,
  phraseStarts,
  tokenize,
  type Lexicon,
} from './lexicon.js';

/**
 * Raw candidate values keyed by field. Values are unvalidated.
 */
export type CandidateFields = Readonly<Partial<Record<FieldName, unknown>>>;

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

const NUMBER_WORDS = ['one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine'] as const;

const ISO_DATE = /\b(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})\b/;
const MONTH_NAME = '(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*';
const MONTH_DAY_YEAR = new RegExp(`\\b${MONTH_NAME}\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`);
const DAY_MONTH_YEAR = new RegExp(
  `\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH_NAME},?\\s+(\\d{4})\\b`
);
const MONTH_DAY = new RegExp(`\\b${MONTH_NAME}\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b`);
const DAY_MONTH = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH_NAME}\\b`);
const YEAR = /\b(19\d{2}|20\d{2})\b/;
const CLOCK_TIME = /\b(\d{1,2}):(\d{2})\b/;
const MERIDIEM_TIME = /\b(\d{1,2})\s*(am|pm)\b/;
const MBTI = /\b([ie][ns][tf][jp])\b/i;
const DIGIT_TRIPLE = /(?<!\d)([1-9])([1-9])([1-9])(?!\d)/;
const SINGLE_DIGIT = /(?<!\d)[1-9](?!\d)/g;
const QUOTED_CHARACTER = /["'“‘「『]\s*(\p{L})\s*["'”’」』]/u;
const NAMED_CHARACTER = /character(?:\s+is)?\s*[:=]?\s*(\p{L})(?!\p{L})/iu;
const DANGLING_CHARACTER = /\s*\b(?:my\s+)?character(?:\s+is)?\s*[:=]?$/iu;

/** Rough times of day, most specific first. */
const HOUR_RANGES: readonly (readonly [string, number])[] = [
  ['early morning', 5],
  ['late morning', 10],
  ['midnight', 0],
  ['morning', 8],
  ['noon', 12],
  ['midday', 12],
  ['afternoon', 15],
  ['evening', 19],
  ['night', 22],
];

/** Words between a skip phrase and the field it refers to. */
const SKIP_REACH = 2;
const DETERMINERS = new Set(['my', 'the', 'your', 'our']);

function monthIndex(prefix: string): number {
  return MONTHS.findIndex((month) => month.startsWith(prefix)) + 1;
}

/**
 * Category named outright, else the first category whose keyword occurs.
 */
export function parseCategory(text: string, lexicon: Lexicon): QuestionCategory | undefined {
  const named = QUESTION_CATEGORIES.find(
    (category) => category !== 'other' && containsPhrase(text, category)
  );
  if (named !== undefined) {
    return named;
  }
  for (const [category, keywords] of lexicon.categoryKeywords) {
    if (findPhrase(text, keywords) !== undefined) {
      return category;
    }
  }
  return undefined;
}

/**
 * Three numbers written as digits, a three-digit run, or number words.
 */
export function parseNumbers(text: string): number[] | undefined {
  const lower = text.toLowerCase();
  const singles = lower.match(SINGLE_DIGIT) ?? [];
  if (singles.length >= 3) {
    return singles.slice(0, 3).map(Number);
  }
  const triple = DIGIT_TRIPLE.exec(lower);
  if (triple !== null) {
    return triple.slice(1, 4).map(Number);
  }
  const words = normalizeText(text)
    .split(' ')
    .map((word) => NUMBER_WORDS.findIndex((numberWord) => numberWord === word) + 1)
    .filter((value) => value > 0);
  if (words.length >= 3) {
    return words.slice(0, 3);
  }
  return undefined;
}

/**
 * A quoted single letter, "character is X", or a message that is one letter.
 */
export function parseCharacter(text: string): string | undefined {
  const trimmed = text.trim();
  if (Array.from(trimmed).length === 1 && /\p{L}/u.test(trimmed)) {
    return trimmed;
  }
  return QUOTED_CHARACTER.exec(trimmed)?.[1] ?? NAMED_CHARACTER.exec(trimmed)?.[1];
}

/**
 * Free text of at least a sentence, with any character clause removed.
 */
export function parseDescription(text: string): string | undefined {
  const stripped = text
    .replace(QUOTED_CHARACTER, ' ')
    .replace(NAMED_CHARACTER, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(DANGLING_CHARACTER, '');
  return stripped.length >= 10 ? stripped : undefined;
}

export interface BirthDate {
  readonly year?: number | undefined;
  readonly month?: number | undefined;
  readonly day?: number | undefined;
}

export function parseBirthDate(text: string): BirthDate {
  const lower = text.toLowerCase();
  const iso = ISO_DATE.exec(lower);
  if (iso !== null) {
    return { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
  }
  const monthFirst = MONTH_DAY_YEAR.exec(lower);
  if (monthFirst !== null) {
    return {
      year: Number(monthFirst[3]),
      month: monthIndex(monthFirst[1] ?? ''),
      day: Number(monthFirst[2]),
    };
  }
  const dayFirst = DAY_MONTH_YEAR.exec(lower);
  if (dayFirst !== null) {
    return {
      year: Number(dayFirst[3]),
      month: monthIndex(dayFirst[2] ?? ''),
      day: Number(dayFirst[1]),
    };
  }
  const yearMatch = YEAR.exec(lower);
  const year = yearMatch === null ? undefined : Number(yearMatch[1]);
  const monthDay = MONTH_DAY.exec(lower);
  if (monthDay !== null) {
    return { year, month: monthIndex(monthDay[1] ?? ''), day: Number(monthDay[2]) };
  }
  const dayMonth = DAY_MONTH.exec(lower);
  if (dayMonth !== null) {
    return { year, month: monthIndex(dayMonth[2] ?? ''), day: Number(dayMonth[1]) };
  }
  return { year };
}

/**
 * Hour from "08:30" or "8 pm", else a representative hour for a rough
 * time of day such as "in the afternoon". A 12 am reading is hour 0.
 */
export function parseHour(text: string): number | undefined {
  const lower = text.toLowerCase();
  const withoutDates = lower.replace(ISO_DATE, ' ');
  const meridiem = MERIDIEM_TIME.exec(withoutDates);
  if (meridiem !== null) {
    const hour = Number(meridiem[1]) % 12;
    return meridiem[2] === 'pm' ? hour + 12 : hour;
  }
  const clock = CLOCK_TIME.exec(withoutDates);
  if (clock !== null) {
    return Number(clock[1]);
  }
  return HOUR_RANGES.find(([phrase]) => containsPhrase(text, phrase))?.[1];
}

export function parseGender(text: string): Gender | undefined {
  if (findPhrase(text, ['female', 'woman', 'girl']) !== undefined) {
    return 'female';
  }
  if (findPhrase(text, ['male', 'man', 'boy']) !== undefined) {
    return 'male';
  }
  return undefined;
}

export function parseMbti(text: string): string | undefined {
  return MBTI.exec(text)?.[1]?.toUpperCase();
}

export function parseColor(text: string, lexicon: Lexicon): string | undefined {
  return findPhrase(text, lexicon.colors);
}

export function parseDirection(text: string): string | undefined {
  const compact = normalizeText(text).replace(/\b(north|south) (east|west)\b/g, '$1$2');
  return [...DIRECTIONS]
    .sort((a, b) => b.length - a.length)
    .find((direction) => containsPhrase(compact, direction));
}

/**
 * Last integer in the text.
 */
function lastInteger(text: string): number | undefined {
  const matches = text.match(/\d+/g);
  const last = matches?.[matches.length - 1];
  return last === undefined ? undefined : Number(last);
}

/**
 * Value of one named field from a sentence such as "change my birth month to 6".
 * Used by in-band modification, where the field is already known.
 */
export function parseFieldValue(field: FieldName, text: string, lexicon: Lexicon): unknown {
  switch (field) {
    case 'questionCategory':
      return parseCategory(text, lexicon);
    case 'questionDescription':
      return /\b(?:to|is)\s+(.+)$/i.exec(text)?.[1]?.trim();
    case 'numbers':
      return parseNumbers(text);
    case 'character': {
      const quoted = QUOTED_CHARACTER.exec(text)?.[1];
      if (quoted !== undefined) {
        return quoted;
      }
      const tokens = text.trim().split(/\s+/);
      const last = tokens[tokens.length - 1];
      return last !== undefined && Array.from(last).length === 1 ? last : undefined;
    }
    case 'birthYear':
      return parseBirthDate(text).year ?? lastInteger(text);
    case 'birthMonth': {
      const named = new RegExp(`\\b${MONTH_NAME}\\b`).exec(text.toLowerCase());
      return named === null ? lastInteger(text) : monthIndex(named[1] ?? '');
    }
    case 'birthDay':
      return lastInteger(text);
    case 'birthHour':
      return parseHour(text) ?? lastInteger(text);
    case 'gender':
      return parseGender(text);
    case 'mbtiType':
      return parseMbti(text);
    case 'favoriteColor':
      return parseColor(text, lexicon);
    case 'currentDirection':
      return parseDirection(text);
    case 'questionText':
    case 'currentTime':
      return undefined;
  }
}

/**
 * Candidate values for the given fields found in one message.
 */
export function parseFields(
  fields: readonly FieldName[],
  text: string,
  lexicon: Lexicon
): CandidateFields {
  const wanted = new Set(fields);
  const candidates: Partial<Record<FieldName, unknown>> = {};
  const offer = (field: FieldName, value: unknown): void => {
    if (wanted.has(field) && value !== undefined) {
      candidates[field] = value;
    }
  };

  offer('questionCategory', parseCategory(text, lexicon));
  offer('numbers', parseNumbers(text));
  offer('character', parseCharacter(text));
  offer('questionDescription', parseDescription(text));
  const date = parseBirthDate(text);
  offer('birthYear', date.year);
  offer('birthMonth', date.month);
  offer('birthDay', date.day);
  offer('birthHour', parseHour(text));
  offer('gender', parseGender(text));
  offer('mbtiType', parseMbti(text));
  offer('favoriteColor', parseColor(text, lexicon));
  offer('currentDirection', parseDirection(text));
  return candidates;
}

/**
 * Explicit request to leave a field out: the whole answer is a skip phrase,
 * or a skip phrase sits next to the name of a field.
 */
export type SkipRequest =
  | { readonly kind: 'next' }
  | { readonly kind: 'field'; readonly field: FieldName };

interface AliasHit {
  readonly field: FieldName;
  readonly start: number;
  readonly end: number;
  readonly length: number;
}

function aliasHits(words: readonly string[], lexicon: Lexicon, includeBare: boolean): AliasHit[] {
  const hits: AliasHit[] = [];
  for (const [field, aliases] of lexicon.fieldAliases) {
    for (const alias of aliases) {
      if (!includeBare && lexicon.bareAliases.includes(alias)) {
        continue;
      }
      const size = tokenize(alias).length;
      for (const start of phraseStarts(words, alias)) {
        hits.push({ field, start, end: start + size, length: alias.length });
      }
    }
  }
  return hits;
}

function longestHit(hits: readonly AliasHit[]): FieldName | undefined {
  let best: AliasHit | undefined;
  for (const hit of hits) {
    if (best === undefined || hit.length > best.length) {
      best = hit;
    }
  }
  return best?.field;
}

export function parseSkipRequest(text: string, lexicon: Lexicon): SkipRequest | undefined {
  const words = tokenize(text);
  const spans = lexicon.skipPhrases.flatMap((phrase) => {
    const size = tokenize(phrase).length;
    return phraseStarts(words, phrase).map((start) => ({ start, end: start + size }));
  });
  if (spans.length === 0) {
    return undefined;
  }

  const near = aliasHits(words, lexicon, true).filter((hit) =>
    spans.some(
      (span) =>
        (hit.start >= span.end && hit.start - span.end <= SKIP_REACH) ||
        (span.start >= hit.end && span.start - hit.end <= SKIP_REACH)
    )
  );
  const field = longestHit(near);
  if (field !== undefined) {
    return { kind: 'field', field };
  }
  const covered = Math.max(...spans.map((span) => span.end - span.start));
  return words.length - covered <= SKIP_REACH ? { kind: 'next' } : undefined;
}

function followsChangeVerb(words: readonly string[], start: number, lexicon: Lexicon): boolean {
  let end = start;
  while (end > 0 && DETERMINERS.has(words[end - 1] ?? '')) {
    end--;
  }
  return lexicon.changeVerbs.some((verb) => {
    const size = tokenize(verb).length;
    return end >= size && phraseStarts(words.slice(end - size, end), verb).length > 0;
  });
}

export interface ChangeRequestOptions {
  /** Accept generic aliases such as "year" or "day". */
  readonly includeBare: boolean;
}

/**
 * Field the text explicitly asks to change: "change my birth year to 1991",
 * "my gender should be male", or "actually my birth month is June".
 */
export function parseChangeRequest(
  text: string,
  lexicon: Lexicon,
  options: ChangeRequestOptions
): FieldName | undefined {
  const words = tokenize(text);
  const corrected = findPhrase(text, lexicon.correctionMarkers) !== undefined;
  const targeted = aliasHits(words, lexicon, options.includeBare).filter((hit) => {
    const next = words[hit.end];
    return (
      followsChangeVerb(words, hit.start, lexicon) ||
      (next === 'should' && words[hit.end + 1] === 'be') ||
      (corrected && (next === 'is' || next === 'was'))
    );
  });
  return longestHit(targeted);
}
