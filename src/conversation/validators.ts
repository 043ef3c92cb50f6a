/**
 * Deterministic value validators, one per input field.
 *
 * @packageDocumentation
 */

import {
  isDirection,
  isMbtiType,
  isQuestionCategory,
  type FieldName,
  type FieldValues,
  type UserInput,
} from '../theory/types.js';

/**
 * Outcome of validating one raw value.
 */
export type FieldCheck<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly message: string };

export type FieldValidator<K extends FieldName> = (raw: unknown) => FieldCheck<FieldValues[K]>;

const MIN_BIRTH_YEAR = 1900;
const MIN_DESCRIPTION_LENGTH = 5;
const MAX_COLOR_LENGTH = 30;

function pass<T>(value: T): FieldCheck<T> {
  return { ok: true, value };
}

function fail<T>(message: string): FieldCheck<T> {
  return { ok: false, message };
}

function integerInRange(raw: unknown, min: number, max: number, label: string): FieldCheck<number> {
  if (typeof raw !== 'number' || !Number.isInteger(raw)) {
    return fail(`${label} must be a whole number`);
  }
  if (raw < min || raw > max) {
    return fail(`${label} must be between ${String(min)} and ${String(max)}`);
  }
  return pass(raw);
}

function nonEmptyText(raw: unknown, label: string, minLength = 1): FieldCheck<string> {
  if (typeof raw !== 'string') {
    return fail(`${label} must be text`);
  }
  const trimmed = raw.trim();
  if (trimmed.length < minLength) {
    return fail(
      minLength > 1
        ? `${label} needs at least ${String(minLength)} characters`
        : `${label} must not be empty`
    );
  }
  return pass(trimmed);
}

const VALIDATORS: { readonly [K in FieldName]: FieldValidator<K> } = {
  questionText: (raw) => nonEmptyText(raw, 'The question'),
  questionCategory: (raw) =>
    typeof raw === 'string' && isQuestionCategory(raw)
      ? pass(raw)
      : fail('The category must be one of the known question categories'),
  questionDescription: (raw) => nonEmptyText(raw, 'The description', MIN_DESCRIPTION_LENGTH),
  numbers: (raw) => {
    if (!Array.isArray(raw) || raw.length !== 3) {
      return fail('Exactly three numbers are needed');
    }
    const [a, b, c]: unknown[] = raw;
    const checks = [a, b, c].map((entry) => integerInRange(entry, 1, 9, 'Each number'));
    const values: number[] = [];
    for (const check of checks) {
      if (!check.ok) {
        return fail(check.message);
      }
      values.push(check.value);
    }
    const [x, y, z] = values;
    if (x === undefined || y === undefined || z === undefined) {
      return fail('Exactly three numbers are needed');
    }
    return pass([x, y, z] as const);
  },
  character: (raw) => {
    if (typeof raw !== 'string') {
      return fail('The character must be text');
    }
    const codePoints = Array.from(raw.trim());
    const [first] = codePoints;
    if (codePoints.length !== 1 || first === undefined || !/\p{L}/u.test(first)) {
      return fail('Exactly one written character is needed');
    }
    return pass(first);
  },
  birthYear: (raw) => integerInRange(raw, MIN_BIRTH_YEAR, new Date().getFullYear(), 'The birth year'),
  birthMonth: (raw) => integerInRange(raw, 1, 12, 'The birth month'),
  birthDay: (raw) => integerInRange(raw, 1, 31, 'The birth day'),
  birthHour: (raw) => integerInRange(raw, 0, 23, 'The birth hour'),
  gender: (raw) =>
    raw === 'male' || raw === 'female' ? pass(raw) : fail('Gender must be male or female'),
  mbtiType: (raw) =>
    typeof raw === 'string' && isMbtiType(raw)
      ? pass(raw)
      : fail('The MBTI type must be four letters such as INTJ'),
  favoriteColor: (raw) => {
    const check = nonEmptyText(raw, 'The colour');
    if (check.ok && check.value.length > MAX_COLOR_LENGTH) {
      return fail('The colour name is too long');
    }
    return check;
  },
  currentDirection: (raw) =>
    typeof raw === 'string' && isDirection(raw)
      ? pass(raw)
      : fail('The direction must be a compass point such as north or southwest'),
  currentTime: (raw) =>
    typeof raw === 'string' && !Number.isNaN(Date.parse(raw))
      ? pass(raw)
      : fail('The time must be an ISO 8601 timestamp'),
};

/**
 * Validates a raw value for a field.
 */
export function validateField<K extends FieldName>(field: K, raw: unknown): FieldCheck<FieldValues[K]> {
  const validator: FieldValidator<K> = VALIDATORS[field];
  return validator(raw);
}

type MutableInput = { -readonly [K in FieldName]?: FieldValues[K] };

/**
 * Copy of the input with one field set.
 */
export function withField<K extends FieldName>(
  input: UserInput,
  field: K,
  value: FieldValues[K]
): UserInput {
  const next: MutableInput = { ...input };
  next[field] = value;
  return next;
}

/**
 * Copy of the input with one field removed.
 */
export function withoutField(input: UserInput, field: FieldName): UserInput {
  const next: MutableInput = { ...input };
  delete next[field];
  return next;
}
