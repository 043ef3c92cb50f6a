/**
 * Core types shared by the theory registry, selector, runner and resolver.
 *
 * @packageDocumentation
 */

/**
 * Theory identifier. Builtin ids are listed in {@link BUILTIN_THEORY_IDS};
 * custom registries may add their own.
 */
export type TheoryId = string;

/**
 * Identifiers of the eight shipped theories.
 */
export const BUILTIN_THEORY_IDS = [
  'bazi',
  'ziwei',
  'qimen',
  'daliuren',
  'liuyao',
  'meihua',
  'xiaoliu',
  'cezi',
] as const;

export type BuiltinTheoryId = (typeof BUILTIN_THEORY_IDS)[number];

/**
 * Execution tier. Cheaper tiers run first so their readings can be shown early.
 */
export type ExecutionTier = 'fast' | 'foundational' | 'deep';

/**
 * Tiers in execution order.
 */
export const EXECUTION_TIERS: readonly ExecutionTier[] = ['fast', 'foundational', 'deep'] as const;

/**
 * Question categories the engine recognizes.
 */
export const QUESTION_CATEGORIES = [
  'career',
  'wealth',
  'love',
  'marriage',
  'health',
  'study',
  'relationship',
  'timing',
  'decision',
  'personality',
  'other',
] as const;

export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

/**
 * Sixteen MBTI personality types.
 */
export type MbtiType = `${'I' | 'E'}${'N' | 'S'}${'T' | 'F'}${'J' | 'P'}`;

export type Gender = 'male' | 'female';

export const DIRECTIONS = [
  'north',
  'northeast',
  'east',
  'southeast',
  'south',
  'southwest',
  'west',
  'northwest',
] as const;

export type Direction = (typeof DIRECTIONS)[number];

/**
 * Value type of every input field.
 */
export interface FieldValues {
  questionText: string;
  questionCategory: QuestionCategory;
  questionDescription: string;
  /** Three integers in 1-9. */
  numbers: readonly [number, number, number];
  /** A single character used as a seed. */
  character: string;
  birthYear: number;
  birthMonth: number;
  birthDay: number;
  /** Hour of day, 0-23. */
  birthHour: number;
  gender: Gender;
  mbtiType: MbtiType;
  favoriteColor: string;
  currentDirection: Direction;
  /** ISO 8601 timestamp. */
  currentTime: string;
}

export type FieldName = keyof FieldValues;

export const FIELD_NAMES: readonly FieldName[] = [
  'questionText',
  'questionCategory',
  'questionDescription',
  'numbers',
  'character',
  'birthYear',
  'birthMonth',
  'birthDay',
  'birthHour',
  'gender',
  'mbtiType',
  'favoriteColor',
  'currentDirection',
  'currentTime',
] as const;

/**
 * Accumulated user input. Every field is optional until collected.
 */
export type UserInput = { readonly [K in FieldName]?: FieldValues[K] };

/**
 * Ordered judgment scale, from worst to best.
 */
export const JUDGMENT_SCALE = [
  'very-unfavorable',
  'unfavorable',
  'neutral',
  'favorable',
  'very-favorable',
] as const;

export type Judgment = (typeof JUDGMENT_SCALE)[number];

/**
 * Eight-dimensional affinity vector over
 * time, space, interpersonal, finance, health, decision, emotion, complexity.
 */
export type AffinityVector = readonly number[];

export const AFFINITY_DIMENSIONS = [
  'time',
  'space',
  'interpersonal',
  'finance',
  'health',
  'decision',
  'emotion',
  'complexity',
] as const;

/**
 * Static description of one theory.
 */
export interface TheoryDescriptor {
  readonly id: TheoryId;
  readonly displayName: string;
  readonly requiredFields: readonly FieldName[];
  readonly optionalFields: readonly FieldName[];
  /** Weight in [0,1] of each declared field. Undeclared weights count as 0. */
  readonly fieldWeights: Readonly<Partial<Record<FieldName, number>>>;
  /** Completeness in [0,1] below which the theory is ineligible. */
  readonly minCompleteness: number;
  readonly tier: ExecutionTier;
  readonly affinity: AffinityVector;
}

/**
 * A statement a theory makes about the user's past, checked during verification.
 */
export type RetrospectiveClaim =
  | {
      readonly kind: 'yes-no';
      readonly statement: string;
      readonly expected: boolean;
    }
  | {
      readonly kind: 'choice';
      readonly statement: string;
      /** Ordered options; neighbouring options count as a partial match. */
      readonly options: readonly string[];
      readonly expected: string;
    }
  | {
      readonly kind: 'year';
      readonly statement: string;
      readonly expected: number;
    }
  | {
      readonly kind: 'free-text';
      readonly statement: string;
      readonly keywords: readonly string[];
    };

export type AnswerShape = RetrospectiveClaim['kind'];

/**
 * Output of one theory run. Frozen once produced.
 */
export interface TheoryResult {
  readonly theoryId: TheoryId;
  readonly judgment: Judgment;
  /** Severity in [0,1], monotonic with the judgment. */
  readonly judgmentLevel: number;
  readonly confidence: number;
  /** Opaque theory-specific detail. */
  readonly payload: Readonly<Record<string, unknown>>;
  readonly interpretation: string;
  readonly retrospectiveClaims?: readonly RetrospectiveClaim[] | undefined;
}

const MBTI_PATTERN = /^[IE][NS][TF][JP]$/;

export function isMbtiType(value: string): value is MbtiType {
  return MBTI_PATTERN.test(value);
}

export function isQuestionCategory(value: string): value is QuestionCategory {
  return QUESTION_CATEGORIES.some((category) => category === value);
}

export function isDirection(value: string): value is Direction {
  return DIRECTIONS.some((direction) => direction === value);
}

export function isFieldName(value: string): value is FieldName {
  return FIELD_NAMES.some((field) => field === value);
}
