/**
 * Stage definitions and transition checks for the conversation.
 *
 * | Stage    | Required                                     | Optional                                             |
 * |----------|----------------------------------------------|------------------------------------------------------|
 * | ICEBREAK | questionCategory, numbers                    |                                                      |
 * | DEEPEN   | questionDescription, character*              |                                                      |
 * | COLLECT  | birthYear*, birthMonth*, birthDay*, gender*  | birthHour, mbtiType, favoriteColor, currentDirection |
 *
 * Fields marked * may be skipped.
 *
 * @packageDocumentation
 */

import { isFieldPresent } from '../theory/completeness.js';
import type { FieldName, UserInput } from '../theory/types.js';
import {
  STAGES,
  type CollectingStage,
  type Stage,
  type StageDefinition,
  type StageProgress,
} from './types.js';

export const STAGE_DEFINITIONS: ReadonlyMap<CollectingStage, StageDefinition> = new Map<
  CollectingStage,
  StageDefinition
>([
  [
    'ICEBREAK',
    {
      stage: 'ICEBREAK',
      required: ['questionCategory', 'numbers'],
      optional: [],
      skippable: [],
      prompt:
        'What area of life is your question about, and which three numbers from 1 to 9 come to mind first?',
      example: "It's about my career, and my numbers are 3, 7 and 9.",
    },
  ],
  [
    'DEEPEN',
    {
      stage: 'DEEPEN',
      required: ['questionDescription', 'character'],
      optional: [],
      skippable: ['character'],
      prompt:
        'Tell me a little more about the situation, and write a single character that comes to mind.',
      example: 'I have an offer from a smaller company and cannot decide. My character is "福".',
    },
  ],
  [
    'COLLECT',
    {
      stage: 'COLLECT',
      required: ['birthYear', 'birthMonth', 'birthDay', 'gender'],
      optional: ['birthHour', 'mbtiType', 'favoriteColor', 'currentDirection'],
      skippable: ['birthYear', 'birthMonth', 'birthDay', 'gender'],
      prompt:
        'When were you born, including the hour if you know it, and what is your gender? Your MBTI type, favourite colour and the direction you are facing help too.',
      example: 'I was born on 1990-05-17 around 08:00, I am female, INTJ, I like blue and face south.',
    },
  ],
]);

/**
 * Definition of a collecting stage.
 */
export function stageDefinition(stage: CollectingStage): StageDefinition {
  const definition = STAGE_DEFINITIONS.get(stage);
  if (definition === undefined) {
    throw new Error(`No definition for stage ${stage}`);
  }
  return definition;
}

/**
 * Stage after the given one, or undefined at the end.
 */
export function nextStage(stage: Stage): Stage | undefined {
  const index = STAGES.indexOf(stage);
  return STAGES[index + 1];
}

export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}

/**
 * Fields a stage accepts from user text.
 */
export function stageFields(definition: StageDefinition): readonly FieldName[] {
  return [...definition.required, ...definition.optional];
}

/**
 * Progress of a collecting stage. Skipped fields count as settled.
 */
export function stageProgress(
  definition: StageDefinition,
  input: UserInput,
  skipped: ReadonlySet<FieldName>
): StageProgress {
  const collected = definition.required.filter((field) => isFieldPresent(input, field));
  const skippedHere = definition.required.filter(
    (field) => !isFieldPresent(input, field) && skipped.has(field)
  );
  const missing = definition.required.filter(
    (field) => !isFieldPresent(input, field) && !skipped.has(field)
  );
  const total = definition.required.length;
  const parts = [`${String(collected.length)} of ${String(total)} required fields collected`];
  if (skippedHere.length > 0) {
    parts.push(`${String(skippedHere.length)} skipped`);
  }
  return {
    stage: definition.stage,
    collected,
    missing,
    skipped: skippedHere,
    summary: parts.join(', '),
  };
}

/**
 * Outcome of a transition check.
 */
export type TransitionCheck =
  | { readonly allowed: true; readonly to: Stage }
  | { readonly allowed: false; readonly reason: string; readonly missing: readonly FieldName[] };

/**
 * A collecting stage may advance once every required field is present or skipped.
 */
export function checkAdvance(
  definition: StageDefinition,
  input: UserInput,
  skipped: ReadonlySet<FieldName>
): TransitionCheck {
  const to = nextStage(definition.stage);
  if (to === undefined) {
    return { allowed: false, reason: `${definition.stage} is the last stage`, missing: [] };
  }
  const { missing } = stageProgress(definition, input, skipped);
  if (missing.length > 0) {
    return {
      allowed: false,
      reason: `${definition.stage} still needs ${missing.join(', ')}`,
      missing,
    };
  }
  return { allowed: true, to };
}

/**
 * How each field is named in prompts.
 */
export const FIELD_LABELS: Readonly<Record<FieldName, string>> = {
  questionText: 'your question',
  questionCategory: 'the area your question is about',
  questionDescription: 'a short description of the situation',
  numbers: 'three numbers from 1 to 9',
  character: 'a single character',
  birthYear: 'your birth year',
  birthMonth: 'your birth month',
  birthDay: 'your birth day',
  birthHour: 'your birth hour',
  gender: 'your gender',
  mbtiType: 'your MBTI type',
  favoriteColor: 'your favourite colour',
  currentDirection: 'the direction you are facing',
  currentTime: 'the current time',
};

export function describeFields(fields: readonly FieldName[]): string {
  const labels = fields.map((field) => FIELD_LABELS[field]);
  if (labels.length <= 1) {
    return labels.join('');
  }
  return `${labels.slice(0, -1).join(', ')} and ${labels[labels.length - 1] ?? ''}`;
}
