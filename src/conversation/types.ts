/**
 * Conversation stages and turn results.
 *
 * @packageDocumentation
 */

import type { FieldName, TheoryResult } from '../theory/types.js';
import type { ComprehensiveReport } from '../report/report.js';

/**
 * Conversation stages in strict forward order.
 */
export const STAGES = [
  'INIT',
  'ICEBREAK',
  'DEEPEN',
  'COLLECT',
  'VERIFY',
  'REPORT',
  'QA',
  'COMPLETED',
] as const;

export type Stage = (typeof STAGES)[number];

/**
 * Stages that collect input fields.
 */
export type CollectingStage = 'ICEBREAK' | 'DEEPEN' | 'COLLECT';

export function isCollectingStage(stage: Stage): stage is CollectingStage {
  return stage === 'ICEBREAK' || stage === 'DEEPEN' || stage === 'COLLECT';
}

/**
 * Field requirements and prompts of one collecting stage.
 */
export interface StageDefinition {
  readonly stage: CollectingStage;
  readonly required: readonly FieldName[];
  readonly optional: readonly FieldName[];
  /** Required fields the user may decline to give. */
  readonly skippable: readonly FieldName[];
  readonly prompt: string;
  /** Example utterance added after repeated failed turns. */
  readonly example: string;
}

/**
 * Collection progress of a stage.
 */
export interface StageProgress {
  readonly stage: Stage;
  readonly collected: readonly FieldName[];
  readonly missing: readonly FieldName[];
  readonly skipped: readonly FieldName[];
  /** Human-readable summary, e.g. "1 of 2 required fields collected". */
  readonly summary: string;
}

export type MessageRole = 'user' | 'assistant';

export interface MessageEntry {
  readonly role: MessageRole;
  readonly stage: Stage;
  readonly content: string;
  /** ISO 8601. */
  readonly timestamp: string;
}

/**
 * Reply to one submitted turn.
 */
export type TurnResult =
  | {
      readonly kind: 'prompt';
      readonly stage: Stage;
      readonly message: string;
      /** Fast-tier readings produced when this turn finished a stage. */
      readonly quickReadings?: readonly TheoryResult[] | undefined;
    }
  | {
      readonly kind: 'missing-fields';
      readonly stage: Stage;
      readonly message: string;
      readonly missingFields: readonly FieldName[];
      readonly progress: StageProgress;
    }
  | {
      readonly kind: 'report';
      readonly stage: Stage;
      readonly message: string;
      readonly report: ComprehensiveReport;
    };
