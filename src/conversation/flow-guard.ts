/**
 * Conversation flow guard.
 *
 * Drives one session through INIT, ICEBREAK, DEEPEN, COLLECT, VERIFY,
 * REPORT, QA and COMPLETED. Each collecting turn runs the deterministic
 * parsers, falls back to the extractor while required fields are missing,
 * merges without overwriting, and either advances or replies with the fields
 * still missing.
 *
 * @packageDocumentation
 */

import type { AnalysisPipeline, AnalysisResult } from '../analysis/pipeline.js';
import type { Config } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import {
  AnalysisCancelledError,
  InputValidationError,
  InsufficientTheoriesError,
  SessionError,
  toUserMessage,
} from '../errors.js';
import { buildReport, summarizeVerdict } from '../report/report.js';
import { isFieldPresent } from '../theory/completeness.js';
import type { TheoryRegistry } from '../theory/registry.js';
import type { FieldName, FieldValues, TheoryId, TheoryResult } from '../theory/types.js';
import { Logger } from '../utils/logger.js';
import { classifyAnswer } from '../verification/answer-classifier.js';
import { applyFeedback } from '../verification/confidence.js';
import { generateQuestions } from '../verification/questions.js';
import type { VerificationQuestion } from '../verification/types.js';
import { recordMessage, type ConversationContext } from './context.js';
import { extractWithTimeout, offeredFields, type Extractor } from './extraction.js';
import { containsPhrase, findPhrase, getDefaultLexicon, type Lexicon } from './lexicon.js';
import {
  parseCategory,
  parseChangeRequest,
  parseFieldValue,
  parseFields,
  parseSkipRequest,
  type CandidateFields,
  type SkipRequest,
} from './parsing.js';
import {
  FIELD_LABELS,
  checkAdvance,
  describeFields,
  stageDefinition,
  stageFields,
  stageProgress,
} from './stages.js';
import { isCollectingStage, type StageDefinition, type TurnResult } from './types.js';
import { validateField, withField } from './validators.js';

/**
 * Outcome of a field modification.
 */
export type ModifyResult =
  | {
      readonly status: 'applied';
      readonly field: FieldName;
      readonly previous: unknown;
      readonly value: unknown;
      /** Theories whose cached results were dropped and requeued. */
      readonly invalidated: readonly TheoryId[];
    }
  | { readonly status: 'rejected'; readonly field: FieldName; readonly error: InputValidationError };

interface MergeOutcome {
  readonly merged: readonly FieldName[];
  readonly rejected: readonly InputValidationError[];
}

export interface FlowGuardOptions {
  readonly registry: TheoryRegistry;
  readonly pipeline: AnalysisPipeline;
  readonly extractor?: Extractor | undefined;
  readonly config?: Config | undefined;
  readonly lexicon?: Lexicon | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

export class FlowGuard {
  private readonly registry: TheoryRegistry;
  private readonly pipeline: AnalysisPipeline;
  private readonly extractor: Extractor | undefined;
  private readonly config: Config;
  private readonly lexicon: Lexicon;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: FlowGuardOptions) {
    this.registry = options.registry;
    this.pipeline = options.pipeline;
    this.extractor = options.extractor;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.lexicon = options.lexicon ?? getDefaultLexicon();
    this.logger = options.logger ?? new Logger({ component: 'FlowGuard' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Leaves INIT, reads the category from the question when it names one,
   * and prompts for the first stage.
   */
  async begin(context: ConversationContext): Promise<TurnResult> {
    return this.guard(context, async () => this.enter(context));
  }

  /**
   * Handles one user message in the current stage.
   *
   * @throws SessionError when the session is complete or was abandoned.
   */
  async handleTurn(context: ConversationContext, text: string): Promise<TurnResult> {
    if (context.stage === 'COMPLETED') {
      throw new SessionError('SESSION_CLOSED', context.sessionId, 'This session is complete');
    }
    recordMessage(context, 'user', text, this.now());
    return this.guard(context, async () => {
      const modified = await this.inBandModify(context, text);
      if (modified !== undefined) {
        return modified;
      }
      const { stage } = context;
      if (isCollectingStage(stage)) {
        return this.collectTurn(context, stageDefinition(stage), text);
      }
      switch (stage) {
        case 'INIT':
          return this.enter(context);
        case 'VERIFY':
          return this.verifyTurn(context, text);
        default:
          return this.qaTurn(context, text);
      }
    });
  }

  /**
   * Replaces a field value. Cached results of theories declaring the field
   * are dropped and requeued; the stage does not change.
   */
  modify<K extends FieldName>(
    context: ConversationContext,
    field: K,
    raw: unknown
  ): ModifyResult {
    const check = validateField(field, raw);
    if (!check.ok) {
      return {
        status: 'rejected',
        field,
        error: new InputValidationError(field, raw, check.message, context.stage),
      };
    }
    const previous: unknown = context.input[field];
    context.input = withField(context.input, field, check.value);
    context.skippedFields.delete(field);
    const invalidated = context.cache.invalidateField(field, this.registry);
    this.logger.info('field_modified', {
      session: context.sessionId,
      field,
      stage: context.stage,
      invalidated,
    });
    return { status: 'applied', field, previous, value: check.value, invalidated };
  }

  /**
   * Rebuilds the report after a modification made once the report exists.
   */
  async refreshReport(context: ConversationContext): Promise<TurnResult | undefined> {
    if (context.report === undefined) {
      return undefined;
    }
    return this.guard(context, async () => this.finalize(context));
  }

  private async enter(context: ConversationContext): Promise<TurnResult> {
    context.completedStages.add('INIT');
    context.stage = 'ICEBREAK';
    const question = context.input.questionText ?? '';
    this.merge(context, { questionCategory: parseCategory(question, this.lexicon) }, [
      'questionCategory',
    ]);
    this.logger.info('session_started', {
      session: context.sessionId,
      category: context.input.questionCategory ?? null,
    });
    return this.advance(context);
  }

  private async guard(
    context: ConversationContext,
    task: () => Promise<TurnResult>
  ): Promise<TurnResult> {
    try {
      const result = await task();
      this.ensureOpen(context);
      recordMessage(context, 'assistant', result.message, this.now());
      return result;
    } catch (error) {
      if (error instanceof AnalysisCancelledError) {
        throw new SessionError('SESSION_CLOSED', context.sessionId, 'This session was abandoned');
      }
      throw error;
    }
  }

  private ensureOpen(context: ConversationContext): void {
    if (context.abort.signal.aborted) {
      throw new SessionError('SESSION_CLOSED', context.sessionId, 'This session was abandoned');
    }
  }

  private async inBandModify(
    context: ConversationContext,
    text: string
  ): Promise<TurnResult | undefined> {
    // After collection, answers mention years and days without meaning to edit them.
    const field = parseChangeRequest(text, this.lexicon, {
      includeBare: context.stage !== 'VERIFY' && context.stage !== 'QA',
    });
    if (
      field === undefined ||
      (!isFieldPresent(context.input, field) && !context.skippedFields.has(field))
    ) {
      return undefined;
    }
    const value = parseFieldValue(field, text, this.lexicon);
    if (value === undefined) {
      return undefined;
    }

    const outcome = this.modify(context, field, value);
    if (outcome.status === 'rejected') {
      return {
        kind: 'prompt',
        stage: context.stage,
        message: `${toUserMessage(outcome.error)}. ${this.currentPrompt(context)}`,
      };
    }
    if (context.report !== undefined) {
      return this.finalize(context, `Updated ${FIELD_LABELS[field]}.`);
    }
    return {
      kind: 'prompt',
      stage: context.stage,
      message: `Updated ${FIELD_LABELS[field]}. ${this.currentPrompt(context)}`,
    };
  }

  private currentPrompt(context: ConversationContext): string {
    const { stage } = context;
    if (isCollectingStage(stage)) {
      const definition = stageDefinition(stage);
      const { missing } = stageProgress(definition, context.input, context.skippedFields);
      return missing.length > 0 ? `I still need ${describeFields(missing)}.` : definition.prompt;
    }
    if (stage === 'VERIFY') {
      return this.nextQuestion(context)?.prompt ?? '';
    }
    return 'Ask me anything about the reading, or say goodbye to finish.';
  }

  private async collectTurn(
    context: ConversationContext,
    definition: StageDefinition,
    text: string
  ): Promise<TurnResult> {
    const fields = stageFields(definition);
    const skip = parseSkipRequest(text, this.lexicon);

    const unasked = skip?.kind === 'field' ? skip.field : undefined;

    const parsed: CandidateFields =
      skip?.kind === 'next'
        ? {}
        : parseFields(
            fields.filter((field) => field !== unasked),
            text,
            this.lexicon
          );
    const deterministic = this.merge(context, parsed, fields);
    const rejected = [...deterministic.rejected];
    let merged = deterministic.merged.length;

    let skipNote = '';
    if (skip !== undefined) {
      skipNote = this.applySkip(context, definition, skip);
    }

    const { missing } = stageProgress(definition, context.input, context.skippedFields);
    if (missing.length > 0 && this.extractor !== undefined) {
      const outcome = await extractWithTimeout(this.extractor, context.stage, text, context.input, {
        timeoutMs: this.config.conversation.extraction_timeout_ms,
        signal: context.abort.signal,
        logger: this.logger,
      });
      this.ensureOpen(context);
      if (outcome.status === 'ok') {
        const extracted = this.merge(context, outcome.fields, fields);
        rejected.push(...extracted.rejected);
        merged += extracted.merged.length;
        this.logger.debug('extraction_merged', {
          offered: offeredFields(outcome.fields, fields),
          merged: extracted.merged,
        });
      }
    }

    const progress = stageProgress(definition, context.input, context.skippedFields);
    if (progress.missing.length === 0) {
      context.reprompts.delete(context.stage);
      return this.advance(context);
    }

    const failures =
      merged === 0 && skipNote.length === 0
        ? (context.reprompts.get(context.stage) ?? 0) + 1
        : (context.reprompts.get(context.stage) ?? 0);
    context.reprompts.set(context.stage, failures);

    const parts: string[] = [];
    if (skipNote.length > 0) {
      parts.push(skipNote);
    }
    for (const error of rejected) {
      parts.push(`${toUserMessage(error)}.`);
    }
    parts.push(`I still need ${describeFields(progress.missing)} (${progress.summary}).`);
    if (failures >= this.config.conversation.max_reprompts) {
      parts.push(`For example: "${definition.example}"`);
    }
    return {
      kind: 'missing-fields',
      stage: context.stage,
      message: parts.join(' '),
      missingFields: progress.missing,
      progress,
    };
  }

  /**
   * Marks the named field, or the first missing required field, as
   * permanently absent when policy allows it. A named field outside this
   * stage, or one already answered, is left alone.
   */
  private applySkip(
    context: ConversationContext,
    definition: StageDefinition,
    skip: SkipRequest
  ): string {
    let target: FieldName | undefined;
    if (skip.kind === 'field') {
      const open =
        stageFields(definition).includes(skip.field) &&
        !isFieldPresent(context.input, skip.field) &&
        !context.skippedFields.has(skip.field);
      target = open ? skip.field : undefined;
    } else {
      target = stageProgress(definition, context.input, context.skippedFields).missing[0];
    }
    if (target === undefined) {
      return '';
    }
    const skippable =
      definition.skippable.includes(target) || definition.optional.includes(target);
    if (!skippable) {
      return `I can't continue without ${FIELD_LABELS[target]}.`;
    }
    context.skippedFields.add(target);
    this.logger.info('field_skipped', {
      session: context.sessionId,
      stage: context.stage,
      field: target,
    });
    return `No problem, I'll go without ${FIELD_LABELS[target]}.`;
  }

  /**
   * Validates and merges candidates for the given fields. Fields already set
   * are never overwritten.
   */
  private merge(
    context: ConversationContext,
    candidates: CandidateFields,
    fields: readonly FieldName[]
  ): MergeOutcome {
    const merged: FieldName[] = [];
    const rejected: InputValidationError[] = [];
    for (const field of fields) {
      const raw = candidates[field];
      if (raw === undefined || isFieldPresent(context.input, field)) {
        continue;
      }
      const error = this.mergeField(context, field, raw);
      if (error === undefined) {
        merged.push(field);
      } else {
        rejected.push(error);
      }
    }
    if (merged.length > 0) {
      this.logger.debug('fields_merged', { stage: context.stage, fields: merged });
    }
    return { merged, rejected };
  }

  private mergeField<K extends FieldName>(
    context: ConversationContext,
    field: K,
    raw: unknown
  ): InputValidationError | undefined {
    const check = validateField(field, raw);
    if (!check.ok) {
      return new InputValidationError(field, raw, check.message, context.stage);
    }
    const value: FieldValues[K] = check.value;
    context.input = withField(context.input, field, value);
    context.skippedFields.delete(field);
    return undefined;
  }

  /**
   * Advances through every stage whose requirements are met. Quick readings
   * run after ICEBREAK and DEEPEN; leaving COLLECT starts verification.
   */
  private async advance(context: ConversationContext): Promise<TurnResult> {
    let quickReadings: TheoryResult[] | undefined;

    for (;;) {
      const { stage } = context;
      if (!isCollectingStage(stage)) {
        return { kind: 'prompt', stage, message: this.currentPrompt(context) };
      }
      const definition = stageDefinition(stage);
      const check = checkAdvance(definition, context.input, context.skippedFields);
      if (!check.allowed) {
        return {
          kind: 'prompt',
          stage,
          message: this.withReadings(definition.prompt, quickReadings),
          quickReadings,
        };
      }

      if (stage === 'COLLECT') {
        return this.startVerification(context, definition);
      }

      context.completedStages.add(stage);
      context.stage = check.to;
      this.logger.info('stage_advanced', { session: context.sessionId, from: stage, to: check.to });

      if (this.config.conversation.quick_readings) {
        quickReadings = await this.pipeline.quickReadings(context.input, context.cache, {
          signal: context.abort.signal,
        });
        this.ensureOpen(context);
      }
    }
  }

  private withReadings(prompt: string, readings: readonly TheoryResult[] | undefined): string {
    if (readings === undefined || readings.length === 0) {
      return prompt;
    }
    const summary = readings
      .map((reading) => `${this.displayName(reading.theoryId)}: ${reading.judgment}`)
      .join('; ');
    return `First impressions (${summary}). ${prompt}`;
  }

  private displayName(id: TheoryId): string {
    return this.registry.tryGet(id)?.displayName ?? id;
  }

  private async startVerification(
    context: ConversationContext,
    definition: StageDefinition
  ): Promise<TurnResult> {
    let analysis: AnalysisResult;
    try {
      analysis = await this.pipeline.analyze(context.input, context.cache, {
        signal: context.abort.signal,
        unavailableFields: [...context.skippedFields],
      });
    } catch (error) {
      if (!(error instanceof InsufficientTheoriesError)) {
        throw error;
      }
      const progress = stageProgress(definition, context.input, context.skippedFields);
      return {
        kind: 'missing-fields',
        stage: context.stage,
        message: toUserMessage(error),
        missingFields: error.missingFields,
        progress,
      };
    }
    this.ensureOpen(context);

    context.analysis = analysis;
    context.questions = generateQuestions(analysis.results, context.input.questionCategory ?? 'other');
    context.feedback.length = 0;
    context.completedStages.add('COLLECT');
    context.stage = 'VERIFY';
    this.logger.info('stage_advanced', { session: context.sessionId, from: 'COLLECT', to: 'VERIFY' });

    const verdict = summarizeVerdict(analysis.resolution, analysis.results.length);
    const first = context.questions[0];
    return {
      kind: 'prompt',
      stage: 'VERIFY',
      message: `Initial reading: ${verdict.summary} Before I finalise it, a few questions about your past. ${first?.prompt ?? ''}`,
    };
  }

  private nextQuestion(context: ConversationContext): VerificationQuestion | undefined {
    const answered = new Set(context.feedback.map((entry) => entry.questionId));
    return context.questions.find((question) => !answered.has(question.id));
  }

  private async verifyTurn(context: ConversationContext, text: string): Promise<TurnResult> {
    const question = this.nextQuestion(context);
    if (question !== undefined) {
      const outcome = classifyAnswer(question.claim, text, this.lexicon);
      context.feedback.push({ questionId: question.id, answer: text, outcome });
      this.logger.info('verification_answered', {
        session: context.sessionId,
        question: question.id,
        theory: question.theoryId,
        outcome,
      });
    }

    const next = this.nextQuestion(context);
    if (next !== undefined) {
      return { kind: 'prompt', stage: 'VERIFY', message: `Noted. ${next.prompt}` };
    }
    return this.finalize(context);
  }

  /**
   * Applies verification feedback, re-resolves and builds the report.
   * Theories requeued by a modification are recomputed first.
   */
  private async finalize(context: ConversationContext, preface?: string): Promise<TurnResult> {
    let analysis = context.analysis;
    if (analysis === undefined || context.cache.requeuedIds().length > 0) {
      analysis = await this.pipeline.analyze(context.input, context.cache, {
        signal: context.abort.signal,
        unavailableFields: [...context.skippedFields],
      });
      this.ensureOpen(context);
      context.analysis = analysis;
    }

    const now = this.now();
    const adjusted = applyFeedback(analysis.results, context.questions, context.feedback, {
      config: this.config.verification,
      now,
      logger: this.logger.child('Verification'),
    });
    const finalResolution = await this.pipeline.resolve(
      adjusted.results,
      context.input,
      analysis.selection,
      context.cache,
      context.abort.signal
    );
    this.ensureOpen(context);

    const report = buildReport({
      sessionId: context.sessionId,
      question: context.input.questionText ?? '',
      category: context.input.questionCategory ?? 'other',
      selectedTheories: analysis.selection.selected,
      executionOrder: analysis.selection.executionOrder,
      results: adjusted.results,
      failures: analysis.failures,
      initialResolution: analysis.resolution,
      finalResolution,
      verificationQuestions: context.questions,
      verificationFeedback: context.feedback,
      adjustments: adjusted.adjustments,
      skippedFields: [...context.skippedFields],
      generatedAt: now,
    });
    context.report = report;
    context.completedStages.add('VERIFY');
    context.completedStages.add('REPORT');
    context.stage = 'QA';
    this.logger.info('report_ready', {
      session: context.sessionId,
      judgment: report.verdict.judgment,
      confidence: report.verdict.confidence,
    });

    const lead = preface === undefined ? '' : `${preface} `;
    return {
      kind: 'report',
      stage: 'QA',
      message: `${lead}${report.verdict.summary} Ask me anything about the reading, or say goodbye to finish.`,
      report,
    };
  }

  private async qaTurn(context: ConversationContext, text: string): Promise<TurnResult> {
    if (findPhrase(text, this.lexicon.closingPhrases) !== undefined) {
      context.completedStages.add('QA');
      context.stage = 'COMPLETED';
      this.logger.info('session_completed', { session: context.sessionId });
      return { kind: 'prompt', stage: 'COMPLETED', message: 'Thank you. The session is complete.' };
    }

    const results = context.report?.results ?? [];
    const mentioned = results.find(
      (result) =>
        containsPhrase(text, result.theoryId) ||
        containsPhrase(text, this.displayName(result.theoryId))
    );
    if (mentioned !== undefined) {
      return {
        kind: 'prompt',
        stage: context.stage,
        message: `${this.displayName(mentioned.theoryId)}: ${mentioned.interpretation} (${mentioned.judgment}, confidence ${mentioned.confidence.toFixed(2)})`,
      };
    }
    const names = results.map((result) => this.displayName(result.theoryId)).join(', ');
    const summary = context.report?.verdict.summary ?? '';
    return {
      kind: 'prompt',
      stage: context.stage,
      message: `${summary} Name one of the readings (${names}) to hear its detail.`,
    };
  }
}
