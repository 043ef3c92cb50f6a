/**
 * Session control surface.
 *
 * Sessions are independent; each owns its conversation context, result cache
 * and abort controller. Turns within a session are serialized so a turn never
 * observes another turn's partial state.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';

import { AnalysisPipeline } from '../analysis/pipeline.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/types.js';
import { createContext, type ConversationContext } from '../conversation/context.js';
import type { Extractor } from '../conversation/extraction.js';
import { FlowGuard, type ModifyResult } from '../conversation/flow-guard.js';
import { getDefaultLexicon, type Lexicon } from '../conversation/lexicon.js';
import type { MessageEntry, Stage, TurnResult } from '../conversation/types.js';
import { SessionError } from '../errors.js';
import type { ComprehensiveReport } from '../report/report.js';
import type { TheoryRunner } from '../runner/theory-runner.js';
import type { AffinityTables } from '../theory/affinity.js';
import { createBuiltinRegistry, type TheoryRegistry } from '../theory/registry.js';
import type { FieldName, UserInput } from '../theory/types.js';
import { Logger } from '../utils/logger.js';

export interface SessionManagerOptions {
  readonly runner: TheoryRunner;
  readonly registry?: TheoryRegistry | undefined;
  readonly extractor?: Extractor | undefined;
  readonly config?: Config | undefined;
  readonly tables?: AffinityTables | undefined;
  readonly lexicon?: Lexicon | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
  readonly generateId?: (() => string) | undefined;
}

export interface StartedSession {
  readonly sessionId: string;
  readonly turn: TurnResult;
}

export type ModifyAck = ModifyResult & {
  readonly sessionId: string;
  /** Present when the modification rebuilt an existing report. */
  readonly turn?: TurnResult | undefined;
};

export interface AbandonAck {
  readonly sessionId: string;
  readonly abandoned: true;
  /** Stage the session was in when abandoned. */
  readonly stage: Stage;
}

/**
 * Read-only view of a session.
 */
export interface SessionSnapshot {
  readonly sessionId: string;
  readonly stage: Stage;
  readonly input: UserInput;
  readonly completedStages: readonly Stage[];
  readonly skippedFields: readonly FieldName[];
  readonly history: readonly MessageEntry[];
  readonly report: ComprehensiveReport | undefined;
  readonly startedAt: string;
}

interface SessionEntry {
  readonly context: ConversationContext;
  /** Tail of the turn queue. */
  tail: Promise<unknown>;
}

export class SessionManager {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly guard: FlowGuard;
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: SessionManagerOptions) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger =
      options.logger ??
      new Logger({ component: 'SessionManager', debugMode: this.config.logging.debug });
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;

    const registry = options.registry ?? createBuiltinRegistry(options.tables);
    const pipeline = new AnalysisPipeline({
      registry,
      runner: options.runner,
      config: this.config,
      tables: options.tables,
      logger: this.logger.child('AnalysisPipeline'),
    });
    this.guard = new FlowGuard({
      registry,
      pipeline,
      extractor: options.extractor,
      config: this.config,
      lexicon: options.lexicon ?? getDefaultLexicon(),
      logger: this.logger.child('FlowGuard'),
      now: this.now,
    });
  }

  /**
   * Opens a session for a question and returns the first prompt.
   */
  async startSession(question: string): Promise<StartedSession> {
    const sessionId = this.generateId();
    const context = createContext({
      sessionId,
      question,
      now: this.now(),
      historyLimit: this.config.conversation.history_limit,
    });
    const entry: SessionEntry = { context, tail: Promise.resolve() };
    this.sessions.set(sessionId, entry);
    const turn = await this.enqueue(entry, () => this.guard.begin(context));
    return { sessionId, turn };
  }

  /**
   * @throws SessionError when the session is unknown, complete or abandoned.
   */
  async submitTurn(sessionId: string, text: string): Promise<TurnResult> {
    const entry = this.entry(sessionId);
    return this.enqueue(entry, () => this.guard.handleTurn(entry.context, text));
  }

  /**
   * Replaces a field out of band. The stage does not change; when a report
   * already exists it is rebuilt and returned with the acknowledgement.
   */
  async modifyField(sessionId: string, field: FieldName, value: unknown): Promise<ModifyAck> {
    const entry = this.entry(sessionId);
    return this.enqueue(entry, async () => {
      const { context } = entry;
      if (context.stage === 'COMPLETED') {
        throw new SessionError('SESSION_CLOSED', sessionId, 'This session is complete');
      }
      const result = this.guard.modify(context, field, value);
      if (result.status === 'rejected') {
        return { ...result, sessionId };
      }
      const turn = await this.guard.refreshReport(context);
      return { ...result, sessionId, turn };
    });
  }

  /**
   * Cancels in-flight work and discards the session.
   */
  abandonSession(sessionId: string): AbandonAck {
    const { context } = this.entry(sessionId);
    context.abort.abort();
    this.sessions.delete(sessionId);
    this.logger.info('session_abandoned', { session: sessionId, stage: context.stage });
    return { sessionId, abandoned: true, stage: context.stage };
  }

  inspect(sessionId: string): SessionSnapshot {
    const { context } = this.entry(sessionId);
    return {
      sessionId,
      stage: context.stage,
      input: context.input,
      completedStages: [...context.completedStages],
      skippedFields: [...context.skippedFields],
      history: [...context.history],
      report: context.report,
      startedAt: context.startedAt,
    };
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  private entry(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (entry === undefined) {
      throw new SessionError('SESSION_NOT_FOUND', sessionId, `Session '${sessionId}' does not exist`);
    }
    return entry;
  }

  private enqueue<T>(entry: SessionEntry, task: () => Promise<T>): Promise<T> {
    const run = entry.tail.then(task, task);
    // Failures reach the caller through run; the queue keeps going.
    entry.tail = run.catch(() => undefined);
    return run;
  }
}
