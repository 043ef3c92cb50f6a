/**
 * Augury
 *
 * Orchestrates several divination theories over a guided conversation and
 * reconciles their readings into one verdict.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Session control
export {
  SessionManager,
  type SessionManagerOptions,
  type StartedSession,
  type ModifyAck,
  type AbandonAck,
  type SessionSnapshot,
} from './session/session-manager.js';

// Conversation
export { FlowGuard, type FlowGuardOptions, type ModifyResult } from './conversation/flow-guard.js';
export {
  STAGES,
  isCollectingStage,
  type Stage,
  type CollectingStage,
  type StageDefinition,
  type StageProgress,
  type MessageEntry,
  type MessageRole,
  type TurnResult,
} from './conversation/types.js';
export {
  STAGE_DEFINITIONS,
  checkAdvance,
  nextStage,
  stageProgress,
  describeFields,
  type TransitionCheck,
} from './conversation/stages.js';
export {
  extractWithTimeout,
  type Extractor,
  type ExtractionOutcome,
  type ExtractionFailure,
} from './conversation/extraction.js';
export { parseFields, type CandidateFields } from './conversation/parsing.js';
export { validateField, type FieldCheck } from './conversation/validators.js';
export { getDefaultLexicon, loadLexicon, parseLexicon, type Lexicon } from './conversation/lexicon.js';

// Analysis
export {
  AnalysisPipeline,
  type AnalysisPipelineOptions,
  type AnalysisOptions,
  type AnalysisResult,
} from './analysis/pipeline.js';
export { ResultCache, inputKey } from './analysis/result-cache.js';
export {
  TheorySelector,
  orderByTier,
  type TheorySelectorOptions,
  type SelectionResult,
  type TheoryScore,
} from './selector/theory-selector.js';
export {
  runTheories,
  runOne,
  validateResult,
  type TheoryRunner,
  type RunFailure,
  type RunOutcome,
} from './runner/theory-runner.js';
export {
  ConflictResolver,
  type ConflictResolution,
  type ConflictRecord,
  type ConflictTier,
  type ResolutionStrategy,
  type ArbitrateFn,
  type ArbitrationAttempt,
} from './resolver/conflict-resolver.js';
export {
  ArbitrationSystem,
  shouldArbitrate,
  type ArbitrationOutcome,
  type MatchedSide,
} from './arbitration/arbitration.js';

// Verification
export { generateQuestions } from './verification/questions.js';
export { classifyAnswer } from './verification/answer-classifier.js';
export { applyFeedback, deltaFor, type AdjustmentResult } from './verification/confidence.js';
export type {
  VerificationOutcome,
  VerificationQuestion,
  VerificationFeedback,
  ConfidenceAdjustment,
} from './verification/types.js';

// Theories
export {
  TheoryRegistry,
  createBuiltinRegistry,
  TheoryNotFoundError,
  InvalidDescriptorError,
} from './theory/registry.js';
export {
  getDefaultAffinityTables,
  loadAffinityTables,
  parseAffinityTables,
  type AffinityTables,
} from './theory/affinity.js';
export { computeCompleteness, checkEligibility } from './theory/completeness.js';
export { levelToJudgment } from './theory/judgment.js';
export {
  BUILTIN_THEORY_IDS,
  FIELD_NAMES,
  QUESTION_CATEGORIES,
  JUDGMENT_SCALE,
  type TheoryId,
  type TheoryDescriptor,
  type TheoryResult,
  type UserInput,
  type FieldName,
  type Judgment,
  type QuestionCategory,
  type ExecutionTier,
  type AffinityVector,
  type RetrospectiveClaim,
} from './theory/types.js';

// Report
export {
  buildReport,
  summarizeVerdict,
  type ComprehensiveReport,
  type DroppedTheory,
  type Verdict,
} from './report/report.js';
export { formatReport, type FormatReportOptions } from './report/formatter.js';

// Errors
export {
  AuguryError,
  InputValidationError,
  CalculationError,
  InsufficientTheoriesError,
  ExtractionTimeoutError,
  ExtractionProviderError,
  ExtractionParseError,
  ArbitrationUnavailableError,
  AnalysisCancelledError,
  SessionError,
  toUserMessage,
  type SessionErrorCode,
} from './errors.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  validateConfig,
  applyEnvOverrides,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  type Config,
  type PartialConfig,
  type EnvRecord,
} from './config/index.js';

// Logging
export { Logger, SilentLogger, type LogLevel, type LogEntry } from './utils/logger.js';
