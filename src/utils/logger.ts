/**
 * Structured logging for the engine.
 *
 * Every subsystem owns a Logger tagged with its component name and writes
 * one JSON line per event to stderr.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO 8601 timestamp when the entry was created. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Name of the component that generated this entry.
   * @example "ConflictResolver"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "conflict_resolved"
   */
  readonly event: string;
  /** Additional structured data. */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean | undefined;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'TheorySelector', debugMode: true });
 * logger.info('theories_selected', { selected: ['xiaoliu', 'meihua'] });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Creates a logger for another component with the same debug setting.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Cycles and BigInt values land here.
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    process.stderr.write(line + '\n');
  }
}

/**
 * Logger that discards everything. Used where callers pass no logger.
 */
export class SilentLogger extends Logger {
  constructor(component = 'silent') {
    super({ component });
  }

  override debug(_event: string, _data?: Record<string, unknown>): void {
    // discard
  }

  override info(_event: string, _data?: Record<string, unknown>): void {
    // discard
  }

  override warn(_event: string, _data?: Record<string, unknown>): void {
    // discard
  }

  override error(_event: string, _data?: Record<string, unknown>): void {
    // discard
  }

  override child(_component: string): Logger {
    return this;
  }
}
