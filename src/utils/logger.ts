/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so that stdout stays free for
 * command output such as exported documents.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only written in debug mode
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /**
   * Severity level of the log entry.
   */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "ConceptParser"
   */
  readonly component: string;

  /**
   * Short snake_case name of the logged event.
   * @example "document_parsed"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { concepts: 12, maxDepth: 3 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ConceptParser', debugMode: true });
 * logger.debug('frontmatter_opened', { line: 1 });
 * logger.warn('frontmatter_invalid', { reason: 'bad indentation' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Returns a logger for another component sharing this logger's debug mode.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, replacing data that JSON.stringify rejects
 * (circular references, BigInt) with a marker so one line is always written.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Default logger for library code when the caller supplies none.
 */
export const logger = new Logger({ component: 'asterism', debugMode: false });
