/**
 * Logging and metrics for the Data API client.
 *
 * Both are interfaces with pluggable implementations; the client defaults to
 * no-op components so nothing is written unless a caller opts in, either by
 * passing an {@link Observability} or by setting `FM_DATA_LOG_LEVEL`.
 */

import { SecretString } from '../auth/index.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Log levels.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/** Structured fields attached to a log line */
export type LogContext = Record<string, unknown>;

/**
 * Log entry kept by {@link InMemoryLogger}.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Parses a level name such as `debug` or `WARN`.
 * Returns undefined for names it does not know.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

/**
 * Routes the four level methods to one `write`.
 */
abstract class LevelLogger implements Logger {
  protected abstract write(level: LogLevel, message: string, context?: LogContext): void;

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, context);
  }
}

// ============================================================================
// Redaction
// ============================================================================

const REDACTED = '[REDACTED]';

/** Keys whose values never reach a log line, compared case-insensitively */
export const DEFAULT_REDACT_KEYS: readonly string[] = [
  'password',
  'token',
  'secret',
  'authorization',
  'x-fm-data-access-token',
];

/** `Bearer <token>` and `Basic <credentials>` header values */
const AUTH_SCHEME = /^(Bearer|Basic)\s+\S+$/i;

/** Logout paths carry the session token as their last segment */
const SESSION_PATH = /(\/sessions\/)[^/?#\s]+/g;

/**
 * Strips credentials from log context: values under credential keys,
 * `SecretString`s, authorization header values and session tokens in
 * request paths. Arrays and nested objects are walked.
 */
export class Redactor {
  private readonly keys: Set<string>;

  constructor(keys: readonly string[] = DEFAULT_REDACT_KEYS) {
    this.keys = new Set(keys.map((key) => key.toLowerCase()));
  }

  context(context: LogContext): LogContext {
    const result: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      result[key] = this.keys.has(key.toLowerCase()) ? REDACTED : this.value(value);
    }
    return result;
  }

  value(value: unknown): unknown {
    if (value instanceof SecretString) return REDACTED;
    if (typeof value === 'string') return this.text(value);
    if (Array.isArray(value)) return value.map((item) => this.value(item));
    if (isPlainObject(value)) return this.context(value);
    return value;
  }

  text(text: string): string {
    if (AUTH_SCHEME.test(text)) {
      return text.replace(/\s+\S+$/, ` ${REDACTED}`);
    }
    return text.replace(SESSION_PATH, `$1${REDACTED}`);
  }
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// ============================================================================
// Loggers
// ============================================================================

export interface ConsoleLoggerOptions {
  /** Default: INFO */
  level?: LogLevel;
  /** Fields added to every line */
  context?: LogContext;
  /** Default: {@link DEFAULT_REDACT_KEYS} */
  redactKeys?: readonly string[];
}

/**
 * Writes one redacted JSON object per line: errors to stderr through
 * `console.error`, warnings through `console.warn`, the rest through
 * `console.log`.
 */
export class ConsoleLogger extends LevelLogger {
  private readonly level: LogLevel;
  private readonly base: LogContext;
  private readonly redactor: Redactor;

  constructor(options: ConsoleLoggerOptions = {}) {
    super();
    this.level = options.level ?? LogLevel.INFO;
    this.base = options.context ?? {};
    this.redactor = new Redactor(options.redactKeys);
  }

  /**
   * Formats an entry the way it is written to the console.
   */
  format(level: LogLevel, message: string, context?: LogContext): string {
    const fields = this.redactor.context({ ...this.base, ...context });
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message: this.redactor.text(message),
      ...(Object.keys(fields).length > 0 ? { context: fields } : {}),
    });
  }

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) return;
    const line = this.format(level, message, context);
    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Discards everything.
 */
export class NoopLogger extends LevelLogger {
  protected write(): void {}
}

/**
 * Keeps entries, unredacted, for assertions in tests.
 */
export class InMemoryLogger extends LevelLogger {
  private readonly entries: LogEntry[] = [];

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({ level, message, timestamp: new Date(), context });
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metric names for Data API operations. Operation metrics carry an
 * `operation` label; error counts add the error `code`.
 */
export const MetricNames = {
  OPERATIONS_TOTAL: 'fm_operations_total',
  OPERATION_LATENCY: 'fm_operation_latency_ms',
  ERRORS_TOTAL: 'fm_errors_total',
  SESSIONS_OPENED: 'fm_sessions_opened_total',
  SESSIONS_INVALIDATED: 'fm_sessions_invalidated_total',
} as const;

export type MetricName = (typeof MetricNames)[keyof typeof MetricNames];

export type MetricLabels = Readonly<Record<string, string>>;

/**
 * A recorded counter increment or timing.
 */
export interface MetricEntry {
  kind: 'counter' | 'timing';
  name: MetricName;
  value: number;
  labels?: MetricLabels;
}

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  /** Adds `value` (default 1) to a counter */
  increment(name: MetricName, value?: number, labels?: MetricLabels): void;
  timing(name: MetricName, durationMs: number, labels?: MetricLabels): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * Keeps every increment and timing for assertions in tests.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly entries: MetricEntry[] = [];

  increment(name: MetricName, value = 1, labels?: MetricLabels): void {
    this.entries.push({ kind: 'counter', name, value, labels });
  }

  timing(name: MetricName, durationMs: number, labels?: MetricLabels): void {
    this.entries.push({ kind: 'timing', name, value: durationMs, labels });
  }

  getMetrics(): MetricEntry[] {
    return [...this.entries];
  }

  /**
   * Sum of a counter over the increments recorded with exactly `labels`.
   */
  getCounter(name: MetricName, labels: MetricLabels = {}): number {
    const wanted = labelKey(labels);
    return this.entries
      .filter((entry) => entry.kind === 'counter' && entry.name === name)
      .filter((entry) => labelKey(entry.labels ?? {}) === wanted)
      .reduce((sum, entry) => sum + entry.value, 0);
  }
}

function labelKey(labels: MetricLabels): string {
  return Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`)
    .join(',');
}

// ============================================================================
// Observability Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
}

export function createNoopObservability(): Observability {
  return {
    logger: new NoopLogger(),
    metrics: new NoopMetricsCollector(),
  };
}

/**
 * In-memory logger and metrics, typed so tests can read them back.
 */
export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
} {
  return {
    logger: new InMemoryLogger(),
    metrics: new InMemoryMetricsCollector(),
  };
}

/**
 * Console logging at `level`; metrics are discarded.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return {
    logger: new ConsoleLogger({ level }),
    metrics: new NoopMetricsCollector(),
  };
}

/**
 * Console logging at the level named by `FM_DATA_LOG_LEVEL`, or no-op
 * components when the variable is unset or names no level.
 */
export function createObservabilityFromEnv(env: NodeJS.ProcessEnv = process.env): Observability {
  const level = parseLogLevel(env.FM_DATA_LOG_LEVEL);
  return level === undefined ? createNoopObservability() : createConsoleObservability(level);
}
