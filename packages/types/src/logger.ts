/**
 * Structured logging for the Koinon ledger.
 *
 * Emits one JSON object per entry. Supports level filtering, contextual
 * fields, and child loggers scoped to a subsystem (`koinon.revenue`).
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater
 * than or equal to the logger's threshold.
 */
export enum LogLevel {
  /** Rejected operations and other per-call diagnostics. */
  DEBUG = 0,
  /** Committed state changes (registrations, distributions, votes). */
  INFO = 1,
  /** Conditions an operator should look at, such as a pause. */
  WARN = 2,
  ERROR = 3,
  /** Suppress all logging output. */
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/**
 * A single structured log entry. Ledger amounts are bigints; the default
 * output renders them as decimal strings.
 */
export interface LogEntry {
  /** Level name (`DEBUG`, `INFO`, ...). */
  level: string;
  message: string;
  /** ISO 8601 wall-clock timestamp of when the entry was created. */
  timestamp: string;
  /** Dotted subsystem path, e.g. `koinon.licensing`. */
  component?: string;
  /** Contextual fields passed with the call. */
  [key: string]: unknown;
}

/** A function that receives each {@link LogEntry} for output. */
export type LogOutput = (entry: LogEntry) => void;

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Level number to the name written in {@link LogEntry.level}. */
const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

/** JSON replacer that renders bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/** Default output: JSON to stdout. */
const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry, bigintReplacer));
};

/**
 * Parse a level name (`debug`, `INFO`, `silent`, ...) into a {@link LogLevel}.
 * Returns `undefined` for unknown names.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (name === undefined) return undefined;
  switch (name.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

// ─── Logger options ─────────────────────────────────────────────────────────────

/** Configuration options accepted by the {@link Logger} constructor. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  /** Component name prepended to child logger components. */
  component?: string;
  /** Custom output sink. Defaults to JSON via `console.log`. */
  output?: LogOutput;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * Structured logger with level filtering, contextual fields, and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'koinon' });
 * log.info('asset registered', { assetId: 1 });
 * log.child('revenue').info('revenue distributed', { distributed: 1000n });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  /** Emit a {@link LogLevel.DEBUG} entry. */
  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  /** Emit a {@link LogLevel.INFO} entry. */
  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  /** Emit a {@link LogLevel.WARN} entry. */
  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  /** Emit a {@link LogLevel.ERROR} entry. */
  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger that shares this logger's level and output.
   *
   * @param component - Subsystem name. If this logger already has a
   *   component, the child's is `parent.child`.
   */
  child(component: string): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      output: this.output,
    });
  }

  /**
   * Change the threshold of this logger. Children created earlier keep
   * the level they were created with.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** The current minimum level. */
  getLevel(): LogLevel {
    return this.level;
  }

  /** The dotted component path, or `undefined` for a root logger. */
  getComponent(): string | undefined {
    return this.component;
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  /**
   * Build a {@link LogEntry} and hand it to the output when `level` meets
   * the threshold. Caller fields are spread last and may override
   * `component`.
   */
  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...fields,
    };

    this.output(entry);
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/**
 * Create a {@link Logger}. The ledger runtime calls this with the configured
 * level and the `koinon` component when no logger is injected.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
