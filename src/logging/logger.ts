/**
 * Fleetplan — Structured Logger
 *
 * JSON log entries with level filtering and dotted component names. Every
 * planning component takes an optional Logger and derives a child from it.
 */

// ─── Levels ──────────────────────────────────────────────────────────────────

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
  level: string;
  message: string;
  /** ISO 8601 */
  timestamp: string;
  component?: string;
  [key: string]: unknown;
}

export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  output?: LogOutput;
}

/** Warnings and errors go to stderr. */
const defaultOutput: LogOutput = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === 'WARN' || entry.level === 'ERROR') {
    console.error(line);
  } else {
    console.log(line);
  }
};

// ─── Logger ──────────────────────────────────────────────────────────────────

export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Derive a logger sharing this one's level and sink. A parent component
   * `planning` and child `consensus` produce `planning.consensus`.
   */
  child(component: string): Logger {
    return new Logger({
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.level || this.level === LogLevel.SILENT) return;

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

// ─── Factory ─────────────────────────────────────────────────────────────────

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Parse a level name such as `warn` (case-insensitive). Returns null for
 * names that are not levels.
 */
export function parseLogLevel(name: string): LogLevel | null {
  return LEVELS_BY_NAME[name.toLowerCase()] ?? null;
}

/** Describe an unknown thrown value for a log field. */
export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export const defaultLogger: Logger = createLogger({ component: 'fleetplan' });
