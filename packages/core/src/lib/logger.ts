/**
 * Pluggable logging for cells, aggregations and stoppers.
 *
 * Nothing in cellwatch logs unless it is handed a logger: every component
 * takes an optional `logger` and falls back to `noopLogger`.
 *
 * @fileoverview Logger interface and factory.
 */

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LEVELS)[number];

/**
 * What a handler receives. Optional keys are present only when the call
 * supplied them.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Milliseconds since the epoch. */
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to 'info'. */
  level?: LogLevel;
  /** Tag added to every entry, e.g. 'Stopper'. */
  context?: string;
  /** Receives every entry that passes the level check. Defaults to console. */
  handler?: (entry: LogEntry) => void;
  /** When false, nothing is emitted. Defaults to true. */
  enabled?: boolean;
}

function formatLine(entry: LogEntry): string {
  const {level, message, context, data} = entry;
  const time = new Date(entry.timestamp).toISOString();
  const tag = context === undefined ? '' : ` (${context})`;
  const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  return `${time} ${level}${tag}: ${message}${suffix}`;
}

function writeToConsole(entry: LogEntry): void {
  const line = formatLine(entry);
  if (entry.level === 'error' && entry.error !== undefined) {
    console.error(line, entry.error);
  } else {
    console[entry.level](line);
  }
}

class LevelLogger implements Logger {
  readonly #threshold: number;
  readonly #context: string | undefined;
  readonly #handler: (entry: LogEntry) => void;

  constructor(
    threshold: number,
    context: string | undefined,
    handler: (entry: LogEntry) => void,
  ) {
    this.#threshold = threshold;
    this.#context = context;
    this.#handler = handler;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.#emit('debug', message, data, undefined);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.#emit('info', message, data, undefined);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.#emit('warn', message, data, undefined);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.#emit('error', message, data, error);
  }

  #emit(
    level: LogLevel,
    message: string,
    data: Record<string, unknown> | undefined,
    error: unknown,
  ): void {
    if (LEVELS.indexOf(level) < this.#threshold) {
      return;
    }
    this.#handler({
      level,
      message,
      timestamp: Date.now(),
      ...(this.#context === undefined ? {} : {context: this.#context}),
      ...(data === undefined ? {} : {data}),
      ...(error === undefined ? {} : {error}),
    });
  }
}

/**
 * A logger that drops everything.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(options: LoggerOptions = {}): Logger {
  if (options.enabled === false) {
    return noopLogger;
  }
  return new LevelLogger(
    LEVELS.indexOf(options.level ?? 'info'),
    options.context,
    options.handler ?? writeToConsole,
  );
}
