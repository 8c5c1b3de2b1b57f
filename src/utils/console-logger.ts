/**
 * Console Logger - Default logger for the conversion pipeline and CLI.
 *
 * Level-filtered, prefixed output. The level usually comes from
 * `.quizmarkrc.yml` or `QUIZMARK_LOG_LEVEL`; the CLI points the sink at
 * stderr so converted output on stdout stays clean.
 *
 * @packageDocumentation
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Minimal logging contract accepted throughout the library
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/** The console methods a logger writes through */
export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SINK_METHODS: Record<LogLevel, keyof LogSink> = {
  debug: 'debug',
  info: 'log',
  warn: 'warn',
  error: 'error',
};

export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    level: LogLevel = 'info',
    private readonly sink: LogSink = console
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context ? [context] : []);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context ? [context] : []);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context ? [context] : []);
  }

  /** The cause comes before the context, each only when given */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const details: unknown[] = [];
    if (error !== undefined) details.push(error);
    if (context) details.push(context);
    this.write('error', message, details);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return;
    this.sink[SINK_METHODS[level]](`[${this.prefix}] ${message}`, ...details);
  }
}
