/**
 * Structured logging
 *
 * One JSON object per line on stdout so log shippers can index fields.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * Logger contract used throughout the core package
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (normalized === 'DEBUG' || normalized === 'INFO' || normalized === 'WARN' || normalized === 'ERROR') {
    return normalized;
  }
  return 'INFO';
}

export interface StructuredLoggerOptions {
  level?: LogLevel;
  /** Receives each serialised line; defaults to console.log */
  sink?: (line: string) => void;
}

/**
 * JSON line logger with bound context fields
 */
export class StructuredLogger implements Logger {
  protected bindings: Record<string, unknown>;
  private level: LogLevel;
  private sink: (line: string) => void;

  constructor(bindings: Record<string, unknown> = {}, options?: StructuredLoggerOptions) {
    this.bindings = { ...bindings };
    this.level = options?.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.sink = options?.sink ?? ((line) => console.log(line));
  }

  /**
   * Logger sharing this one's level and sink with extra bound fields
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger(
      { ...this.bindings, ...bindings },
      { level: this.level, sink: this.sink }
    );
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('ERROR', message, {
      ...data,
      error: error?.message,
      stack: error?.stack,
    });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) {
      return;
    }

    this.sink(
      JSON.stringify({
        level,
        message,
        ...this.bindings,
        ...data,
        timestamp: new Date().toISOString(),
      })
    );
  }
}

/**
 * Normalise a caught value into an Error for logging
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
