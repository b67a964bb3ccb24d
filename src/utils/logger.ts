/**
 * Console-based logging utility with environment-aware formatting.
 * - Development (NODE_ENV !== 'production'): Pretty, colored output
 * - Production: JSON structured output
 */

// ANSI color codes for terminal output
const colors = {
  dim: '\u001B[2m',
  gray: '\u001B[90m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
  cyan: '\u001B[36m',
  yellow: '\u001B[33m',
} as const;

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'error' | 'info' | 'warn';

export type LogFormat = 'json' | 'pretty';

/**
 * Destination for formatted log lines. Defaults to the console stream matching the level.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  correlationId?: string;
  format?: LogFormat;
  level?: LogLevel;
  sink?: LogSink;
}

export interface TimerResult {
  end: (level: LogLevel, message: string, context?: LogContext) => void;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  correlationId?: string;
  durationMs?: number;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
}

// Log level priority for filtering
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  error: 3,
  info: 1,
  warn: 2,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error': {
      console.error(line);
      break;
    }
    case 'warn': {
      console.warn(line);
      break;
    }
    default: {
      console.log(line);
    }
  }
};

export class Logger {
  private readonly correlationId?: string;
  private readonly format: LogFormat;
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.LOG_LEVEL;
    this.correlationId = options.correlationId;
    this.format = options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
    this.minLevel = options.level ?? (isLogLevel(envLevel) ? envLevel : 'debug');
    this.sink = options.sink ?? consoleSink;
  }

  /**
   * Create a child logger with a bound correlation ID.
   * Format, level and sink are inherited.
   */
  child(correlationId: string): Logger {
    return new Logger({
      correlationId,
      format: this.format,
      level: this.minLevel,
      sink: this.sink,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  /**
   * Start a timer for measuring operation duration.
   * Returns an object with an `end` method to log the completion.
   */
  startTimer(operation: string): TimerResult {
    const startTime = Date.now();
    this.debug(`Starting: ${operation}`);

    return {
      end: (level: LogLevel, message: string, context?: LogContext) => {
        const durationMs = Date.now() - startTime;
        this.log(level, message, context, undefined, durationMs);
      },
    };
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  private formatError(error: unknown): LogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    const message =
      typeof error === 'object' && 'message' in error ? String(error.message) : JSON.stringify(error);
    return {
      message,
      name: 'UnknownError',
    };
  }

  private formatPretty(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: colors.gray,
      error: colors.red,
      info: colors.cyan,
      warn: colors.yellow,
    };

    const color = levelColors[entry.level];
    const timestamp = `${colors.dim}${entry.timestamp}${colors.reset}`;
    const level = `${color}${entry.level.toUpperCase().padEnd(5)}${colors.reset}`;
    const correlationId = entry.correlationId
      ? `${colors.dim}[${entry.correlationId}]${colors.reset} `
      : '';
    const duration =
      entry.durationMs === undefined
        ? ''
        : ` ${colors.dim}(${String(entry.durationMs)}ms)${colors.reset}`;

    let output = `${timestamp} ${level} ${correlationId}${entry.message}${duration}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  ${colors.dim}${JSON.stringify(entry.context)}${colors.reset}`;
    }

    if (entry.error) {
      output += `\n  ${colors.red}${entry.error.name}: ${entry.error.message}${colors.reset}`;
      if (entry.error.stack) {
        output += `\n${colors.dim}${entry.error.stack}${colors.reset}`;
      }
    }

    return output;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      context,
      correlationId: this.correlationId,
      durationMs,
      error: this.formatError(error),
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    this.sink(level, this.format === 'json' ? JSON.stringify(entry) : this.formatPretty(entry));
  }
}

// Export singleton instance for general use (non-request contexts)
export const logger = new Logger();
