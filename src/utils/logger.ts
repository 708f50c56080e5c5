/**
 * Console-based logging utility with environment-aware formatting.
 * - Development (NODE_ENV !== 'production'): Pretty, colored output
 * - Production: JSON structured output, one line per entry
 */

// ANSI color codes for terminal output
const colors = {
  cyan: '\u001B[36m',
  dim: '\u001B[2m',
  gray: '\u001B[90m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
  yellow: '\u001B[33m',
} as const;

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'error' | 'info' | 'warn';

export interface LoggerOptions {
  correlationId?: string;
  json?: boolean;
  minLevel?: LogLevel;
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
    kind?: string;
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

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

export class Logger {
  private readonly correlationId?: string;
  private readonly json: boolean;
  private readonly minLevel: LogLevel;

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.LOG_LEVEL;
    this.correlationId = options.correlationId;
    this.json = options.json ?? process.env.NODE_ENV === 'production';
    this.minLevel = options.minLevel ?? (isLogLevel(envLevel) ? envLevel : 'info');
  }

  /**
   * Create a child logger bound to a correlation ID (a run or request ID).
   */
  child(correlationId: string): Logger {
    return new Logger({ correlationId, json: this.json, minLevel: this.minLevel });
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
      const kind = 'kind' in error && typeof error.kind === 'string' ? error.kind : undefined;
      return {
        kind,
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    // Handle non-Error objects safely
    const message =
      typeof error === 'object' && 'message' in error
        ? String(error.message)
        : JSON.stringify(error);
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

    const output = this.json ? JSON.stringify(entry) : this.formatPretty(entry);

    switch (level) {
      case 'error': {
        console.error(output);
        break;
      }
      case 'warn': {
        console.warn(output);
        break;
      }
      default: {
        console.log(output);
      }
    }
  }
}

/**
 * Generate a short unique ID for correlating log lines of one run or request.
 */
export function generateCorrelationId(prefix: string): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 8);
  return `${prefix}-${timestamp}-${random}`;
}

// Export singleton instance for general use (outside a run or request)
export const logger = new Logger();
