/**
 * Terminal logger
 * Prefixed, levelled logging for the library and the command line.
 * Everything goes to stderr so stdout stays reserved for command output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export interface LogContext {
  [key: string]: unknown;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  green: '\x1b[32m',
} as const;

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogThreshold {
  return value in LEVEL_RANK;
}

let threshold: LogThreshold = readThreshold(process.env.LOG_LEVEL);

function readThreshold(raw: string | undefined): LogThreshold {
  const value = raw?.trim().toLowerCase() ?? '';
  return isThreshold(value) ? value : 'warn';
}

/**
 * Set the minimum level that is written. `silent` drops everything.
 */
export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

export class Logger {
  private prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';
    const contextStr = context ? `\n${JSON.stringify(context, null, 2)}` : '';

    let levelColor: string;
    let levelLabel: string;

    switch (level) {
      case 'debug':
        levelColor = colors.gray;
        levelLabel = 'DEBUG';
        break;
      case 'info':
        levelColor = colors.cyan;
        levelLabel = 'INFO';
        break;
      case 'warn':
        levelColor = colors.yellow;
        levelLabel = 'WARN';
        break;
      case 'error':
        levelColor = colors.red;
        levelLabel = 'ERROR';
        break;
    }

    return `${colors.gray}[${timestamp}]${colors.reset} ${levelColor}[${levelLabel}]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}${colors.green}${contextStr}${colors.reset}`;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    console.error(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    console.error(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    console.error(this.formatMessage('warn', message, context));
  }

  private formatError(error: Error | unknown): string {
    if (!(error instanceof Error)) {
      return `\n${colors.red}Error details:${colors.reset}\n${JSON.stringify(error, null, 2)}`;
    }

    let output = `\n${colors.red}${error.name}: ${error.message}${colors.reset}`;

    // Stack without its first line, which repeats the message
    if (error.stack) {
      const stackLines = error.stack.split('\n').slice(1);
      output += `\n${colors.gray}${stackLines.join('\n')}${colors.reset}`;
    }

    if ('cause' in error && error.cause) {
      output += `\n\n${colors.yellow}Caused by:${colors.reset}`;
      output += this.formatError(error.cause);
    }

    return output;
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;

    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';

    let output = `${colors.gray}[${timestamp}]${colors.reset} ${colors.red}[ERROR]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}`;

    // ExtendedError details are folded into the context block
    let mergedContext: LogContext = { ...context };
    if (
      error &&
      typeof error === 'object' &&
      'details' in error &&
      typeof error.details === 'object' &&
      error.details !== null
    ) {
      mergedContext = { ...mergedContext, ...error.details };
    }

    if (Object.keys(mergedContext).length > 0) {
      output += `\n${colors.green}Context:${colors.reset}\n${JSON.stringify(mergedContext, null, 2)}`;
    }

    if (error) {
      output += this.formatError(error);
    }

    console.error(output);
  }

  /**
   * Create a child logger with a specific prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger(childPrefix);
  }
}

// Default logger instance
export const logger = new Logger();

// Helper to create logger with specific prefix
export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}
