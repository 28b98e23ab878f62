import type { ILogger, LogContext, LogLevel } from './logger-interface';

const LEVEL_PRIORITIES: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
  SILENT: 6,
};

const COLOR_MAP: Record<LogLevel, string> = {
  TRACE: '\x1b[37m',
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
  SILENT: '\x1b[0m',
};

const RESET = '\x1b[0m';

export function isValidLogLevel(level: string): level is LogLevel {
  return level in LEVEL_PRIORITIES;
}

class LoggerImpl implements ILogger {
  private level: LogLevel;

  constructor() {
    this.level = this.getLogLevel();
  }

  private getLogLevel(): LogLevel {
    // Convert to uppercase to support both 'debug' and 'DEBUG' in the environment
    const logLevel = process.env.LOG_LEVEL?.toUpperCase();

    if (logLevel && isValidLogLevel(logLevel)) {
      return logLevel;
    }

    switch (process.env.NODE_ENV) {
      case 'test':
        return 'SILENT';
      case 'production':
        return 'WARN';
      default:
        return 'INFO';
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const fields = Object.fromEntries(Object.entries(context ?? {}).filter(([, value]) => value !== undefined));

    if (process.env.NODE_ENV === 'production') {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...fields,
      });
    }

    const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';

    return `${COLOR_MAP[level]}[${level}]${RESET} ${message}${suffix}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, context);

    // stdout is reserved for command output such as `status --json`
    if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.error(formattedMessage);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  trace(message: string, context?: LogContext): void {
    this.log('TRACE', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log('FATAL', message, context);
  }
}

export const logger = new LoggerImpl();
export default logger;

/**
 * Minimal logger accepted by clients and the sync orchestrator
 */
export interface Logger {
  trace(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  fatal(message: string, data?: unknown): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn arbitrary log data into a structured context
 */
export function toLogContext(data: unknown): LogContext | undefined {
  if (data === undefined) return undefined;
  if (data instanceof Error) return { error: data.message };
  if (isRecord(data)) return { ...data };
  return { data };
}

export class ConsoleLogger implements Logger {
  trace(message: string, data?: unknown): void {
    logger.trace(message, toLogContext(data));
  }
  debug(message: string, data?: unknown): void {
    logger.debug(message, toLogContext(data));
  }
  info(message: string, data?: unknown): void {
    logger.info(message, toLogContext(data));
  }
  warn(message: string, data?: unknown): void {
    logger.warn(message, toLogContext(data));
  }
  error(message: string, data?: unknown): void {
    logger.error(message, toLogContext(data));
  }
  fatal(message: string, data?: unknown): void {
    logger.fatal(message, toLogContext(data));
  }
}

export class SilentLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}
}

export function createDefaultLogger(): Logger {
  return new ConsoleLogger();
}
