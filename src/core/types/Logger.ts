import { VettedError } from './Errors';

export type LogContext = Record<string, unknown>;

/**
 * Logger interface for flexible logging integration
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Silent logger implementation (no-op)
 */
export class SilentLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {}
  info(_message: string, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: Error, _context?: LogContext): void {}
}

/**
 * Logger that adds a fixed context to every entry before passing it on.
 * Keys given at the call site win over the bound ones.
 */
export class ContextLogger implements Logger {
  constructor(
    private readonly target: Logger,
    private readonly bound: LogContext
  ) {}

  private merge(context?: LogContext): LogContext {
    return { ...this.bound, ...context };
  }

  debug(message: string, context?: LogContext): void {
    this.target.debug(message, this.merge(context));
  }

  info(message: string, context?: LogContext): void {
    this.target.info(message, this.merge(context));
  }

  warn(message: string, context?: LogContext): void {
    this.target.warn(message, this.merge(context));
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.target.error(message, error, this.merge(context));
  }
}

/**
 * Bind context to a logger, e.g. the schema or operation a log entry belongs to
 */
export const withContext = (logger: Logger, context: LogContext): Logger =>
  logger instanceof SilentLogger ? logger : new ContextLogger(logger, context);

/**
 * Console logger implementation
 *
 * Lines read `[LEVEL] message {context}`. A vetted error adds its code, and
 * its details join the context, so a logged ValidationError shows its schema
 * and failure count.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private formatContext(context?: LogContext): string {
    return context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.debug(`[DEBUG] ${message}${this.formatContext(context)}`);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      console.info(`[INFO] ${message}${this.formatContext(context)}`);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(`[WARN] ${message}${this.formatContext(context)}`);
    }
  }

  error(message: string, error?: Error, context?: LogContext): void {
    if (!this.shouldLog('error')) {
      return;
    }

    let errorInfo = error ? ` - ${error.message}` : '';
    let fullContext = context;
    if (error instanceof VettedError) {
      errorInfo += ` [${error.code}]`;
      fullContext = { ...error.details, ...context };
    }

    console.error(`[ERROR] ${message}${errorInfo}${this.formatContext(fullContext)}`);
    if (error?.stack) {
      console.error(error.stack);
    }
  }
}
