/**
 * Structured logging for Cosmos DB operations
 *
 * Lines read `[timestamp] [LEVEL] [prefix] message {context}`. Every
 * transport call a handle makes ends in exactly one of
 * {@link logOperation}, {@link logFailure} or {@link logCancellation}.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

/** Most severe first */
export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

type ConsoleMethod = 'error' | 'warn' | 'log' | 'debug';

const CONSOLE_METHOD: Record<LogLevel, ConsoleMethod> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  trace: 'debug',
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly prefix: string;

  constructor(minLevel: LogLevel = 'info', prefix = 'cosmos') {
    this.threshold = LOG_LEVELS.indexOf(minLevel);
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= this.threshold;
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const fields = context ? ` ${JSON.stringify(context)}` : '';
    console[CONSOLE_METHOD[level]](
      `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.prefix}] ${message}${fields}`
    );
  }
}

function discard(_message: string, _context?: LogContext): void {
  // No-op
}

/**
 * Logger that discards everything
 */
export class NoopLogger implements Logger {
  readonly error = discard;
  readonly warn = discard;
  readonly info = discard;
  readonly debug = discard;
  readonly trace = discard;
}

// ============================================================================
// Operation Outcomes
// ============================================================================

/**
 * Failure details worth logging; matches translated errors without importing
 * the error module.
 */
export interface LoggableFailure {
  name: string;
  message: string;
  kind?: string;
  statusCode?: number;
  activityId?: string;
}

export function logOperation(
  logger: Logger,
  operation: string,
  resource: string,
  durationMs: number
): void {
  logger.debug('Cosmos operation completed', { operation, resource, durationMs });
}

/**
 * Logs a failed operation with its translated kind and, for service
 * responses, the status and activity id.
 */
export function logFailure(
  logger: Logger,
  operation: string,
  resource: string,
  error: LoggableFailure
): void {
  logger.error('Cosmos operation failed', {
    operation,
    resource,
    errorName: error.name,
    errorKind: error.kind,
    errorMessage: error.message,
    statusCode: error.statusCode,
    activityId: error.activityId,
  });
}

/**
 * Logs an operation that failed after its caller cancelled it.
 */
export function logCancellation(logger: Logger, operation: string, resource: string): void {
  logger.debug('Cosmos operation cancelled', { operation, resource });
}
