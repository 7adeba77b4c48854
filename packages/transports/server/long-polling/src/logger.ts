// =============================================================================
// Logger Interface - Structured, Library Agnostic
// =============================================================================

/**
 * Structured metadata for log entries.
 * Known fields are typed; anything else goes through the index signature.
 */
export interface LogContext {
  /** Connection the entry relates to */
  connectionId?: string;
  /** Component or module name */
  component?: string;
  /** Operation being performed */
  operation?: string;
  /** URL path of the request */
  path?: string;
  /** HTTP status code */
  statusCode?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Additional metadata */
  [key: string]: string | number | boolean | null | undefined;
}

/**
 * Error context for structured error logging.
 */
export interface ErrorContext extends LogContext {
  /** Error code for categorization */
  errorCode?: string;
  /** Whether the request path can continue after this error */
  recoverable?: boolean;
}

/**
 * Logger used by the transport and its collaborators.
 *
 * Adapt any logging library (Winston, Pino, Bunyan, ...) to this interface.
 *
 * @example
 * ```typescript
 * const logger: Logger = {
 *   debug: (message, context) => pino.debug(context, message),
 *   info: (message, context) => pino.info(context, message),
 *   warn: (message, context) => pino.warn(context, message),
 *   error: (message, error, context) => pino.error({ ...context, err: error }, message)
 * };
 * ```
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: ErrorContext): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/**
 * No-op logger implementation that discards all log messages.
 * This is the default when no logger is supplied.
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  error(_message: string, _error?: Error, _context?: ErrorContext): void {
    // No-op
  }
}

/**
 * Console-based logger with a minimum level.
 */
export class ConsoleLogger implements Logger {
  private readonly min: number;

  constructor(
    level: LogLevel = "info",
    private readonly prefix = "[pushline]"
  ) {
    this.min = levelOrder[level];
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled("debug")) return;
    console.debug(`${this.prefix} [DEBUG] ${message}`, context ?? "");
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled("info")) return;
    console.info(`${this.prefix} [INFO] ${message}`, context ?? "");
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled("warn")) return;
    console.warn(`${this.prefix} [WARN] ${message}`, context ?? "");
  }

  error(message: string, error?: Error, context?: ErrorContext): void {
    if (!this.enabled("error")) return;
    console.error(`${this.prefix} [ERROR] ${message}`, error, context ?? "");
  }

  private enabled(level: LogLevel): boolean {
    return levelOrder[level] >= this.min;
  }
}

/**
 * Normalizes an unknown thrown value into an Error for logging.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
