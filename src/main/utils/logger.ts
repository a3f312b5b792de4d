/**
 * Structured Logger
 *
 * JSON-per-line logging with severity levels and secret redaction.
 * Modules create a scoped logger once at load time:
 *
 * ```typescript
 * const log = createLogger('card-cache-dal');
 * log.info('Card cached', { cardId });
 * ```
 *
 * @module main/utils/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Service or module name */
  service?: string;
  /** Additional structured data */
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  version: string;
  context?: Record<string, unknown>;
}

/**
 * Minimal logging surface shared by the root logger and scoped loggers
 */
export interface ScopedLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

// ============================================================================
// Constants
// ============================================================================

const SERVICE_NAME = 'lunchcard-sync';
const SERVICE_VERSION = process.env.npm_package_version ?? '1.0.0';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Patterns redacted from messages and string values
 */
const SECRET_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /Bearer\s+[a-zA-Z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /api[_-]?key["\s:=]+[a-zA-Z0-9\-_.]+/gi, replacement: 'apiKey: "[REDACTED]"' },
  { pattern: /password["\s:=]+[^\s",}]+/gi, replacement: 'password: "[REDACTED]"' },
  { pattern: /token["\s:=]+[a-zA-Z0-9\-_.]+/gi, replacement: 'token: "[REDACTED]"' },
];

/**
 * Context keys whose values are never written.
 * Card cipher keys count as secrets: they de-obfuscate the on-card balance.
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'apikey',
  'api_key',
  'secret',
  'token',
  'authorization',
  'credentials',
  'cardxorkey',
  'cipherkey',
  'keya',
]);

const MAX_DEPTH = 10;

// ============================================================================
// Logger Class
// ============================================================================

class Logger implements ScopedLogger {
  private minLevel: LogLevel;

  constructor() {
    this.minLevel = process.env.NODE_ENV === 'development' ? 'debug' : 'info';
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  private redactString(str: string): string {
    let result = str;
    for (const { pattern, replacement } of SECRET_PATTERNS) {
      result = result.replace(pattern, replacement);
    }
    return result;
  }

  private redactObject(obj: unknown, depth: number = 0): unknown {
    if (depth > MAX_DEPTH) return '[MAX_DEPTH_EXCEEDED]';

    if (obj === null || obj === undefined) {
      return obj;
    }

    if (typeof obj === 'string') {
      return this.redactString(obj);
    }

    if (typeof obj === 'number' || typeof obj === 'boolean') {
      return obj;
    }

    if (typeof obj === 'bigint') {
      return obj.toString();
    }

    if (obj instanceof Date) {
      return obj.toISOString();
    }

    if (obj instanceof Error) {
      return {
        name: obj.name,
        message: this.redactString(obj.message),
        stack: obj.stack ? this.redactString(obj.stack) : undefined,
      };
    }

    if (Buffer.isBuffer(obj)) {
      return `[Buffer ${obj.length} bytes]`;
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.redactObject(item, depth + 1));
    }

    if (typeof obj === 'object') {
      return this.redactRecord(obj, depth);
    }

    return '[UNKNOWN_TYPE]';
  }

  private redactRecord(obj: object, depth: number = 0): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase())
        ? '[REDACTED]'
        : this.redactObject(value, depth + 1);
    }
    return result;
  }

  /**
   * Build the entry that would be written, or null when filtered by level
   */
  format(level: LogLevel, message: string, context?: LogContext): LogEntry | null {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return null;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactString(message),
      service: context?.service ?? SERVICE_NAME,
      version: SERVICE_VERSION,
    };

    if (context) {
      const { service: _service, ...rest } = context;
      if (Object.keys(rest).length > 0) {
        entry.context = this.redactRecord(rest);
      }
    }

    return entry;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const entry = this.format(level, message, context);
    if (!entry) return;

    const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
    if (stream.destroyed || !stream.writable) return;

    // Write errors (EPIPE on a closed pipe) arrive on the callback; logging must not throw
    stream.write(JSON.stringify(entry) + '\n', () => undefined);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  child(defaultContext: LogContext): ScopedLogger {
    return new ChildLogger(this, defaultContext);
  }
}

/**
 * Child logger with preset context
 */
class ChildLogger implements ScopedLogger {
  constructor(
    private readonly parent: Logger,
    private readonly defaultContext: LogContext
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaultContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaultContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaultContext, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaultContext, ...context });
  }
}

// ============================================================================
// Exports
// ============================================================================

/**
 * Root logger shared by every module
 */
export const logger = new Logger();

/**
 * Create a logger scoped to one module
 */
export function createLogger(service: string): ScopedLogger {
  return logger.child({ service });
}

/**
 * Normalise an unknown thrown value into a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export default logger;
