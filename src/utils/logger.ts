/**
 * Structured Logger Utility
 *
 * Structured JSON logging with secret redaction. Access and refresh tokens
 * pass through the auth path, so every message and context object is
 * scrubbed before it is written.
 *
 * @module utils/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Unique request/operation ID for tracing */
  traceId?: string;
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
 * Minimal logging surface shared by the root logger and child loggers
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

// ============================================================================
// Secret Redaction Patterns
// ============================================================================

const SECRET_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /Bearer\s+[a-zA-Z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /refresh[_-]?token["\s:=]+[a-zA-Z0-9\-_.]+/gi, replacement: 'refreshToken: "[REDACTED]"' },
  { pattern: /access[_-]?token["\s:=]+[a-zA-Z0-9\-_.]+/gi, replacement: 'accessToken: "[REDACTED]"' },
  { pattern: /api[_-]?key["\s:=]+[a-zA-Z0-9\-_.]+/gi, replacement: 'apiKey: "[REDACTED]"' },
  { pattern: /password["\s:=]+[^\s",}]+/gi, replacement: 'password: "[REDACTED]"' },
  { pattern: /Authorization["\s:=]+[^\s",}]+/gi, replacement: 'Authorization: "[REDACTED]"' },
];

/**
 * Keys to redact from context objects (compared lower-cased)
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'apikey',
  'api_key',
  'secret',
  'token',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'authorization',
  'auth',
  'credential',
  'credentials',
]);

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function defaultLevel(): LogLevel {
  const fromEnv = process.env.VITALS_SYNC_LOG_LEVEL;
  if (fromEnv === 'debug' || fromEnv === 'info' || fromEnv === 'warn' || fromEnv === 'error') {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

// ============================================================================
// Logger Class
// ============================================================================

class Logger implements StructuredLogger {
  private readonly serviceName: string;
  private readonly version: string;
  private minLevel: LogLevel;

  constructor(serviceName: string = 'vitals-sync') {
    this.serviceName = serviceName;
    this.version = process.env.npm_package_version || '0.0.0';
    this.minLevel = defaultLevel();
  }

  /**
   * Set minimum log level
   */
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

  /**
   * Redact secrets from an object (deep clone)
   */
  redactObject(obj: unknown, depth: number = 0): unknown {
    if (depth > 10) return '[MAX_DEPTH_EXCEEDED]';

    if (obj === null || obj === undefined) {
      return obj;
    }

    if (typeof obj === 'string') {
      return this.redactString(obj);
    }

    if (typeof obj === 'number' || typeof obj === 'boolean') {
      return obj;
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

    if (Array.isArray(obj)) {
      return obj.map((item) => this.redactObject(item, depth + 1));
    }

    if (typeof obj === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        if (SENSITIVE_KEYS.has(key.toLowerCase())) {
          result[key] = '[REDACTED]';
        } else {
          result[key] = this.redactObject(value, depth + 1);
        }
      }
      return result;
    }

    return '[UNKNOWN_TYPE]';
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactString(message),
      service: context?.service || this.serviceName,
      version: this.version,
    };

    if (context) {
      const { service: _service, ...rest } = context;
      if (Object.keys(rest).length > 0) {
        const redacted = this.redactObject(rest);
        if (redacted !== null && typeof redacted === 'object' && !Array.isArray(redacted)) {
          entry.context = { ...redacted };
        }
      }
    }

    const output = JSON.stringify(entry) + '\n';

    // stream.write instead of console: console throws synchronously on EPIPE
    const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;
    if (stream && !stream.destroyed) {
      stream.write(output, () => {
        // Async write failures (EPIPE on a closed pipe) end here; nowhere left to log them
      });
    }
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

  /**
   * Create a child logger with additional context
   */
  child(defaultContext: LogContext): ChildLogger {
    return new ChildLogger(this, defaultContext);
  }
}

/**
 * Child logger with preset context
 */
class ChildLogger implements StructuredLogger {
  private parent: Logger;
  private defaultContext: LogContext;

  constructor(parent: Logger, defaultContext: LogContext) {
    this.parent = parent;
    this.defaultContext = defaultContext;
  }

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
// Singleton Export
// ============================================================================

export const logger = new Logger();

/**
 * Create a child logger for a specific service
 */
export function createLogger(service: string): ChildLogger {
  return logger.child({ service });
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
