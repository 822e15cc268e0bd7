/**
 * Structured Logger
 *
 * Provides structured JSON logging with:
 * - Automatic telemetry context injection
 * - Secret/token redaction
 * - Consistent field names
 *
 * @module @flowgraph/core/telemetry/logger
 */

import { getCurrentContext, type TelemetryContext, type Severity } from './context.js';

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print (for development) */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
}

/**
 * Default redaction patterns for sensitive data
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

/**
 * Severity level ordering (higher = more severe)
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
};

export const SEVERITIES = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'] as const satisfies readonly Severity[];

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  // Trace correlation
  traceId?: string;
  spanId?: string;

  // Context fields
  workflow?: string;
  executionId?: string;
  requestId?: string;

  // Error details
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured logger with telemetry context integration
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('ERROR', message, { ...data, ...errorData });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('CRITICAL', message, { ...data, ...errorData });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log request end
   */
  requestEnd(
    method: string,
    path: string,
    status: number,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = status >= 500 ? 'ERROR' : status >= 400 ? 'WARNING' : 'INFO';
    this.log(severity, `${method} ${path} ${status} ${durationMs}ms`, {
      eventName: 'request.end',
      httpMethod: method,
      httpPath: path,
      httpStatus: status,
      durationMs,
      ...data,
    });
  }

  /**
   * Log workflow execution end
   */
  executionEnd(
    workflow: string,
    success: boolean,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = success ? 'INFO' : 'ERROR';
    this.log(severity, `Workflow ${success ? 'completed' : 'failed'}`, {
      eventName: success ? 'workflow.success' : 'workflow.failure',
      workflow,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  isEnabled(severity: Severity): boolean {
    return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[this.config.minSeverity];
  }

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(severity)) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, getCurrentContext(), data);
    this.output(this.redact(entry));
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    ctx: TelemetryContext | undefined,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,
      ...this.config.defaultFields,
    };

    if (ctx) {
      entry.traceId = ctx.traceId;
      entry.spanId = ctx.spanId;
      if (ctx.workflow) entry.workflow = ctx.workflow;
      if (ctx.executionId) entry.executionId = ctx.executionId;
      if (ctx.requestId) entry.requestId = ctx.requestId;
    }

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: unknown): Record<string, unknown> {
    if (!error) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          stack: error.stack,
          code,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }

  private redact(entry: LogEntry): LogEntry {
    let redacted = JSON.stringify(entry);

    for (const pattern of this.redactionPatterns) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }

    return JSON.parse(redacted);
  }

  private output(entry: LogEntry): void {
    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    switch (entry.severity) {
      case 'ERROR':
      case 'CRITICAL':
        console.error(output);
        break;
      case 'WARNING':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: Logger | null = null;

function isSeverity(value: string | undefined): value is Severity {
  return value !== undefined && Object.hasOwn(SEVERITY_ORDER, value);
}

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const level = process.env.LOG_LEVEL;
    defaultLogger = new Logger({
      serviceName: process.env.APP_NAME || 'flowgraph',
      minSeverity: isSeverity(level) ? level : 'INFO',
      prettyPrint: process.env.NODE_ENV === 'development',
    });
  }
  return defaultLogger;
}

/**
 * Set a custom default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}

/**
 * Create a logger for a specific service
 */
export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    serviceName,
    ...config,
  });
}
