/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Automatic telemetry context injection (run, pipeline, environment, step)
 * - Secret/token redaction
 * - Consistent field names
 *
 * Log lines go to stderr so that they never interleave with the CLI's
 * machine-readable stdout.
 *
 * @module @pipewright/core/telemetry/logger
 */

import { getCurrentContext, parseSeverity, type TelemetryContext, type Severity } from './context.js';

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
  /** Line writer (defaults to stderr) */
  write?: (line: string) => void;
}

/**
 * Default redaction patterns for sensitive data
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /ghp_[a-zA-Z0-9]{36}/g,            // GitHub personal access tokens
  /gho_[a-zA-Z0-9]{36}/g,            // GitHub OAuth tokens
  /github_pat_[a-zA-Z0-9_]{22,}/g,   // GitHub fine-grained PATs
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi, // Bearer tokens
  /Authorization:\s*[^\s,;"]+/gi,     // Authorization headers

  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,

  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

/**
 * Field names whose values are always redacted
 */
const SECRET_KEY_PATTERN = /^(password|secret|token|api[_-]?key|authorization|webhookSecret)$/i;

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

  // Context fields
  runId?: string;
  pipeline?: string;
  environment?: string;
  stepName?: string;

  // Error details
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };

  // Additional data
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
      write: config.write ?? ((line: string) => process.stderr.write(`${line}\n`)),
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  get minSeverity(): Severity {
    return this.config.minSeverity;
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

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, { ...data, ...this.formatError(error) });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('CRITICAL', message, { ...data, ...this.formatError(error) });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log step start
   */
  stepStart(stepName: string, attempt: number, data?: Record<string, unknown>): void {
    this.debug('Step started', {
      eventName: 'step.start',
      stepName,
      attempt,
      ...data,
    });
  }

  /**
   * Log step end
   */
  stepEnd(
    stepName: string,
    status: string,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity =
      status === 'failed_fatal' ? 'ERROR' : status === 'failed_recoverable' ? 'WARNING' : 'INFO';
    this.log(severity, `Step ${status}`, {
      eventName: `step.${status}`,
      stepName,
      durationMs,
      ...data,
    });
  }

  /**
   * Log an external call (VCS host, cluster API, IaC tool)
   */
  externalCall(
    service: string,
    operation: string,
    durationMs: number,
    success: boolean,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = success ? 'DEBUG' : 'WARNING';
    this.log(severity, `External call ${success ? 'succeeded' : 'failed'}`, {
      eventName: success ? 'external.success' : 'external.failure',
      service,
      operation,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  /**
   * Whether entries at this severity are written
   */
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
      if (ctx.runId) entry.runId = ctx.runId;
      if (ctx.pipeline) entry.pipeline = ctx.pipeline;
      if (ctx.environment) entry.environment = ctx.environment;
      if (ctx.stepName) entry.stepName = ctx.stepName;
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

  private redact(entry: LogEntry): string {
    const redacted = this.redactValue(entry);
    return this.config.prettyPrint ? JSON.stringify(redacted, null, 2) : JSON.stringify(redacted);
  }

  private redactValue(value: unknown, key?: string): unknown {
    if (key && SECRET_KEY_PATTERN.test(key) && value !== undefined && value !== null) {
      return '[REDACTED]';
    }
    if (typeof value === 'string') {
      let out = value;
      for (const pattern of this.redactionPatterns) {
        out = out.replace(pattern, '[REDACTED]');
      }
      return out;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item));
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (typeof value === 'object' && value !== null) {
      const result: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) {
        result[k] = this.redactValue(v, k);
      }
      return result;
    }
    return value;
  }

  private output(line: string): void {
    this.config.write(line);
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields, optionally at
   * another minimum severity
   */
  child(additionalFields: Record<string, unknown>, options: { minSeverity?: Severity } = {}): Logger {
    return new Logger({
      ...this.config,
      minSeverity: options.minSeverity ?? this.config.minSeverity,
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

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({
      serviceName: process.env.APP_NAME || 'pipewright',
      minSeverity: parseSeverity(process.env.LOG_LEVEL) ?? 'INFO',
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
