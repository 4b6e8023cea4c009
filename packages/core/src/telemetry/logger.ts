/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Automatic run context injection (runId, documentId)
 * - Severity threshold from LOG_LEVEL
 * - Consistent field names for scoring diagnostics
 *
 * @module @scorecard/core/telemetry/logger
 */

import { getCurrentContext, type RunContext, type Severity } from './context.js';

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
}

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

function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}

/**
 * Parse a severity name (case-insensitive, `WARN` accepted)
 */
export function parseSeverity(value: string | undefined): Severity | undefined {
  if (!value) return undefined;
  const upper = value.trim().toUpperCase();
  if (upper === 'WARN') return 'WARNING';
  return isSeverity(upper) ? upper : undefined;
}

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  // Required fields
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  // Context fields
  runId?: string;
  documentId?: string;
  documentOrigin?: string;
  eventName?: string;

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
 * Structured logger with run context integration
 */
export class Logger {
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
    };
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

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('ERROR', message, { ...data, ...errorData });
  }

  critical(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    const errorData = this.formatError(error);
    this.log('CRITICAL', message, { ...data, ...errorData });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log one criterion outcome for the current document
   */
  criterionScored(
    criterionId: string,
    score: number,
    weight: number,
    data?: Record<string, unknown>
  ): void {
    this.debug('Criterion scored', {
      eventName: 'criterion.scored',
      criterionId,
      score,
      weight,
      ...data,
    });
  }

  /**
   * Log a skipped input document
   */
  documentSkipped(origin: string, reason: string, data?: Record<string, unknown>): void {
    this.warn('Document skipped', {
      eventName: 'document.skipped',
      origin,
      reason,
      ...data,
    });
  }

  /**
   * Log run start
   */
  runStart(documentCount: number, data?: Record<string, unknown>): void {
    this.info('Scoring run started', {
      eventName: 'run.start',
      documentCount,
      ...data,
    });
  }

  /**
   * Log run end
   */
  runEnd(
    scored: number,
    skipped: number,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = skipped > 0 ? 'NOTICE' : 'INFO';
    this.log(severity, 'Scoring run completed', {
      eventName: 'run.end',
      documentsScored: scored,
      documentsSkipped: skipped,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    // Check minimum severity
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, getCurrentContext(), data);
    this.output(entry);
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    ctx: RunContext | undefined,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,

      // Default fields
      ...this.config.defaultFields,
    };

    if (ctx) {
      entry.runId = ctx.runId;
      if (ctx.documentId) entry.documentId = ctx.documentId;
      if (ctx.documentOrigin) entry.documentOrigin = ctx.documentOrigin;
    }

    // Merge additional data
    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: Error | unknown): Record<string, unknown> {
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

  private output(entry: LogEntry): void {
    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    // Use appropriate console method based on severity
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

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({
      serviceName: process.env.APP_NAME || 'scorecard',
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
