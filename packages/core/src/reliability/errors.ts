/**
 * Error Taxonomy
 *
 * Standard error types for a scoring run, with clear semantics for
 * recovery and exit codes.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error maps to an exit code
 * - Every error can become a diagnostic record
 * - Recoverable errors are logged and the run continues; only NO_INPUTS
 *   and CONFIGURATION_ERROR end a run
 *
 * @module @scorecard/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard scorecard error codes
 */
export type ScorecardErrorCode =
  // Recoverable (substitute a default, skip, or keep going)
  | 'POLICY_INVALID'
  | 'DOCUMENT_UNREADABLE'
  | 'OVERRIDE_COERCION_FAILED'
  | 'OUTPUT_WRITE_FAILED'

  // Fatal for the run
  | 'NO_INPUTS'
  | 'CONFIGURATION_ERROR'

  // Anything thrown that is not a ScorecardError
  | 'UNHANDLED_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Scorecard error options
 */
export interface ScorecardErrorOptions {
  /** Error code */
  code: ScorecardErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base scorecard error class
 *
 * All scorecard errors extend this for consistent handling.
 */
export class ScorecardError extends Error {
  readonly code: ScorecardErrorCode;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;
  readonly timestamp: Date;

  constructor(message: string, options: ScorecardErrorOptions) {
    super(message);
    this.name = 'ScorecardError';
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Whether the run can continue after this error
   */
  get recoverable(): boolean {
    return isRecoverableCode(this.code);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * Policy invalid error - the external rubric was rejected
 */
export class PolicyInvalidError extends ScorecardError {
  readonly issues: string[];
  readonly source?: string;

  constructor(
    message: string,
    options?: {
      issues?: string[];
      source?: string;
      cause?: Error;
    }
  ) {
    super(message, {
      code: 'POLICY_INVALID',
      context: { source: options?.source, issues: options?.issues },
      cause: options?.cause,
    });
    this.name = 'PolicyInvalidError';
    this.issues = options?.issues ?? [];
    this.source = options?.source;
  }
}

/**
 * Document unreadable error - a document record could not be loaded
 */
export class DocumentUnreadableError extends ScorecardError {
  readonly origin: string;

  constructor(origin: string, reason: string, options?: { cause?: Error }) {
    super(`Cannot read document '${origin}': ${reason}`, {
      code: 'DOCUMENT_UNREADABLE',
      context: { origin },
      cause: options?.cause,
    });
    this.name = 'DocumentUnreadableError';
    this.origin = origin;
  }
}

/**
 * No inputs error - zero documents were discovered
 */
export class NoInputsError extends ScorecardError {
  readonly searchedDir: string;

  constructor(searchedDir: string) {
    super(`No JSON documents found in ${searchedDir}`, {
      code: 'NO_INPUTS',
      context: { searchedDir },
    });
    this.name = 'NoInputsError';
    this.searchedDir = searchedDir;
  }
}

/**
 * Configuration error - run configuration is unreadable or invalid
 */
export class ConfigurationError extends ScorecardError {
  readonly fieldErrors?: Record<string, string>;

  constructor(
    message: string,
    options?: {
      fieldErrors?: Record<string, string>;
      cause?: Error;
    }
  ) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      context: options?.fieldErrors ? { fieldErrors: options.fieldErrors } : undefined,
      cause: options?.cause,
    });
    this.name = 'ConfigurationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

/**
 * Output write error - a report, CSV or summary file could not be written
 */
export class OutputWriteError extends ScorecardError {
  readonly path: string;

  constructor(path: string, options?: { cause?: Error }) {
    super(`Failed to write '${path}'${options?.cause ? `: ${options.cause.message}` : ''}`, {
      code: 'OUTPUT_WRITE_FAILED',
      context: { path },
      cause: options?.cause,
    });
    this.name = 'OutputWriteError';
    this.path = path;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

function isRecoverableCode(code: ScorecardErrorCode): boolean {
  switch (code) {
    case 'POLICY_INVALID':
    case 'DOCUMENT_UNREADABLE':
    case 'OVERRIDE_COERCION_FAILED':
    case 'OUTPUT_WRITE_FAILED':
      return true;
    default:
      return false;
  }
}

/**
 * Map error to CLI exit code
 */
export function toExitCode(error: unknown): number {
  if (!(error instanceof ScorecardError)) {
    return 1; // Generic error
  }

  switch (error.code) {
    // Recoverable errors (10-19), only seen here when raised directly
    case 'POLICY_INVALID':
      return 10;
    case 'DOCUMENT_UNREADABLE':
      return 11;
    case 'OVERRIDE_COERCION_FAILED':
      return 12;
    case 'OUTPUT_WRITE_FAILED':
      return 13;

    // Fatal run errors (20-29)
    case 'NO_INPUTS':
      return 20;
    case 'CONFIGURATION_ERROR':
      return 21;

    default:
      return 1;
  }
}

/**
 * Convert error to diagnostic record format
 */
export function toDiagnostic(error: unknown, context?: Record<string, unknown>): {
  type: 'error';
  code: ScorecardErrorCode;
  message: string;
  recoverable: boolean;
  timestamp: string;
  context?: Record<string, unknown>;
} {
  if (error instanceof ScorecardError) {
    return {
      type: 'error',
      code: error.code,
      message: error.message,
      recoverable: error.recoverable,
      timestamp: error.timestamp.toISOString(),
      context: { ...error.context, ...context },
    };
  }

  return {
    type: 'error',
    code: 'UNHANDLED_ERROR',
    message: error instanceof Error ? error.message : String(error),
    recoverable: false,
    timestamp: new Date().toISOString(),
    context,
  };
}
