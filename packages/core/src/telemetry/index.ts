/**
 * Telemetry Module
 *
 * - AsyncLocalStorage-based run context propagation
 * - Structured JSON logging
 *
 * @module @scorecard/core/telemetry
 */

// =============================================================================
// Context Management
// =============================================================================

export {
  type RunSource,
  type Severity,
  type RunContext,
  getCurrentContext,
  runWithContext,
  generateRunId,
  createRunContext,
  createDocumentContext,
} from './context.js';

// =============================================================================
// Structured Logging
// =============================================================================

export {
  type LoggerConfig,
  type LogEntry,
  Logger,
  parseSeverity,
  getLogger,
  setLogger,
  createLogger,
} from './logger.js';
