/**
 * Reliability Module
 *
 * Error taxonomy for scoring runs.
 *
 * @module @scorecard/core/reliability
 */

export {
  type ScorecardErrorCode,
  type ScorecardErrorOptions,
  ScorecardError,
  PolicyInvalidError,
  DocumentUnreadableError,
  NoInputsError,
  ConfigurationError,
  OutputWriteError,
  toExitCode,
  toDiagnostic,
} from './errors.js';
