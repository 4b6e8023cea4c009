/**
 * Run Module
 *
 * @module @scorecard/core/run
 */

export {
  DOCUMENT_EXTENSION,
  REPORT_EXTENSION,
  ReportNameRegistry,
  discoverDocumentFiles,
  fallbackDocumentId,
  loadDocumentFile,
  reportFileName,
} from './documents.js';

export {
  SCORES_CSV_FILE,
  SUMMARY_FILE,
  runScoring,
  type RunScoringOptions,
  type SkippedDocument,
  type RunOutputs,
  type RunSummary,
} from './runner.js';
