/**
 * Reports Module
 *
 * @module @scorecard/core/reports
 */

export {
  DEFAULT_MAX_POINTERS,
  renderDocumentReport,
  renderSummary,
  type DocumentReportOptions,
  type SummaryReportInput,
} from './markdown.js';

export {
  DOCUMENT_ID_COLUMN,
  TOTAL_SCORE_COLUMN,
  escapeCsvField,
  csvColumns,
  renderScoresCsv,
} from './csv.js';
