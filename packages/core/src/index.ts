/**
 * @scorecard/core - Evidence scorecard engine
 *
 * This module provides:
 * - Evidence: document and evidence-record normalization
 * - Rubric: weighted criteria, policy validation and loading
 * - Scoring: basic and extended strategies, aggregation, ranking
 * - Reports: per-document Markdown, run summary, scores CSV
 * - Run: configuration and the batch runner
 */

// Evidence exports
export * from './evidence/index.js';

// Rubric exports
export * from './rubric/index.js';

// Scoring exports
export * from './scoring/index.js';

// Report rendering exports
export * from './reports/index.js';

// Run configuration exports
export * from './config/index.js';

// Batch runner exports
export * from './run/index.js';

// Error taxonomy exports
export * from './reliability/index.js';

// Logging and run context exports
export * from './telemetry/index.js';
