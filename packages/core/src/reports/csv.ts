/**
 * CSV rendering of score rows: one column per criterion, in rubric order.
 */

import type { Criterion } from '../rubric/schema.js';
import type { ScoreRow } from '../scoring/aggregator.js';

export const DOCUMENT_ID_COLUMN = 'paper_id';
export const TOTAL_SCORE_COLUMN = 'total_score';

/**
 * Escape CSV field value
 */
export function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Header columns for a rubric
 */
export function csvColumns(criteria: readonly Criterion[]): string[] {
  return [DOCUMENT_ID_COLUMN, ...criteria.map((criterion) => criterion.id), TOTAL_SCORE_COLUMN];
}

/**
 * Format score rows as CSV (header first, trailing newline)
 */
export function renderScoresCsv(
  rows: readonly ScoreRow[],
  criteria: readonly Criterion[]
): string {
  const lines: string[] = [];

  lines.push(csvColumns(criteria).map(escapeCsvField).join(','));

  for (const row of rows) {
    const values = [
      row.documentId,
      ...criteria.map((criterion) => String(row.scores[criterion.id] ?? '')),
      String(row.totalScore),
    ];
    lines.push(values.map(escapeCsvField).join(','));
  }

  return `${lines.join('\n')}\n`;
}
