/**
 * Markdown rendering for per-document reports and the run summary
 *
 * @module @scorecard/core/reports/markdown
 */

import type { DocumentScore } from '../scoring/aggregator.js';
import type { RankedDocument } from '../scoring/ranking.js';

export const DEFAULT_MAX_POINTERS = 8;

export interface DocumentReportOptions {
  /** Evidence pointers listed per criterion */
  maxPointers?: number;
}

/**
 * Render the report of one document
 */
export function renderDocumentReport(
  documentScore: DocumentScore,
  options: DocumentReportOptions = {}
): string {
  const maxPointers = options.maxPointers ?? DEFAULT_MAX_POINTERS;
  const lines: string[] = [
    `# ${documentScore.documentId}`,
    `Title: ${documentScore.metadata.title}`,
    `Link:  ${documentScore.metadata.link}`,
    '',
  ];

  for (const outcome of documentScore.criteria) {
    lines.push(`## ${outcome.name}`);
    lines.push(`- Score: ${outcome.score} / ${outcome.weight}  (${outcome.reason})`);

    if (outcome.pointers.length > 0) {
      lines.push('- Evidence pointers:');
      for (const pointer of outcome.pointers.slice(0, maxPointers)) {
        lines.push(`  - ${pointer}`);
      }
    }
    if (outcome.notes) {
      lines.push(`- Notes: ${outcome.notes}`);
    }
    lines.push('');
  }

  const maxTotal = documentScore.criteria.reduce((sum, outcome) => sum + outcome.weight, 0);
  lines.push('## Total');
  lines.push(
    documentScore.totalOverridden
      ? `- Score: ${documentScore.totalScore} / ${maxTotal}  (Manual total override; computed ${documentScore.computedTotal})`
      : `- Score: ${documentScore.totalScore} / ${maxTotal}`
  );
  lines.push('');

  return lines.join('\n');
}

export interface SummaryReportInput {
  documentsScored: number;
  documentsSkipped: number;
  topK: number;
  ranking: readonly RankedDocument[];
  /** Description of the scoring strategy used for the run */
  strategyDescription: string;
}

/**
 * Render the run summary
 */
export function renderSummary(input: SummaryReportInput): string {
  const lines: string[] = ['# Summary', '', `Total papers scored: ${input.documentsScored}`, ''];

  if (input.documentsSkipped > 0) {
    lines.push(`Skipped malformed JSON files: ${input.documentsSkipped}`, '');
  }

  lines.push(`## Top-${input.topK} by total score`);
  for (const entry of input.ranking) {
    lines.push(`${entry.rank}. ${entry.documentId} — ${entry.totalScore}`);
  }

  lines.push(
    '',
    '## Notes',
    `- ${input.strategyDescription}`,
    '- Use score_override fields for manual adjustments when necessary.',
    ''
  );

  return lines.join('\n');
}
