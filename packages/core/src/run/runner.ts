/**
 * Batch Runner
 *
 * Runs one scoring pass over a directory of documents:
 *
 *   policy → strategy → discover → (load → aggregate → report) per document
 *          → rank → scores.csv + summary.md
 *
 * Documents are processed one at a time in discovery order. An unreadable
 * document is skipped and counted; an output that cannot be written is
 * logged. Only an empty input set ends the run, before anything is written.
 *
 * @module @scorecard/core/run/runner
 */

import * as fs from 'fs';
import * as path from 'path';
import type { RunConfig } from '../config/run-config.js';
import type { DocumentRecord } from '../evidence/document.js';
import {
  DocumentUnreadableError,
  NoInputsError,
  OutputWriteError,
  toDiagnostic,
} from '../reliability/errors.js';
import { renderScoresCsv } from '../reports/csv.js';
import { renderDocumentReport, renderSummary } from '../reports/markdown.js';
import { loadPolicy, type RubricSource } from '../rubric/loader.js';
import type { Criterion } from '../rubric/schema.js';
import {
  aggregateDocument,
  toScoreRow,
  type DocumentScore,
  type ScoreRow,
} from '../scoring/aggregator.js';
import { rankDocuments, type RankedDocument } from '../scoring/ranking.js';
import { createScoringStrategy, type ScoringMode } from '../scoring/strategy.js';
import {
  createDocumentContext,
  createRunContext,
  runWithContext,
  type RunContext,
  type RunSource,
} from '../telemetry/context.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { ReportNameRegistry, discoverDocumentFiles, loadDocumentFile } from './documents.js';

// =============================================================================
// Types
// =============================================================================

export const SCORES_CSV_FILE = 'scores.csv';
export const SUMMARY_FILE = 'summary.md';

export interface RunScoringOptions {
  logger?: Logger;
  /** Entry point recorded in the run context */
  source?: RunSource;
  /** Score without writing reports, CSV or summary */
  dryRun?: boolean;
}

export interface SkippedDocument {
  origin: string;
  reason: string;
}

export interface RunOutputs {
  scoresCsv: string;
  summary: string;
  reportsDir: string;
  /** Report files written, in processing order */
  reports: string[];
  /** Paths that could not be written */
  failedWrites: string[];
}

export interface RunSummary {
  runId: string;
  mode: ScoringMode;
  rubricSource: RubricSource;
  policyOrigin?: string;
  criteria: readonly Criterion[];
  documentsScored: number;
  documentsSkipped: number;
  skipped: SkippedDocument[];
  documents: DocumentScore[];
  rows: ScoreRow[];
  topK: number;
  ranking: RankedDocument[];
  /** Absent on dry runs */
  outputs?: RunOutputs;
  durationMs: number;
}

// =============================================================================
// Output Helpers
// =============================================================================

class OutputWriter {
  readonly written: string[] = [];
  readonly failed: string[] = [];

  constructor(
    private readonly logger: Logger,
    private readonly dryRun: boolean
  ) {}

  write(filePath: string, content: string): void {
    if (this.dryRun) return;

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content, 'utf-8');
      this.written.push(filePath);
    } catch (error) {
      const writeError = new OutputWriteError(filePath, {
        cause: error instanceof Error ? error : undefined,
      });
      this.logger.warn(writeError.message, {
        eventName: 'output.write_failed',
        diagnostic: toDiagnostic(writeError),
      });
      this.failed.push(filePath);
    }
  }
}

function loadDocument(filePath: string): DocumentRecord {
  try {
    return loadDocumentFile(filePath);
  } catch (error) {
    if (error instanceof DocumentUnreadableError) {
      throw error;
    }
    throw new DocumentUnreadableError(filePath, error instanceof Error ? error.message : String(error), {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

// =============================================================================
// Runner
// =============================================================================

function executeRun(config: RunConfig, ctx: RunContext, logger: Logger, dryRun: boolean): RunSummary {
  const startedAt = Date.now();

  const policy = loadPolicy(config.policyPath, { logger });
  const strategy = createScoringStrategy(config.mode, policy.rubric, {
    evidenceTypeBonuses: config.evidenceTypeBonuses,
  });

  const files = discoverDocumentFiles(config.papersDir);
  if (files.length === 0) {
    throw new NoInputsError(config.papersDir);
  }

  logger.runStart(files.length, {
    mode: strategy.mode,
    rubricSource: policy.source,
    criteria: policy.rubric.criteria.length,
  });

  const writer = new OutputWriter(logger, dryRun);
  const reportNames = new ReportNameRegistry();
  const reportFiles: string[] = [];
  const documents: DocumentScore[] = [];
  const skipped: SkippedDocument[] = [];

  for (const filePath of files) {
    let document: DocumentRecord;
    try {
      document = loadDocument(filePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.documentSkipped(filePath, reason, { code: 'DOCUMENT_UNREADABLE' });
      skipped.push({ origin: filePath, reason });
      continue;
    }

    const documentScore = runWithContext(createDocumentContext(ctx, document.documentId, filePath), () => {
      const scored = aggregateDocument(document, policy.rubric, strategy, { logger });
      const { fileName, collided } = reportNames.claim(scored.documentId);
      if (collided) {
        logger.warn('Report file name already used in this run; writing under a suffixed name', {
          eventName: 'report.name_collision',
          documentId: scored.documentId,
          fileName,
        });
      }
      const reportPath = path.join(config.reportsDir, fileName);
      writer.write(
        reportPath,
        renderDocumentReport(scored, { maxPointers: config.maxPointersPerCriterion })
      );
      reportFiles.push(reportPath);
      return scored;
    });

    documents.push(documentScore);
  }

  const rows = documents.map(toScoreRow);
  const ranking = rankDocuments(rows, config.topK);

  const scoresCsv = path.join(config.outDir, SCORES_CSV_FILE);
  const summaryPath = path.join(config.outDir, SUMMARY_FILE);

  writer.write(scoresCsv, renderScoresCsv(rows, policy.rubric.criteria));
  writer.write(
    summaryPath,
    renderSummary({
      documentsScored: rows.length,
      documentsSkipped: skipped.length,
      topK: config.topK,
      ranking,
      strategyDescription: strategy.describe(),
    })
  );

  const durationMs = Date.now() - startedAt;
  logger.runEnd(rows.length, skipped.length, durationMs, {
    failedWrites: writer.failed.length,
  });

  return {
    runId: ctx.runId,
    mode: strategy.mode,
    rubricSource: policy.source,
    policyOrigin: policy.origin,
    criteria: policy.rubric.criteria,
    documentsScored: rows.length,
    documentsSkipped: skipped.length,
    skipped,
    documents,
    rows,
    topK: config.topK,
    ranking,
    outputs: dryRun
      ? undefined
      : {
          scoresCsv,
          summary: summaryPath,
          reportsDir: config.reportsDir,
          reports: reportFiles.filter((file) => !writer.failed.includes(file)),
          failedWrites: writer.failed,
        },
    durationMs,
  };
}

/**
 * Run a full scoring pass
 *
 * @throws NoInputsError when the documents directory holds no JSON files
 */
export function runScoring(config: RunConfig, options: RunScoringOptions = {}): RunSummary {
  const logger = options.logger ?? getLogger();
  const ctx = createRunContext(options.source ?? 'library');
  return runWithContext(ctx, () => executeRun(config, ctx, logger, options.dryRun ?? false));
}
