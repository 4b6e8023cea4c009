/**
 * Document Aggregator
 *
 * Applies the run's scoring strategy to every criterion of a document,
 * honoring manual overrides, and sums the result.
 *
 * Precedence per criterion: override (clamped to [0, weight]) → strategy.
 * Precedence for the total: manual total override → sum of criteria.
 *
 * @module @scorecard/core/scoring/aggregator
 */

import { coerceInteger, ownValue } from '../evidence/coerce.js';
import { readEvidenceSignals } from '../evidence/signals.js';
import type { DocumentRecord } from '../evidence/document.js';
import type { Criterion, Rubric } from '../rubric/schema.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { characterCount } from './basic-strategy.js';
import { clamp } from './rounding.js';
import type { ScoreBasis, ScoringStrategy, StrategyResult } from './strategy.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Outcome of one criterion for one document
 */
export interface CriterionOutcome {
  criterionId: string;
  name: string;
  weight: number;
  /** Integer within [0, weight] */
  score: number;
  basis: ScoreBasis;
  reason: string;
  overridden: boolean;
  /** Normalized quotes or pointers from the evidence record */
  pointers: string[];
  /** Trimmed assessor notes */
  notes: string;
}

/**
 * Full aggregation result for one document
 */
export interface DocumentScore {
  documentId: string;
  origin: string;
  metadata: DocumentRecord['metadata'];
  /** Outcomes in rubric order */
  criteria: CriterionOutcome[];
  /** Sum of the per-criterion scores */
  computedTotal: number;
  /** computedTotal, or the manual total override when one applies */
  totalScore: number;
  totalOverridden: boolean;
}

/**
 * Tabular row: one score column per criterion id
 */
export interface ScoreRow {
  documentId: string;
  scores: Record<string, number>;
  totalScore: number;
}

export interface AggregateOptions {
  logger?: Logger;
}

// =============================================================================
// Overrides
// =============================================================================

/**
 * Score a criterion from its manual override. Non-integer overrides score 0.
 */
export function applyCriterionOverride(
  override: unknown,
  weight: number
): { score: number; coerced: boolean } {
  const value = coerceInteger(override);
  if (value === undefined) {
    return { score: 0, coerced: false };
  }
  return { score: clamp(value, 0, weight), coerced: true };
}

/**
 * Resolve the document total. A total override replaces the sum as-is;
 * one that is not an integer keeps the sum.
 */
export function applyTotalOverride(
  override: unknown,
  computedTotal: number
): { total: number; overridden: boolean; coerced: boolean } {
  if (override === undefined || override === null) {
    return { total: computedTotal, overridden: false, coerced: true };
  }
  const value = coerceInteger(override);
  if (value === undefined) {
    return { total: computedTotal, overridden: false, coerced: false };
  }
  return { total: value, overridden: true, coerced: true };
}

// =============================================================================
// Aggregation
// =============================================================================

function scoreCriterion(
  criterion: Criterion,
  document: DocumentRecord,
  strategy: ScoringStrategy,
  logger: Logger
): CriterionOutcome {
  const evidence = ownValue(document.evidence, criterion.id);
  const override = ownValue(document.scoreOverrides, criterion.id);
  const signals = readEvidenceSignals(evidence);

  let result: StrategyResult;
  let overridden = false;

  if (override !== undefined && override !== null) {
    const { score, coerced } = applyCriterionOverride(override, criterion.weight);
    if (!coerced) {
      logger.warn('Score override is not an integer; scoring 0', {
        eventName: 'override.coercion_failed',
        code: 'OVERRIDE_COERCION_FAILED',
        criterionId: criterion.id,
        override,
      });
    }
    result = { score, basis: 'override', reason: `Manual override = ${score}` };
    overridden = true;
  } else {
    result = strategy.score(criterion.weight, evidence);
  }

  logger.criterionScored(criterion.id, result.score, criterion.weight, {
    mode: strategy.mode,
    basis: result.basis,
    reason: result.reason,
    override: overridden ? override : undefined,
    multiplier: result.multiplier,
    present: signals?.present,
    quotes: signals?.quotes.length,
    notesLength: signals ? characterCount(signals.notes) : undefined,
  });

  return {
    criterionId: criterion.id,
    name: criterion.name,
    weight: criterion.weight,
    score: result.score,
    basis: result.basis,
    reason: result.reason,
    overridden,
    pointers: signals?.quotes ?? [],
    notes: signals?.notes ?? '',
  };
}

/**
 * Score one document against the rubric
 */
export function aggregateDocument(
  document: DocumentRecord,
  rubric: Rubric,
  strategy: ScoringStrategy,
  options: AggregateOptions = {}
): DocumentScore {
  const logger = options.logger ?? getLogger();

  const criteria = rubric.criteria.map((criterion) =>
    scoreCriterion(criterion, document, strategy, logger)
  );
  const computedTotal = criteria.reduce((sum, outcome) => sum + outcome.score, 0);

  const { total, overridden, coerced } = applyTotalOverride(document.totalOverride, computedTotal);
  if (!coerced) {
    logger.warn('Total score override is not an integer; keeping the computed total', {
      eventName: 'override.coercion_failed',
      code: 'OVERRIDE_COERCION_FAILED',
      override: document.totalOverride,
      computedTotal,
    });
  }

  return {
    documentId: document.documentId,
    origin: document.origin,
    metadata: document.metadata,
    criteria,
    computedTotal,
    totalScore: total,
    totalOverridden: overridden,
  };
}

/**
 * Flatten a document score into its tabular row
 */
export function toScoreRow(documentScore: DocumentScore): ScoreRow {
  const scores: Record<string, number> = Object.fromEntries(
    documentScore.criteria.map((outcome) => [outcome.criterionId, outcome.score])
  );
  return {
    documentId: documentScore.documentId,
    scores,
    totalScore: documentScore.totalScore,
  };
}
