/**
 * Scoring Strategy Contract
 *
 * A strategy turns one criterion's weight and evidence record into a
 * bounded integer score. Exactly one strategy is selected per run and
 * applied to every criterion of every document, so scores stay comparable.
 *
 * @module @scorecard/core/scoring/strategy
 */

import type { Rubric } from '../rubric/schema.js';
import { BasicScoringStrategy } from './basic-strategy.js';
import { ExtendedScoringStrategy, type EvidenceTypeBonuses } from './extended-strategy.js';

// =============================================================================
// Types
// =============================================================================

export const SCORING_MODES = ['basic', 'extended'] as const;

export type ScoringMode = (typeof SCORING_MODES)[number];

/**
 * Why a criterion received its score
 */
export type ScoreBasis =
  | 'explicit'
  | 'implicit'
  | 'weighted'
  | 'none'
  | 'override';

export interface StrategyResult {
  /** Integer within [0, weight] */
  score: number;
  basis: ScoreBasis;
  /** Human-readable reason shown in reports */
  reason: string;
  /** Extended strategy only: the capped multiplier applied to the weight */
  multiplier?: number;
}

export interface ScoringStrategy {
  readonly mode: ScoringMode;

  /**
   * Score one criterion. `evidence` is the raw record, which may be absent
   * or of any shape.
   */
  score(weight: number, evidence: unknown): StrategyResult;

  /** One-line description for run summaries */
  describe(): string;
}

export interface StrategyOptions {
  /** Extended mode tag bonuses, merged over the defaults */
  evidenceTypeBonuses?: EvidenceTypeBonuses;
}

// =============================================================================
// Factory
// =============================================================================

export function isScoringMode(value: string): value is ScoringMode {
  return SCORING_MODES.some((mode) => mode === value);
}

/**
 * Create the single strategy used for a run
 */
export function createScoringStrategy(
  mode: ScoringMode,
  rubric: Rubric,
  options: StrategyOptions = {}
): ScoringStrategy {
  switch (mode) {
    case 'basic':
      return new BasicScoringStrategy({
        allowPartial: rubric.allowPartialScoring,
        partialRatio: rubric.partialRatio,
      });
    case 'extended':
      return new ExtendedScoringStrategy({
        evidenceTypeBonuses: options.evidenceTypeBonuses,
      });
  }
}
