/**
 * Extended Scoring Strategy
 *
 * Confidence-weighted model. Ignores the rubric's partial-ratio settings.
 *
 *   multiplier = min(1, (confidence × avgQuoteQuality / 5
 *                        + notesQuality / 10
 *                        + min(0.05 × numQuotes, 0.25)) × evidenceTypeFactor)
 *   score      = clamp(round(weight × multiplier), 0, weight)
 *
 * A confidence of 0 or less short-circuits to 0.
 *
 * @module @scorecard/core/scoring/extended-strategy
 */

import {
  MAX_QUALITY_RATING,
  averageQuoteQuality,
  readEvidenceSignals,
  type EvidenceSignals,
} from '../evidence/signals.js';
import { boundedScore } from './rounding.js';
import type { ScoringStrategy, StrategyResult } from './strategy.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Additive bonus per evidence type tag
 */
export type EvidenceTypeBonuses = Readonly<Record<string, number>>;

export const DEFAULT_EVIDENCE_TYPE_BONUSES: EvidenceTypeBonuses = Object.freeze({
  'Empirical Data': 0.2,
  'Normative Claim': 0.1,
  'Case Study': 0.15,
});

const NOTES_QUALITY_DIVISOR = 10;
const QUOTE_COUNT_BONUS_PER_QUOTE = 0.05;
const QUOTE_COUNT_BONUS_CAP = 0.25;
const MAX_MULTIPLIER = 1;

// =============================================================================
// Multiplier
// =============================================================================

export interface MultiplierBreakdown {
  confidence: number;
  avgQuoteQuality: number;
  notesQuality: number;
  numQuotes: number;
  evidenceTypeFactor: number;
  /** Final multiplier, capped at 1 */
  multiplier: number;
}

/**
 * 1.0 plus the bonus of every distinct recognized tag
 */
export function evidenceTypeFactor(
  evidenceTypes: readonly string[],
  bonuses: EvidenceTypeBonuses = DEFAULT_EVIDENCE_TYPE_BONUSES
): number {
  let factor = 1;
  for (const tag of new Set(evidenceTypes)) {
    if (Object.prototype.hasOwnProperty.call(bonuses, tag)) {
      factor += bonuses[tag];
    }
  }
  return factor;
}

/**
 * Compute the capped multiplier for a record with positive confidence
 */
export function computeMultiplier(
  signals: EvidenceSignals,
  bonuses: EvidenceTypeBonuses = DEFAULT_EVIDENCE_TYPE_BONUSES
): MultiplierBreakdown {
  const confidence = signals.presentConfidence;
  const avgQuoteQuality = averageQuoteQuality(signals);
  const notesQuality = signals.notesQuality;
  const numQuotes = signals.quotes.length;
  const typeFactor = evidenceTypeFactor(signals.evidenceTypes, bonuses);

  let multiplier = confidence * (avgQuoteQuality / MAX_QUALITY_RATING);
  multiplier += notesQuality / NOTES_QUALITY_DIVISOR;
  multiplier += Math.min(QUOTE_COUNT_BONUS_PER_QUOTE * numQuotes, QUOTE_COUNT_BONUS_CAP);
  multiplier *= typeFactor;

  return {
    confidence,
    avgQuoteQuality,
    notesQuality,
    numQuotes,
    evidenceTypeFactor: typeFactor,
    multiplier: Math.min(multiplier, MAX_MULTIPLIER),
  };
}

// =============================================================================
// Strategy
// =============================================================================

export interface ExtendedStrategyOptions {
  /** Merged over the default bonuses */
  evidenceTypeBonuses?: EvidenceTypeBonuses;
}

export class ExtendedScoringStrategy implements ScoringStrategy {
  readonly mode = 'extended' as const;
  readonly bonuses: EvidenceTypeBonuses;

  constructor(options: ExtendedStrategyOptions = {}) {
    this.bonuses = Object.freeze({
      ...DEFAULT_EVIDENCE_TYPE_BONUSES,
      ...options.evidenceTypeBonuses,
    });
  }

  score(weight: number, evidence: unknown): StrategyResult {
    const signals = readEvidenceSignals(evidence);

    if (!signals) {
      return { score: 0, basis: 'none', reason: 'No evidence → 0' };
    }

    if (signals.presentConfidence <= 0) {
      return { score: 0, basis: 'none', reason: 'No confidence in evidence → 0' };
    }

    const { multiplier } = computeMultiplier(signals, this.bonuses);
    return {
      score: boundedScore(weight * multiplier, weight),
      basis: 'weighted',
      reason: `Confidence-weighted evidence → ×${multiplier.toFixed(2)}`,
      multiplier,
    };
  }

  describe(): string {
    const tags = Object.entries(this.bonuses)
      .map(([tag, bonus]) => `${tag} +${bonus}`)
      .join(', ');
    return `Extended scoring: confidence × quote quality + notes quality + quote count, weighted by evidence type (${tags}), capped at full weight.`;
  }
}
