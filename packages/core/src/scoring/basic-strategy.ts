/**
 * Basic Scoring Strategy
 *
 * Presence / partial-credit model:
 * - `present: true` earns the full weight
 * - implicit evidence (quotes, or notes of at least 10 characters) earns
 *   `weight × partialRatio` when partial scoring is allowed
 * - anything else earns 0
 *
 * @module @scorecard/core/scoring/basic-strategy
 */

import { readEvidenceSignals, type EvidenceSignals } from '../evidence/signals.js';
import { boundedScore, clamp } from './rounding.js';
import type { ScoringStrategy, StrategyResult } from './strategy.js';

/**
 * Minimum trimmed length of assessor notes, in code points, that counts as
 * implicit evidence
 */
export const IMPLICIT_NOTES_MIN_LENGTH = 10;

export interface BasicStrategyOptions {
  allowPartial: boolean;
  /** Clamped into [0, 1] */
  partialRatio: number;
}

/**
 * Length in code points, so a surrogate pair counts once
 */
export function characterCount(text: string): number {
  return [...text].length;
}

/**
 * Evidence that is not explicitly present but still has quotes or
 * substantial notes
 */
export function hasImplicitEvidence(signals: EvidenceSignals | undefined): boolean {
  if (!signals || signals.present) {
    return false;
  }
  return signals.quotes.length > 0 || characterCount(signals.notes) >= IMPLICIT_NOTES_MIN_LENGTH;
}

export class BasicScoringStrategy implements ScoringStrategy {
  readonly mode = 'basic' as const;
  private readonly allowPartial: boolean;
  private readonly partialRatio: number;

  constructor(options: BasicStrategyOptions) {
    this.allowPartial = options.allowPartial;
    this.partialRatio = clamp(options.partialRatio, 0, 1);
  }

  score(weight: number, evidence: unknown): StrategyResult {
    const signals = readEvidenceSignals(evidence);

    if (signals?.present) {
      return {
        score: weight,
        basis: 'explicit',
        reason: 'Explicit evidence → full weight',
      };
    }

    if (this.allowPartial && hasImplicitEvidence(signals)) {
      return {
        score: boundedScore(weight * this.partialRatio, weight),
        basis: 'implicit',
        reason: `Implicit/weak evidence → ${this.percentLabel()} weight`,
      };
    }

    return {
      score: 0,
      basis: 'none',
      reason: 'No evidence → 0',
    };
  }

  describe(): string {
    return this.allowPartial
      ? `Basic scoring: explicit evidence earns full weight, implicit/weak evidence earns ${this.percentLabel()}.`
      : 'Basic scoring: explicit evidence earns full weight, partial scoring disabled.';
  }

  private percentLabel(): string {
    return `${Math.trunc(this.partialRatio * 100)}%`;
  }
}
