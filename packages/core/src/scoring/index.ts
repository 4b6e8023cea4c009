/**
 * Scoring Module
 *
 * Deterministic per-criterion scoring (basic and extended strategies),
 * document aggregation with manual overrides, and ranking.
 *
 * @module @scorecard/core/scoring
 */

// Rounding
export { roundHalfUp, clamp, boundedScore } from './rounding.js';

// Strategy contract
export {
  SCORING_MODES,
  isScoringMode,
  createScoringStrategy,
  type ScoringMode,
  type ScoreBasis,
  type StrategyResult,
  type ScoringStrategy,
  type StrategyOptions,
} from './strategy.js';

// Basic strategy
export {
  IMPLICIT_NOTES_MIN_LENGTH,
  BasicScoringStrategy,
  hasImplicitEvidence,
  characterCount,
  type BasicStrategyOptions,
} from './basic-strategy.js';

// Extended strategy
export {
  DEFAULT_EVIDENCE_TYPE_BONUSES,
  ExtendedScoringStrategy,
  evidenceTypeFactor,
  computeMultiplier,
  type EvidenceTypeBonuses,
  type ExtendedStrategyOptions,
  type MultiplierBreakdown,
} from './extended-strategy.js';

// Aggregation
export {
  aggregateDocument,
  applyCriterionOverride,
  applyTotalOverride,
  toScoreRow,
  type CriterionOutcome,
  type DocumentScore,
  type ScoreRow,
  type AggregateOptions,
} from './aggregator.js';

// Ranking
export {
  DEFAULT_TOP_K,
  rankDocuments,
  type RankedDocument,
  type RankableRow,
} from './ranking.js';
