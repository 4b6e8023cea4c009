/**
 * Ranking
 *
 * Orders documents by total score, descending. The sort is stable, so
 * documents with equal totals keep their discovery order.
 *
 * @module @scorecard/core/scoring/ranking
 */

export const DEFAULT_TOP_K = 5;

export interface RankedDocument {
  /** 1-based position */
  rank: number;
  documentId: string;
  totalScore: number;
}

export interface RankableRow {
  documentId: string;
  totalScore: number;
}

/**
 * Sort rows by total score (descending, stable) and keep the first `topK`
 */
export function rankDocuments(rows: readonly RankableRow[], topK: number = DEFAULT_TOP_K): RankedDocument[] {
  if (!Number.isInteger(topK) || topK < 0) {
    throw new RangeError(`topK must be a non-negative integer, got ${topK}`);
  }

  return [...rows]
    .sort((a, b) => b.totalScore - a.totalScore)
    .slice(0, topK)
    .map((row, index) => ({
      rank: index + 1,
      documentId: row.documentId,
      totalScore: row.totalScore,
    }));
}
