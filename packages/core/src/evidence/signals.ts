/**
 * Evidence Signals
 *
 * Reads one criterion's evidence record into typed signals. Evidence is a
 * loosely structured bag: any field may be absent or of the wrong type, and
 * every such field degrades to its neutral default instead of failing.
 *
 * @module @scorecard/core/evidence/signals
 */

import { z } from 'zod';
import { coerceInteger, coerceNumber, normalizeStringList } from './coerce.js';

// =============================================================================
// Constants
// =============================================================================

/** Upper bound of the quote and notes quality scales */
export const MAX_QUALITY_RATING = 5;

// =============================================================================
// Types
// =============================================================================

/**
 * Normalized signals of one evidence record
 */
export interface EvidenceSignals {
  /** `present` was exactly `true` */
  present: boolean;
  /** Assessor confidence that the evidence is present (0 when absent) */
  presentConfidence: number;
  /** Quotes or pointers into the document */
  quotes: string[];
  /** Trimmed assessor notes */
  notes: string;
  /** Per-quote quality ratings, each within 0-5 */
  quoteQuality: number[];
  /** Notes quality rating, integer within 0-5 */
  notesQuality: number;
  /** Evidence category tags */
  evidenceTypes: string[];
}

// =============================================================================
// Schema
// =============================================================================

function clampRating(value: number): number {
  return Math.min(MAX_QUALITY_RATING, Math.max(0, value));
}

function normalizeRatings(value: unknown): number[] {
  const entries = Array.isArray(value) ? value : value === undefined || value === null ? [] : [value];
  const ratings: number[] = [];
  for (const entry of entries) {
    const rating = coerceNumber(entry);
    if (rating !== undefined) {
      ratings.push(clampRating(rating));
    }
  }
  return ratings;
}

/**
 * Evidence record as found under `evidence.<criterionId>` of a document
 */
export const EvidenceRecordSchema = z
  .object({
    present: z.unknown(),
    present_confidence: z.unknown(),
    quotes_or_pointers: z.unknown(),
    assessor_notes: z.unknown(),
    quote_quality: z.unknown(),
    notes_quality: z.unknown(),
    evidence_type: z.unknown(),
  })
  .transform(
    (record): EvidenceSignals => ({
      present: record.present === true,
      presentConfidence: coerceNumber(record.present_confidence) ?? 0,
      quotes: normalizeStringList(record.quotes_or_pointers),
      notes: typeof record.assessor_notes === 'string' ? record.assessor_notes.trim() : '',
      quoteQuality: normalizeRatings(record.quote_quality),
      notesQuality: clampRating(coerceInteger(record.notes_quality) ?? 0),
      evidenceTypes: normalizeStringList(record.evidence_type),
    })
  );

export type EvidenceRecordInput = z.input<typeof EvidenceRecordSchema>;

// =============================================================================
// Readers
// =============================================================================

/**
 * Read evidence signals. Returns `undefined` when the value is not a record.
 */
export function readEvidenceSignals(evidence: unknown): EvidenceSignals | undefined {
  const result = EvidenceRecordSchema.safeParse(evidence);
  return result.success ? result.data : undefined;
}

/**
 * Signals of a record with no evidence at all
 */
export function emptyEvidenceSignals(): EvidenceSignals {
  return {
    present: false,
    presentConfidence: 0,
    quotes: [],
    notes: '',
    quoteQuality: [],
    notesQuality: 0,
    evidenceTypes: [],
  };
}

/**
 * Arithmetic mean of the quote quality ratings (0 when there are none)
 */
export function averageQuoteQuality(signals: EvidenceSignals): number {
  if (signals.quoteQuality.length === 0) return 0;
  const sum = signals.quoteQuality.reduce((total, rating) => total + rating, 0);
  return sum / signals.quoteQuality.length;
}
