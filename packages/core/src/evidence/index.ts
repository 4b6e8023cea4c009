/**
 * Evidence Module
 *
 * Document records and per-criterion evidence signals.
 *
 * @module @scorecard/core/evidence
 */

export {
  isRecord,
  ownValue,
  coerceInteger,
  coerceNumber,
  normalizeStringList,
} from './coerce.js';

export {
  MAX_QUALITY_RATING,
  EvidenceRecordSchema,
  readEvidenceSignals,
  emptyEvidenceSignals,
  averageQuoteQuality,
  type EvidenceSignals,
  type EvidenceRecordInput,
} from './signals.js';

export {
  DocumentRecordSchema,
  parseDocumentRecord,
  parseDocumentJson,
  type DocumentRecord,
  type RawDocumentRecord,
} from './document.js';
