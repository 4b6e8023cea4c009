/**
 * Document Records
 *
 * A document carries its evidence map plus optional manual overrides.
 * Only a top-level value that is not an object makes a document unreadable;
 * inner fields of the wrong shape are treated as absent.
 *
 * @module @scorecard/core/evidence/document
 */

import { z } from 'zod';
import { DocumentUnreadableError } from '../reliability/errors.js';
import { copyOwnEntries, isRecord } from './coerce.js';

// =============================================================================
// Schemas
// =============================================================================

const displayText = (value: unknown): string =>
  typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
    ? String(value)
    : '';

const DocumentIdSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .optional()
  .catch(undefined);

const MetadataSchema = z
  .object({
    title: z.unknown().transform(displayText),
    link: z.unknown().transform(displayText),
  })
  .nullish()
  .catch(undefined);

// Criterion-keyed map; z.record would drop a `__proto__` key
const ObjectMapSchema = z
  .unknown()
  .transform((value) => (isRecord(value) ? copyOwnEntries(value) : undefined));

const ScoringSchema = z
  .object({
    score_override: ObjectMapSchema,
    total_score_manual_override: z.unknown(),
  })
  .nullish()
  .catch(undefined);

/**
 * Raw document as stored on disk
 */
export const DocumentRecordSchema = z.object({
  paper_id: DocumentIdSchema,
  metadata: MetadataSchema,
  evidence: ObjectMapSchema,
  scoring: ScoringSchema,
});

export type RawDocumentRecord = z.input<typeof DocumentRecordSchema>;

// =============================================================================
// Types
// =============================================================================

/**
 * Normalized document ready for aggregation
 */
export interface DocumentRecord {
  /** `paper_id`, or the fallback derived from the document's origin */
  documentId: string;
  /** Where the document came from (usually a file path) */
  origin: string;
  metadata: {
    title: string;
    link: string;
  };
  /** Evidence records keyed by criterion id */
  evidence: Record<string, unknown>;
  /** Per-criterion manual overrides keyed by criterion id */
  scoreOverrides: Record<string, unknown>;
  /** Manual total override; `undefined` when absent or null */
  totalOverride: unknown;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Normalize a parsed document value.
 *
 * @throws DocumentUnreadableError when the value is not an object
 */
export function parseDocumentRecord(
  value: unknown,
  origin: string,
  fallbackId: string
): DocumentRecord {
  const result = DocumentRecordSchema.safeParse(value);
  if (!result.success) {
    throw new DocumentUnreadableError(origin, 'document is not a JSON object');
  }

  const { paper_id, metadata, evidence, scoring } = result.data;
  const totalOverride = scoring?.total_score_manual_override;

  return {
    documentId: paper_id ? paper_id : fallbackId,
    origin,
    metadata: {
      title: metadata?.title ?? '',
      link: metadata?.link ?? '',
    },
    evidence: evidence ?? {},
    scoreOverrides: scoring?.score_override ?? {},
    totalOverride: totalOverride === null ? undefined : totalOverride,
  };
}

/**
 * Parse a document from JSON text.
 *
 * @throws DocumentUnreadableError on invalid JSON or a non-object document
 */
export function parseDocumentJson(
  content: string,
  origin: string,
  fallbackId: string
): DocumentRecord {
  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (error) {
    throw new DocumentUnreadableError(
      origin,
      `cannot parse JSON (${error instanceof Error ? error.message : String(error)})`,
      { cause: error instanceof Error ? error : undefined }
    );
  }
  return parseDocumentRecord(value, origin, fallbackId);
}
