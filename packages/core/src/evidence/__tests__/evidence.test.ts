/**
 * Evidence normalization tests
 */

import { describe, it, expect } from 'vitest';
import {
  coerceInteger,
  coerceNumber,
  isRecord,
  normalizeStringList,
  ownValue,
} from '../coerce.js';
import { averageQuoteQuality, emptyEvidenceSignals, readEvidenceSignals } from '../signals.js';
import { parseDocumentJson, parseDocumentRecord } from '../document.js';
import { DocumentUnreadableError } from '../../reliability/errors.js';

describe('coerce', () => {
  describe('coerceInteger', () => {
    it('truncates finite numbers', () => {
      expect(coerceInteger(7)).toBe(7);
      expect(coerceInteger(7.9)).toBe(7);
      expect(coerceInteger(-3.2)).toBe(-3);
    });

    it('parses integer strings', () => {
      expect(coerceInteger('12')).toBe(12);
      expect(coerceInteger(' -4 ')).toBe(-4);
      expect(coerceInteger('+5')).toBe(5);
    });

    it('rejects everything else', () => {
      expect(coerceInteger('7.5')).toBeUndefined();
      expect(coerceInteger('abc')).toBeUndefined();
      expect(coerceInteger('')).toBeUndefined();
      expect(coerceInteger(true)).toBeUndefined();
      expect(coerceInteger(null)).toBeUndefined();
      expect(coerceInteger(Number.NaN)).toBeUndefined();
      expect(coerceInteger(Number.POSITIVE_INFINITY)).toBeUndefined();
      expect(coerceInteger([3])).toBeUndefined();
    });
  });

  describe('coerceNumber', () => {
    it('accepts numbers and numeric strings', () => {
      expect(coerceNumber(0.8)).toBe(0.8);
      expect(coerceNumber('0.25')).toBe(0.25);
    });

    it('rejects blank and non-numeric values', () => {
      expect(coerceNumber('  ')).toBeUndefined();
      expect(coerceNumber('high')).toBeUndefined();
      expect(coerceNumber(false)).toBeUndefined();
      expect(coerceNumber(undefined)).toBeUndefined();
    });
  });

  describe('normalizeStringList', () => {
    it('keeps primitive list entries as strings', () => {
      expect(normalizeStringList(['p.1', 2, true, null, { page: 3 }])).toEqual(['p.1', '2', 'true']);
    });

    it('wraps a single primitive', () => {
      expect(normalizeStringList('p.3 mentions audit log')).toEqual(['p.3 mentions audit log']);
    });

    it('returns an empty list for other values', () => {
      expect(normalizeStringList(undefined)).toEqual([]);
      expect(normalizeStringList({ quote: 'x' })).toEqual([]);
    });
  });

  it('isRecord excludes arrays and null', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });

  it('ownValue ignores inherited keys', () => {
    expect(ownValue({ privacy: 1 }, 'privacy')).toBe(1);
    expect(ownValue({}, 'constructor')).toBeUndefined();
    expect(ownValue({}, 'toString')).toBeUndefined();
  });
});

describe('readEvidenceSignals', () => {
  it('reads a complete record', () => {
    const signals = readEvidenceSignals({
      present: true,
      present_confidence: 0.8,
      quotes_or_pointers: ['a', 'b'],
      assessor_notes: '  Clear audit trail  ',
      quote_quality: [4, 5],
      notes_quality: 3,
      evidence_type: ['Empirical Data'],
    });

    expect(signals).toEqual({
      present: true,
      presentConfidence: 0.8,
      quotes: ['a', 'b'],
      notes: 'Clear audit trail',
      quoteQuality: [4, 5],
      notesQuality: 3,
      evidenceTypes: ['Empirical Data'],
    });
  });

  it('treats only boolean true as present', () => {
    expect(readEvidenceSignals({ present: 'true' })?.present).toBe(false);
    expect(readEvidenceSignals({ present: 1 })?.present).toBe(false);
  });

  it('degrades wrong-typed fields to neutral defaults', () => {
    const signals = readEvidenceSignals({
      present_confidence: 'unknown',
      quotes_or_pointers: 42,
      assessor_notes: ['not', 'a', 'string'],
      quote_quality: 'x',
      notes_quality: 'good',
      evidence_type: 'Case Study',
    });

    expect(signals).toEqual({
      present: false,
      presentConfidence: 0,
      quotes: ['42'],
      notes: '',
      quoteQuality: [],
      notesQuality: 0,
      evidenceTypes: ['Case Study'],
    });
  });

  it('clamps quality ratings into 0-5', () => {
    const signals = readEvidenceSignals({
      quote_quality: [7, -1, '3', 'n/a'],
      notes_quality: 9,
    });

    expect(signals?.quoteQuality).toEqual([5, 0, 3]);
    expect(signals?.notesQuality).toBe(5);
  });

  it('truncates a fractional notes quality', () => {
    expect(readEvidenceSignals({ notes_quality: 3.7 })?.notesQuality).toBe(3);
  });

  it('returns undefined for non-records', () => {
    expect(readEvidenceSignals(undefined)).toBeUndefined();
    expect(readEvidenceSignals(null)).toBeUndefined();
    expect(readEvidenceSignals('present')).toBeUndefined();
    expect(readEvidenceSignals([{ present: true }])).toBeUndefined();
  });

  it('averages quote quality', () => {
    expect(averageQuoteQuality(emptyEvidenceSignals())).toBe(0);
    expect(averageQuoteQuality({ ...emptyEvidenceSignals(), quoteQuality: [4, 5] })).toBe(4.5);
  });
});

describe('parseDocumentRecord', () => {
  it('normalizes a full document', () => {
    const record = parseDocumentRecord(
      {
        paper_id: 'paper-01',
        metadata: { title: 'Auditing Models', link: 'https://example.org/p1' },
        evidence: { privacy: { present: true } },
        scoring: { score_override: { privacy: 3 }, total_score_manual_override: 40 },
      },
      'papers/paper-01.json',
      'paper-01'
    );

    expect(record).toEqual({
      documentId: 'paper-01',
      origin: 'papers/paper-01.json',
      metadata: { title: 'Auditing Models', link: 'https://example.org/p1' },
      evidence: { privacy: { present: true } },
      scoreOverrides: { privacy: 3 },
      totalOverride: 40,
    });
  });

  it('falls back to the derived id', () => {
    expect(parseDocumentRecord({}, 'x.json', 'x').documentId).toBe('x');
    expect(parseDocumentRecord({ paper_id: '' }, 'x.json', 'x').documentId).toBe('x');
    expect(parseDocumentRecord({ paper_id: { id: 1 } }, 'x.json', 'x').documentId).toBe('x');
  });

  it('stringifies numeric ids', () => {
    expect(parseDocumentRecord({ paper_id: 17 }, 'x.json', 'x').documentId).toBe('17');
  });

  it('treats malformed inner fields as absent', () => {
    const record = parseDocumentRecord(
      {
        metadata: 'untitled',
        evidence: ['privacy'],
        scoring: { score_override: 5, total_score_manual_override: null },
      },
      'x.json',
      'x'
    );

    expect(record.metadata).toEqual({ title: '', link: '' });
    expect(record.evidence).toEqual({});
    expect(record.scoreOverrides).toEqual({});
    expect(record.totalOverride).toBeUndefined();
  });

  it('rejects non-object documents', () => {
    expect(() => parseDocumentRecord([1, 2], 'list.json', 'list')).toThrow(DocumentUnreadableError);
    expect(() => parseDocumentRecord('text', 'text.json', 'text')).toThrow(
      "Cannot read document 'text.json': document is not a JSON object"
    );
  });
});

describe('parseDocumentJson', () => {
  it('parses JSON text', () => {
    expect(parseDocumentJson('{"paper_id":"p"}', 'p.json', 'fallback').documentId).toBe('p');
  });

  it('reports invalid JSON as unreadable', () => {
    expect(() => parseDocumentJson('{ not json', 'bad.json', 'bad')).toThrow(
      /^Cannot read document 'bad\.json': cannot parse JSON \(/
    );
  });
});
