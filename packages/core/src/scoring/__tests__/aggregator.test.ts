/**
 * Aggregation and ranking tests
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  aggregateDocument,
  applyCriterionOverride,
  applyTotalOverride,
  toScoreRow,
} from '../aggregator.js';
import { rankDocuments } from '../ranking.js';
import { BasicScoringStrategy } from '../basic-strategy.js';
import { ExtendedScoringStrategy } from '../extended-strategy.js';
import { buildRubric } from '../../rubric/schema.js';
import { parseDocumentRecord } from '../../evidence/document.js';
import { createLogger, type Logger } from '../../telemetry/logger.js';
import { renderScoresCsv } from '../../reports/csv.js';

const rubric = buildRubric([
  { id: 'transparency', name: 'Transparency', weight: 15 },
  { id: 'privacy', name: 'Privacy', weight: 15 },
  { id: 'oversight', name: 'Human Oversight', weight: 10 },
]);

const basic = new BasicScoringStrategy({ allowPartial: true, partialRatio: 0.5 });

describe('overrides', () => {
  it('clamps criterion overrides to [0, weight]', () => {
    expect(applyCriterionOverride(12, 10)).toEqual({ score: 10, coerced: true });
    expect(applyCriterionOverride(-3, 10)).toEqual({ score: 0, coerced: true });
    expect(applyCriterionOverride('7', 10)).toEqual({ score: 7, coerced: true });
  });

  it('scores non-integer criterion overrides as zero', () => {
    expect(applyCriterionOverride('high', 10)).toEqual({ score: 0, coerced: false });
    expect(applyCriterionOverride('7.5', 10)).toEqual({ score: 0, coerced: false });
  });

  it('applies total overrides without clamping', () => {
    expect(applyTotalOverride(250, 40)).toEqual({ total: 250, overridden: true, coerced: true });
    expect(applyTotalOverride(-5, 40)).toEqual({ total: -5, overridden: true, coerced: true });
  });

  it('keeps the computed total when the override is absent or invalid', () => {
    expect(applyTotalOverride(undefined, 40)).toEqual({ total: 40, overridden: false, coerced: true });
    expect(applyTotalOverride(null, 40)).toEqual({ total: 40, overridden: false, coerced: true });
    expect(applyTotalOverride('lots', 40)).toEqual({ total: 40, overridden: false, coerced: false });
  });
});

describe('aggregateDocument', () => {
  let logger: Logger;
  let warnSpy: MockInstance<typeof console.warn>;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger = createLogger('test', { minSeverity: 'WARNING', prettyPrint: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('scores every criterion in rubric order', () => {
    const document = parseDocumentRecord(
      {
        paper_id: 'paper-01',
        evidence: {
          transparency: { present: true, quotes_or_pointers: ['p.2 publishes model cards'] },
          privacy: { present: false, quotes_or_pointers: ['p.3 mentions audit log'] },
        },
      },
      'paper-01.json',
      'paper-01'
    );

    const result = aggregateDocument(document, rubric, basic, { logger });

    expect(result.criteria.map((outcome) => [outcome.criterionId, outcome.score, outcome.basis])).toEqual([
      ['transparency', 15, 'explicit'],
      ['privacy', 8, 'implicit'],
      ['oversight', 0, 'none'],
    ]);
    expect(result.criteria[0].pointers).toEqual(['p.2 publishes model cards']);
    expect(result.computedTotal).toBe(23);
    expect(result.totalScore).toBe(23);
    expect(result.totalOverridden).toBe(false);
  });

  it('lets a criterion override win over evidence', () => {
    const document = parseDocumentRecord(
      {
        evidence: { transparency: { present: true } },
        scoring: { score_override: { transparency: 4, privacy: 99 } },
      },
      'doc.json',
      'doc'
    );

    const result = aggregateDocument(document, rubric, basic, { logger });

    expect(result.criteria[0]).toMatchObject({
      score: 4,
      basis: 'override',
      reason: 'Manual override = 4',
      overridden: true,
    });
    expect(result.criteria[1].score).toBe(15);
    expect(result.computedTotal).toBe(19);
  });

  it('ignores a null criterion override', () => {
    const document = parseDocumentRecord(
      { evidence: { transparency: { present: true } }, scoring: { score_override: { transparency: null } } },
      'doc.json',
      'doc'
    );

    expect(aggregateDocument(document, rubric, basic, { logger }).criteria[0].basis).toBe('explicit');
  });

  it('scores a malformed criterion override as zero and warns', () => {
    const document = parseDocumentRecord(
      { evidence: { privacy: { present: true } }, scoring: { score_override: { privacy: 'n/a' } } },
      'doc.json',
      'doc'
    );

    const result = aggregateDocument(document, rubric, basic, { logger });

    expect(result.criteria[1]).toMatchObject({ score: 0, basis: 'override', overridden: true });
    expect(warnSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warnSpy.mock.calls[0][0]));
    expect(entry.message).toBe('Score override is not an integer; scoring 0');
    expect(entry.criterionId).toBe('privacy');
    expect(entry.code).toBe('OVERRIDE_COERCION_FAILED');
  });

  it('replaces the total with a manual override', () => {
    const document = parseDocumentRecord(
      { evidence: { privacy: { present: true } }, scoring: { total_score_manual_override: '42' } },
      'doc.json',
      'doc'
    );

    const result = aggregateDocument(document, rubric, basic, { logger });

    expect(result.computedTotal).toBe(15);
    expect(result.totalScore).toBe(42);
    expect(result.totalOverridden).toBe(true);
  });

  it('keeps the computed total when the total override is malformed', () => {
    const document = parseDocumentRecord(
      { evidence: { privacy: { present: true } }, scoring: { total_score_manual_override: 'plenty' } },
      'doc.json',
      'doc'
    );

    const result = aggregateDocument(document, rubric, basic, { logger });

    expect(result.totalScore).toBe(15);
    expect(result.totalOverridden).toBe(false);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('does not read inherited evidence keys', () => {
    const constructorRubric = buildRubric([{ id: 'constructor', name: 'Constructor', weight: 5 }]);
    const document = parseDocumentRecord({ evidence: {} }, 'doc.json', 'doc');

    expect(aggregateDocument(document, constructorRubric, basic, { logger }).totalScore).toBe(0);
  });

  it('scores a criterion whose id is __proto__ like any other', () => {
    const protoRubric = buildRubric([
      { id: '__proto__', name: 'Proto', weight: 10 },
      { id: 'b', name: 'B', weight: 5 },
    ]);
    const document = parseDocumentRecord(
      JSON.parse(
        '{"paper_id":"p","evidence":{"__proto__":{"present":true},"b":{"present":true}},' +
          '"scoring":{"score_override":{"__proto__":"4"}}}'
      ),
      'p.json',
      'p'
    );

    const row = toScoreRow(aggregateDocument(document, protoRubric, basic, { logger }));

    expect(row.totalScore).toBe(9);
    expect(Object.prototype.hasOwnProperty.call(row.scores, '__proto__')).toBe(true);
    expect(renderScoresCsv([row], protoRubric.criteria)).toBe('paper_id,__proto__,b,total_score\np,4,5,9\n');

    const withoutOverride = parseDocumentRecord(
      JSON.parse('{"evidence":{"__proto__":{"present":true},"b":{"present":true}}}'),
      'q.json',
      'q'
    );
    expect(
      renderScoresCsv([toScoreRow(aggregateDocument(withoutOverride, protoRubric, basic, { logger }))], protoRubric.criteria)
    ).toBe('paper_id,__proto__,b,total_score\nq,10,5,15\n');
  });

  it('logs each criterion at debug level', () => {
    const debugLogger = createLogger('test', { minSeverity: 'DEBUG', prettyPrint: false });
    const document = parseDocumentRecord({ paper_id: 'p' }, 'p.json', 'p');

    aggregateDocument(document, rubric, new ExtendedScoringStrategy(), { logger: debugLogger });

    const events = logSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(events.map((event) => event.criterionId)).toEqual(['transparency', 'privacy', 'oversight']);
    expect(events[0]).toMatchObject({
      severity: 'DEBUG',
      eventName: 'criterion.scored',
      score: 0,
      weight: 15,
      mode: 'extended',
    });
  });

  it('flattens into a score row', () => {
    const document = parseDocumentRecord(
      { paper_id: 'row', evidence: { oversight: { present: true } } },
      'row.json',
      'row'
    );

    expect(toScoreRow(aggregateDocument(document, rubric, basic, { logger }))).toEqual({
      documentId: 'row',
      scores: { transparency: 0, privacy: 0, oversight: 10 },
      totalScore: 10,
    });
  });
});

describe('rankDocuments', () => {
  const rows = [
    { documentId: 'a', totalScore: 40 },
    { documentId: 'b', totalScore: 75 },
    { documentId: 'c', totalScore: 40 },
    { documentId: 'd', totalScore: 90 },
    { documentId: 'e', totalScore: 40 },
  ];

  it('orders by total descending and keeps ties in input order', () => {
    expect(rankDocuments(rows, 5)).toEqual([
      { rank: 1, documentId: 'd', totalScore: 90 },
      { rank: 2, documentId: 'b', totalScore: 75 },
      { rank: 3, documentId: 'a', totalScore: 40 },
      { rank: 4, documentId: 'c', totalScore: 40 },
      { rank: 5, documentId: 'e', totalScore: 40 },
    ]);
  });

  it('keeps only the top K', () => {
    expect(rankDocuments(rows, 2).map((entry) => entry.documentId)).toEqual(['d', 'b']);
    expect(rankDocuments(rows, 0)).toEqual([]);
  });

  it('returns every row when K exceeds the count', () => {
    expect(rankDocuments(rows.slice(0, 2), 5)).toHaveLength(2);
  });

  it('does not reorder the input', () => {
    const input = [...rows];
    rankDocuments(input, 3);
    expect(input).toEqual(rows);
  });

  it('rejects invalid K', () => {
    expect(() => rankDocuments(rows, -1)).toThrow(RangeError);
    expect(() => rankDocuments(rows, 1.5)).toThrow('topK must be a non-negative integer, got 1.5');
  });
});
