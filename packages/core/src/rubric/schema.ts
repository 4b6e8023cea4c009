/**
 * Rubric Definition and Validation
 *
 * A rubric is an ordered list of weighted criteria plus the partial-credit
 * parameters used by the basic scoring strategy. External policies are
 * validated as a whole: one bad criterion rejects the entire policy.
 *
 * @module @scorecard/core/rubric/schema
 */

import { z } from 'zod';
import { coerceInteger, coerceNumber } from '../evidence/coerce.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Single weighted criterion
 */
export interface Criterion {
  readonly id: string;
  readonly name: string;
  /** Non-negative integer; the maximum score for this criterion */
  readonly weight: number;
}

/**
 * Active scoring rubric. Frozen once built.
 */
export interface Rubric {
  /** Criteria in declared order (drives report and column order) */
  readonly criteria: readonly Criterion[];
  readonly allowPartialScoring: boolean;
  /** Share of the weight granted for implicit evidence, within [0, 1] */
  readonly partialRatio: number;
}

export const DEFAULT_ALLOW_PARTIAL_SCORING = true;
export const DEFAULT_PARTIAL_RATIO = 0.5;

// =============================================================================
// Zod Schemas
// =============================================================================

/**
 * Weight: integer-coercible and non-negative. A missing weight counts as 0.
 */
const WeightSchema = z.unknown().transform((value, ctx) => {
  if (value === undefined) return 0;

  const weight = coerceInteger(value);
  if (weight === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Non-integer weight: ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  if (weight < 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Negative weight: ${weight}`,
    });
    return z.NEVER;
  }
  return weight;
});

/**
 * Criterion as written in a policy file
 */
export const CriterionInputSchema = z.object(
  {
    id: z
      .string({
        required_error: 'Missing criterion id',
        invalid_type_error: 'Criterion id must be a string',
      })
      .min(1, 'Empty criterion id'),
    name: z.unknown().transform((value) => (typeof value === 'string' && value.trim() !== '' ? value : undefined)),
    weight: WeightSchema,
  },
  { invalid_type_error: 'Criterion must be an object' }
);

/**
 * Policy document shape. Criteria are validated one by one afterwards so
 * that every failure is reported.
 */
export const PolicyDocumentSchema = z.object(
  {
    criteria: z.array(z.unknown(), {
      required_error: 'Policy declares no criteria',
      invalid_type_error: 'Policy criteria must be a list',
    }),
    allow_partial_scoring: z.unknown(),
    partial_ratio: z.unknown(),
  },
  { invalid_type_error: 'Policy must be an object' }
);

export type CriterionInput = z.input<typeof CriterionInputSchema>;
export type PolicyDocument = z.input<typeof PolicyDocumentSchema>;

// =============================================================================
// Validation
// =============================================================================

/**
 * Outcome of validating an external policy
 */
export type PolicyValidation =
  | {
      valid: true;
      rubric: Rubric;
      issues: [];
      /** Non-fatal notes, e.g. a clamped partial ratio */
      warnings: string[];
    }
  | {
      valid: false;
      issues: string[];
      warnings: string[];
    };

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.map(String).join('.');
    const location = [prefix, path].filter(Boolean).join('.');
    return location ? `${location}: ${issue.message}` : issue.message;
  });
}

/**
 * Build a frozen rubric
 */
export function buildRubric(
  criteria: readonly Criterion[],
  allowPartialScoring: boolean = DEFAULT_ALLOW_PARTIAL_SCORING,
  partialRatio: number = DEFAULT_PARTIAL_RATIO
): Rubric {
  return Object.freeze({
    criteria: Object.freeze(criteria.map((criterion) => Object.freeze({ ...criterion }))),
    allowPartialScoring,
    partialRatio: clampRatio(partialRatio),
  });
}

function clampRatio(ratio: number): number {
  return Math.min(1, Math.max(0, ratio));
}

function readAllowPartial(value: unknown, warnings: string[]): boolean {
  if (value === undefined || value === null) return DEFAULT_ALLOW_PARTIAL_SCORING;
  if (typeof value === 'boolean') return value;
  warnings.push(
    `allow_partial_scoring is not a boolean (${JSON.stringify(value)}); using ${DEFAULT_ALLOW_PARTIAL_SCORING}`
  );
  return DEFAULT_ALLOW_PARTIAL_SCORING;
}

function readPartialRatio(value: unknown, warnings: string[]): number {
  if (value === undefined || value === null) return DEFAULT_PARTIAL_RATIO;

  const ratio = coerceNumber(value);
  if (ratio === undefined) {
    warnings.push(`partial_ratio is not a number (${JSON.stringify(value)}); using ${DEFAULT_PARTIAL_RATIO}`);
    return DEFAULT_PARTIAL_RATIO;
  }

  const clamped = clampRatio(ratio);
  if (clamped !== ratio) {
    warnings.push(`partial_ratio ${ratio} clamped to ${clamped}`);
  }
  return clamped;
}

/**
 * Validate an external policy value.
 *
 * Any duplicate or empty id, non-integer or negative weight, or an empty
 * criteria list makes the policy invalid as a whole.
 */
export function validatePolicy(input: unknown): PolicyValidation {
  const warnings: string[] = [];

  const document = PolicyDocumentSchema.safeParse(input);
  if (!document.success) {
    return { valid: false, issues: formatIssues(document.error), warnings };
  }

  const issues: string[] = [];
  const criteria: Criterion[] = [];
  const seen = new Set<string>();

  if (document.data.criteria.length === 0) {
    issues.push('Policy declares no criteria');
  }

  document.data.criteria.forEach((raw, index) => {
    const parsed = CriterionInputSchema.safeParse(raw);
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error, `criteria[${index}]`));
      return;
    }

    const { id, name, weight } = parsed.data;
    if (seen.has(id)) {
      issues.push(`criteria[${index}].id: Duplicate criterion id: ${id}`);
      return;
    }
    seen.add(id);
    criteria.push({ id, name: name ?? id, weight });
  });

  const allowPartial = readAllowPartial(document.data.allow_partial_scoring, warnings);
  const partialRatio = readPartialRatio(document.data.partial_ratio, warnings);

  if (issues.length > 0) {
    return { valid: false, issues, warnings };
  }

  return {
    valid: true,
    rubric: buildRubric(criteria, allowPartial, partialRatio),
    issues: [],
    warnings,
  };
}

/**
 * Sum of all criterion weights
 */
export function totalWeight(rubric: Rubric): number {
  return rubric.criteria.reduce((sum, criterion) => sum + criterion.weight, 0);
}
