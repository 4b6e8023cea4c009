/**
 * Rubric Module
 *
 * @module @scorecard/core/rubric
 */

export {
  DEFAULT_ALLOW_PARTIAL_SCORING,
  DEFAULT_PARTIAL_RATIO,
  CriterionInputSchema,
  PolicyDocumentSchema,
  buildRubric,
  validatePolicy,
  totalWeight,
  type Criterion,
  type Rubric,
  type CriterionInput,
  type PolicyDocument,
  type PolicyValidation,
} from './schema.js';

export { DEFAULT_CRITERIA, DEFAULT_RUBRIC } from './defaults.js';

export {
  resolvePolicy,
  parsePolicyText,
  loadPolicy,
  type RubricSource,
  type PolicyLoadResult,
  type PolicyLoadOptions,
} from './loader.js';
