/**
 * Built-in rubric, used whenever no valid external policy is available.
 * Weights sum to 100.
 */

import { buildRubric, type Criterion, type Rubric } from './schema.js';

export const DEFAULT_CRITERIA: readonly Criterion[] = [
  { id: 'real_time_transparency', name: 'Real-Time Transparency', weight: 15 },
  { id: 'explainability', name: 'Explainability', weight: 15 },
  { id: 'accountability', name: 'Accountability', weight: 15 },
  { id: 'human_oversight', name: 'Human Oversight', weight: 10 },
  { id: 'privacy', name: 'Privacy', weight: 15 },
  { id: 'data_protection', name: 'Data Protection', weight: 15 },
  {
    id: 'continuous_ethics_monitoring',
    name: 'Continuous Ethical Monitoring (Lifecycle Governance)',
    weight: 15,
  },
];

export const DEFAULT_RUBRIC: Rubric = buildRubric(DEFAULT_CRITERIA, true, 0.5);
