/**
 * Policy Loader
 *
 * Resolves the active rubric from an optional JSON or YAML policy file.
 * Every failure (missing file, unreadable file, malformed content, invalid
 * criteria) is logged as a warning and resolves to the built-in rubric.
 *
 * @module @scorecard/core/rubric/loader
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { getLogger, type Logger } from '../telemetry/logger.js';
import { PolicyInvalidError, toDiagnostic } from '../reliability/errors.js';
import { DEFAULT_RUBRIC } from './defaults.js';
import { validatePolicy, type Rubric } from './schema.js';

// =============================================================================
// Types
// =============================================================================

export type RubricSource = 'custom' | 'default';

export interface PolicyLoadResult {
  rubric: Rubric;
  /** Whether the external policy was used or the built-in one */
  source: RubricSource;
  /** Absolute path (or label) of the policy that was considered */
  origin?: string;
  /** Reasons the external policy was rejected */
  issues: string[];
  /** Non-fatal notes about ignored or clamped settings */
  warnings: string[];
}

export interface PolicyLoadOptions {
  /** Label used in diagnostics */
  origin?: string;
  logger?: Logger;
}

// =============================================================================
// Resolution
// =============================================================================

function fallback(
  error: PolicyInvalidError,
  logger: Logger,
  warnings: string[] = []
): PolicyLoadResult {
  logger.warn(`${error.message}. Using the default rubric`, {
    eventName: 'policy.fallback',
    diagnostic: toDiagnostic(error),
  });
  return {
    rubric: DEFAULT_RUBRIC,
    source: 'default',
    origin: error.source,
    issues: error.issues.length > 0 ? error.issues : [error.message],
    warnings,
  };
}

/**
 * Validate an already-parsed policy value and fall back to the default
 * rubric when it is invalid.
 */
export function resolvePolicy(input: unknown, options: PolicyLoadOptions = {}): PolicyLoadResult {
  const logger = options.logger ?? getLogger();
  const validation = validatePolicy(input);

  for (const warning of validation.warnings) {
    logger.warn('Policy setting adjusted', {
      eventName: 'policy.setting_adjusted',
      origin: options.origin,
      detail: warning,
    });
  }

  if (!validation.valid) {
    for (const issue of validation.issues) {
      logger.warn('Policy validation failed', {
        eventName: 'policy.validation_failed',
        origin: options.origin,
        issue,
      });
    }
    return fallback(
      new PolicyInvalidError('Policy invalid', { issues: validation.issues, source: options.origin }),
      logger,
      validation.warnings
    );
  }

  logger.debug('Policy loaded', {
    eventName: 'policy.loaded',
    origin: options.origin,
    criteria: validation.rubric.criteria.length,
  });

  return {
    rubric: validation.rubric,
    source: 'custom',
    origin: options.origin,
    issues: [],
    warnings: validation.warnings,
  };
}

/**
 * Parse policy text; YAML for .yaml/.yml files, JSON otherwise
 */
export function parsePolicyText(content: string, filePath: string): unknown {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    return yaml.parse(content);
  }
  return JSON.parse(content);
}

/**
 * Load the rubric from a policy file.
 *
 * Never throws: every failure resolves to the default rubric.
 */
export function loadPolicy(policyPath: string | undefined, options: PolicyLoadOptions = {}): PolicyLoadResult {
  const logger = options.logger ?? getLogger();

  if (!policyPath) {
    return fallback(new PolicyInvalidError('No policy configured'), logger);
  }

  const absolutePath = path.resolve(policyPath);

  if (!fs.existsSync(absolutePath)) {
    return fallback(
      new PolicyInvalidError(`Policy file not found: ${absolutePath}`, { source: absolutePath }),
      logger
    );
  }

  let parsed: unknown;
  try {
    const content = fs.readFileSync(absolutePath, 'utf-8');
    parsed = parsePolicyText(content, absolutePath);
  } catch (error) {
    return fallback(
      new PolicyInvalidError(
        `Failed to load policy '${absolutePath}': ${error instanceof Error ? error.message : String(error)}`,
        { source: absolutePath, cause: error instanceof Error ? error : undefined }
      ),
      logger
    );
  }

  return resolvePolicy(parsed, { origin: absolutePath, logger });
}
