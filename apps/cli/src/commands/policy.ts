/**
 * scorecard policy command
 *
 * Inspect the active rubric and validate policy files.
 */

import chalk from 'chalk';
import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import {
  PolicyInvalidError,
  loadPolicy,
  loadRunConfig,
  parsePolicyText,
  totalWeight,
  validatePolicy,
  type PolicyLoadResult,
  type PolicyValidation,
  type Rubric,
} from '@scorecard/core';
import { createCliLogger } from '../logging.js';

export interface PolicyShowOptions {
  config?: string;
  policy?: string;
  json?: boolean;
  verbose?: boolean;
  cwd?: string;
}

export interface PolicyValidateOptions {
  json?: boolean;
  cwd?: string;
}

function rubricToJson(rubric: Rubric) {
  return {
    criteria: rubric.criteria.map((criterion) => ({
      id: criterion.id,
      name: criterion.name,
      weight: criterion.weight,
    })),
    allow_partial_scoring: rubric.allowPartialScoring,
    partial_ratio: rubric.partialRatio,
    total_weight: totalWeight(rubric),
  };
}

function printRubric(rubric: Rubric): void {
  const idWidth = Math.max(2, ...rubric.criteria.map((criterion) => criterion.id.length));

  for (const criterion of rubric.criteria) {
    const weight = String(criterion.weight).padStart(4);
    console.log(`    ${criterion.id.padEnd(idWidth)} ${weight}  ${chalk.dim(criterion.name)}`);
  }
  console.log();
  console.log(`  Total weight:     ${totalWeight(rubric)}`);
  console.log(`  Partial scoring:  ${rubric.allowPartialScoring ? 'enabled' : 'disabled'}`);
  console.log(`  Partial ratio:    ${rubric.partialRatio}`);
}

/**
 * scorecard policy show - print the rubric a run would use
 */
export async function policyShowCommand(options: PolicyShowOptions = {}): Promise<PolicyLoadResult> {
  const config = loadRunConfig({
    configPath: options.config,
    overrides: { policyPath: options.policy },
    cwd: options.cwd,
  });
  const result = loadPolicy(config.policyPath, { logger: createCliLogger(options.verbose) });

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          source: result.source,
          origin: result.origin,
          ...rubricToJson(result.rubric),
          issues: result.issues,
          warnings: result.warnings,
        },
        null,
        2
      )
    );
    return result;
  }

  console.log();
  if (result.source === 'custom') {
    console.log(chalk.bold(`  Rubric from ${result.origin ?? config.policyPath}`));
  } else {
    console.log(chalk.bold('  Built-in default rubric'));
    for (const issue of result.issues) {
      console.log(chalk.yellow(`  ! ${issue}`));
    }
  }
  for (const warning of result.warnings) {
    console.log(chalk.yellow(`  ! ${warning}`));
  }
  console.log();
  printRubric(result.rubric);
  console.log();

  return result;
}

/**
 * scorecard policy validate <file> - check a policy file without falling back
 *
 * @throws PolicyInvalidError when the file is missing, unparseable or invalid
 */
export async function policyValidateCommand(
  file: string,
  options: PolicyValidateOptions = {}
): Promise<PolicyValidation> {
  const fullPath = resolve(options.cwd ?? process.cwd(), file);

  if (!existsSync(fullPath)) {
    throw new PolicyInvalidError(`Policy file not found: ${fullPath}`, { source: fullPath });
  }

  let parsed: unknown;
  try {
    parsed = parsePolicyText(readFileSync(fullPath, 'utf-8'), fullPath);
  } catch (error) {
    throw new PolicyInvalidError(
      `Failed to parse policy '${fullPath}': ${error instanceof Error ? error.message : String(error)}`,
      { source: fullPath, cause: error instanceof Error ? error : undefined }
    );
  }

  const validation = validatePolicy(parsed);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          file: fullPath,
          valid: validation.valid,
          issues: validation.issues,
          warnings: validation.warnings,
          ...(validation.valid ? rubricToJson(validation.rubric) : {}),
        },
        null,
        2
      )
    );
  } else if (validation.valid) {
    console.log();
    console.log(chalk.green(`  ✓ ${fullPath} is valid`));
    for (const warning of validation.warnings) {
      console.log(chalk.yellow(`  ! ${warning}`));
    }
    console.log();
    printRubric(validation.rubric);
    console.log();
  } else {
    console.log();
    console.log(chalk.red(`  ✗ ${fullPath} is invalid`));
    for (const issue of validation.issues) {
      console.log(`    - ${issue}`);
    }
    for (const warning of validation.warnings) {
      console.log(chalk.yellow(`  ! ${warning}`));
    }
    console.log();
  }

  if (!validation.valid) {
    throw new PolicyInvalidError(`Policy ${fullPath} is invalid`, {
      issues: validation.issues,
      source: fullPath,
    });
  }

  return validation;
}
