/**
 * scorecard score command
 *
 * Scores every document in the papers directory against the active rubric
 * and writes per-document reports, scores.csv and summary.md.
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ConfigurationError,
  SCORING_MODES,
  isScoringMode,
  loadRunConfig,
  runScoring,
  type RunConfigInput,
  type RunSummary,
} from '@scorecard/core';
import { createCliLogger } from '../logging.js';

export interface ScoreOptions {
  config?: string;
  papersDir?: string;
  policy?: string;
  outDir?: string;
  reportsDir?: string;
  top?: string;
  mode?: string;
  dryRun?: boolean;
  json?: boolean;
  verbose?: boolean;
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
}

/**
 * Map CLI flags onto run config overrides
 */
export function buildOverrides(options: ScoreOptions): Partial<RunConfigInput> {
  let mode: RunConfigInput['mode'];
  if (options.mode !== undefined) {
    if (!isScoringMode(options.mode)) {
      throw new ConfigurationError(
        `Unknown scoring mode '${options.mode}' (expected ${SCORING_MODES.join(' or ')})`,
        { fieldErrors: { mode: `Unknown scoring mode '${options.mode}'` } }
      );
    }
    mode = options.mode;
  }

  let topK: number | undefined;
  if (options.top !== undefined) {
    topK = Number(options.top);
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ConfigurationError(`--top must be a positive integer, got '${options.top}'`, {
        fieldErrors: { topK: `Invalid value '${options.top}'` },
      });
    }
  }

  return {
    papersDir: options.papersDir,
    policyPath: options.policy,
    outDir: options.outDir,
    reportsDir: options.reportsDir,
    topK,
    mode,
  };
}

function printSummary(summary: RunSummary): void {
  const rubricLabel =
    summary.rubricSource === 'custom' && summary.policyOrigin ? summary.policyOrigin : 'built-in default';

  console.log();
  console.log(chalk.bold('  Scorecard Run'));
  console.log(chalk.dim(`  ${summary.runId}`));
  console.log();
  console.log(`  Mode:     ${summary.mode}`);
  console.log(`  Rubric:   ${rubricLabel} (${summary.criteria.length} criteria)`);
  console.log(`  Scored:   ${summary.documentsScored}`);

  if (summary.documentsSkipped > 0) {
    console.log(chalk.yellow(`  Skipped:  ${summary.documentsSkipped}`));
    for (const entry of summary.skipped) {
      console.log(chalk.dim(`    - ${entry.origin}: ${entry.reason}`));
    }
  }

  console.log();
  console.log(chalk.bold(`  Top ${summary.topK}`));
  for (const entry of summary.ranking) {
    console.log(`    ${entry.rank}. ${entry.documentId} — ${entry.totalScore}`);
  }

  if (summary.outputs) {
    console.log();
    console.log(chalk.dim(`  Scores:   ${summary.outputs.scoresCsv}`));
    console.log(chalk.dim(`  Summary:  ${summary.outputs.summary}`));
    console.log(chalk.dim(`  Reports:  ${summary.outputs.reportsDir}`));
    if (summary.outputs.failedWrites.length > 0) {
      console.log(chalk.red(`  Failed writes: ${summary.outputs.failedWrites.length}`));
    }
  }
  console.log();
}

/**
 * scorecard score - run a batch scoring pass
 */
export async function scoreCommand(options: ScoreOptions = {}): Promise<RunSummary> {
  const spinner = ora({ isSilent: options.json });
  const logger = createCliLogger(options.verbose);

  try {
    spinner.start('Loading configuration...');
    const config = loadRunConfig({
      configPath: options.config,
      overrides: buildOverrides(options),
      cwd: options.cwd,
    });

    spinner.text = `Scoring documents in ${config.papersDir}...`;
    const summary = runScoring(config, { logger, source: 'cli', dryRun: options.dryRun });

    if (summary.documentsSkipped > 0) {
      spinner.warn(`Scored ${summary.documentsScored} document(s), skipped ${summary.documentsSkipped}`);
    } else {
      spinner.succeed(`Scored ${summary.documentsScored} document(s)`);
    }

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            runId: summary.runId,
            mode: summary.mode,
            rubricSource: summary.rubricSource,
            policyOrigin: summary.policyOrigin,
            documentsScored: summary.documentsScored,
            documentsSkipped: summary.documentsSkipped,
            skipped: summary.skipped,
            ranking: summary.ranking,
            rows: summary.rows,
            outputs: summary.outputs,
            durationMs: summary.durationMs,
          },
          null,
          2
        )
      );
    } else {
      printSummary(summary);
    }

    return summary;
  } catch (error) {
    spinner.fail('Scoring failed');
    throw error;
  }
}
