#!/usr/bin/env node

/**
 * Evidence Scorecard CLI
 *
 * Scores JSON evidence documents against a weighted rubric.
 *
 * Commands:
 *   scorecard score                  Score every document and write reports
 *   scorecard policy show            Show the rubric a run would use
 *   scorecard policy validate <file> Validate a policy file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { toExitCode } from '@scorecard/core';
import { scoreCommand } from './commands/score.js';
import { policyShowCommand, policyValidateCommand } from './commands/policy.js';

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(toExitCode(error));
}

const program = new Command();

program
  .name('scorecard')
  .description('Evidence Scorecard - rubric scoring for research documents')
  .version('0.1.0');

// =============================================================================
// Scoring
// =============================================================================

program
  .command('score')
  .description('Score every JSON document in the papers directory')
  .option('-c, --config <file>', 'Run config file (YAML or JSON)')
  .option('--papers-dir <dir>', 'Directory of JSON documents')
  .option('--policy <file>', 'Policy file with weighted criteria')
  .option('--out-dir <dir>', 'Directory for scores.csv and summary.md')
  .option('--reports-dir <dir>', 'Directory for per-document reports')
  .option('--top <n>', 'Number of documents in the ranking')
  .option('--mode <mode>', 'Scoring mode: basic or extended')
  .option('--dry-run', 'Score without writing any files')
  .option('--json', 'Output as JSON')
  .option('-v, --verbose', 'Show debug diagnostics')
  .action(async (options) => {
    try {
      await scoreCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Policy
// =============================================================================

const policyCmd = program
  .command('policy')
  .description('Inspect and validate scoring policies');

policyCmd
  .command('show')
  .description('Show the rubric a run would use')
  .option('-c, --config <file>', 'Run config file (YAML or JSON)')
  .option('--policy <file>', 'Policy file with weighted criteria')
  .option('--json', 'Output as JSON')
  .option('-v, --verbose', 'Show debug diagnostics')
  .action(async (options) => {
    try {
      await policyShowCommand(options);
    } catch (error) {
      fail(error);
    }
  });

policyCmd
  .command('validate <file>')
  .description('Validate a policy file')
  .option('--json', 'Output as JSON')
  .action(async (file, options) => {
    try {
      await policyValidateCommand(file, options);
    } catch (error) {
      fail(error);
    }
  });

program.addHelpText('after', `
Exit codes:
  0   Success
  10  Policy invalid (policy validate)
  20  No JSON documents found
  21  Invalid run configuration
  1   Unexpected error

Environment:
  LOG_LEVEL   Minimum diagnostic severity (DEBUG, INFO, NOTICE, WARNING, ERROR)
`);

// Parse and execute
program.parseAsync().catch(fail);
