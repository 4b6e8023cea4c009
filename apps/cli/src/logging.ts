/**
 * CLI logger setup
 *
 * Diagnostics below WARNING are hidden unless `--verbose` is given or
 * LOG_LEVEL asks for them.
 */

import { createLogger, parseSeverity, type Logger } from '@scorecard/core';

export const CLI_SERVICE_NAME = 'scorecard-cli';

export function createCliLogger(verbose = false): Logger {
  return createLogger(CLI_SERVICE_NAME, {
    minSeverity: verbose ? 'DEBUG' : parseSeverity(process.env.LOG_LEVEL) ?? 'WARNING',
    prettyPrint: false,
  });
}
