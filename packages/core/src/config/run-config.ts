/**
 * Run Configuration
 *
 * Everything a scoring run needs (paths, policy, top-K size, scoring mode)
 * is carried in an explicit RunConfig value rather than process-wide state.
 *
 * Sources, lowest to highest precedence:
 * 1. Built-in defaults
 * 2. A config file (`--config`, or scorecard.config.{yaml,yml,json} in cwd)
 * 3. Explicit overrides (CLI flags)
 *
 * Relative paths resolve against the working directory.
 *
 * @module @scorecard/core/config/run-config
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../reliability/errors.js';
import { isRecord } from '../evidence/coerce.js';
import { SCORING_MODES, type ScoringMode } from '../scoring/strategy.js';

// =============================================================================
// Schema
// =============================================================================

export const DEFAULT_CONFIG_FILES = [
  'scorecard.config.yaml',
  'scorecard.config.yml',
  'scorecard.config.json',
] as const;

export const RunConfigSchema = z
  .object({
    /** Directory holding one JSON document per file */
    papersDir: z.string().min(1).default('data/papers_json'),
    /** Optional policy file; missing or invalid falls back to the default rubric */
    policyPath: z.string().min(1).default('policy/checklist.json'),
    /** Directory for scores.csv and summary.md */
    outDir: z.string().min(1).default('results'),
    /** Directory for per-document reports (default: <outDir>/reports) */
    reportsDir: z.string().min(1).optional(),
    /** Number of documents in the ranking */
    topK: z.number().int().positive().default(5),
    /** Scoring strategy applied to the whole run */
    mode: z.enum(SCORING_MODES).default('basic'),
    /** Extended mode: tag → additive bonus, merged over the built-in table */
    evidenceTypeBonuses: z.record(z.number().finite().nonnegative()).default({}),
    /** Evidence pointers listed per criterion in reports */
    maxPointersPerCriterion: z.number().int().nonnegative().default(8),
  })
  .strict();

export type RunConfigInput = z.input<typeof RunConfigSchema>;

/**
 * Resolved run configuration with absolute paths
 */
export interface RunConfig {
  papersDir: string;
  policyPath: string;
  outDir: string;
  reportsDir: string;
  topK: number;
  mode: ScoringMode;
  evidenceTypeBonuses: Record<string, number>;
  maxPointersPerCriterion: number;
}

export interface LoadRunConfigOptions {
  /** Explicit config file; an error when it does not exist */
  configPath?: string;
  /** Values that win over the config file; undefined entries are ignored */
  overrides?: Partial<RunConfigInput>;
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
}

// =============================================================================
// Resolution
// =============================================================================

function mergeOverrides(
  base: Record<string, unknown>,
  overrides: Partial<RunConfigInput>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Validate a config value and resolve its paths
 *
 * @throws ConfigurationError when a field is invalid
 */
export function resolveRunConfig(input: unknown, cwd: string = process.cwd()): RunConfig {
  const result = RunConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of result.error.errors) {
      fieldErrors[issue.path.join('.') || '(root)'] = issue.message;
    }
    const details = Object.entries(fieldErrors)
      .map(([field, message]) => `  - ${field}: ${message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid run configuration:\n${details}`, { fieldErrors });
  }

  const config = result.data;
  const outDir = path.resolve(cwd, config.outDir);

  return {
    papersDir: path.resolve(cwd, config.papersDir),
    policyPath: path.resolve(cwd, config.policyPath),
    outDir,
    reportsDir: config.reportsDir ? path.resolve(cwd, config.reportsDir) : path.join(outDir, 'reports'),
    topK: config.topK,
    mode: config.mode,
    evidenceTypeBonuses: config.evidenceTypeBonuses,
    maxPointersPerCriterion: config.maxPointersPerCriterion,
  };
}

/**
 * Find the config file to read, if any
 */
export function findConfigFile(cwd: string, configPath?: string): string | undefined {
  if (configPath) {
    const absolutePath = path.resolve(cwd, configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigurationError(`Config file not found: ${absolutePath}`);
    }
    return absolutePath;
  }

  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Read a config file (YAML or JSON)
 *
 * @throws ConfigurationError when unreadable or not a mapping
 */
export function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error instanceof Error ? error : undefined }
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

/**
 * Load the run configuration from defaults, config file and overrides
 */
export function loadRunConfig(options: LoadRunConfigOptions = {}): RunConfig {
  const cwd = options.cwd ?? process.cwd();
  const configFile = findConfigFile(cwd, options.configPath);
  const fileValues = configFile ? readConfigFile(configFile) : {};

  return resolveRunConfig(mergeOverrides(fileValues, options.overrides ?? {}), cwd);
}
