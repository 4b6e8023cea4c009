/**
 * Config Module
 *
 * @module @scorecard/core/config
 */

export {
  DEFAULT_CONFIG_FILES,
  RunConfigSchema,
  resolveRunConfig,
  findConfigFile,
  readConfigFile,
  loadRunConfig,
  type RunConfig,
  type RunConfigInput,
  type LoadRunConfigOptions,
} from './run-config.js';
