/**
 * Config module exports
 */

export {
  configSchema,
  cliOverridesSchema,
  type Config,
  type CliOverrides,
} from './schema.js';

export {
  CONFIG_FILE_NAMES,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  applyOverrides,
  resolveConfig,
  type ResolveConfigOptions,
} from './loader.js';
