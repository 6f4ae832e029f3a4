/**
 * wordchain - Markov chain text generation
 *
 * Builds a map from fixed-length word prefixes to the words observed
 * after them, then walks that map at random to produce new text.
 */

// Model, build and generate
export * from './markov/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  resolveConfig,
  type Config,
} from './config/index.js';
