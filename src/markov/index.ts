/**
 * Word chain model: build a prefix to suffix map from text and walk it
 * to generate new text
 */

// Type exports
export type {
  Token,
  PrefixKey,
  RandomSource,
  ReadonlyChain,
  GenerationOutcome,
  GenerateResult,
  WriteResult,
  TextSource,
  PrefixStats,
  ChainStats,
  ChainStatsOptions,
} from './types.js';

export { DEFAULT_ORDER, DEFAULT_MAX_TOKENS, DEFAULT_TOP_PREFIXES } from './types.js';

export { WordChainError, ChainReadError, ChainWriteError } from './errors.js';

// Model
export { Prefix, PREFIX_SEPARATOR } from './prefix.js';
export { Chain } from './chain.js';

// Build
export { splitTokens, tokenize } from './tokenizer.js';
export { ChainBuilder, buildChain, buildChainFromText } from './builder.js';

// Generate
export { createRandomSource, pickIndex } from './random.js';
export { ChainGenerator, generate, writeChunk } from './generator.js';

export { getChainStats } from './stats.js';
