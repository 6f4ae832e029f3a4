/**
 * Type definitions for the word chain model
 */

/**
 * A whitespace-delimited unit of text
 */
export type Token = string;

/**
 * Canonical form of a prefix: its tokens joined by a single space
 */
export type PrefixKey = string;

/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Read-only view of a built chain, as handed to generators
 */
export interface ReadonlyChain {
  /** Number of tokens in every prefix */
  readonly order: number;
  /** Number of distinct prefixes */
  readonly size: number;
  /** Number of recorded follow-on tokens across all prefixes */
  readonly transitionCount: number;
  get(key: PrefixKey): readonly Token[] | undefined;
  has(key: PrefixKey): boolean;
  keys(): IterableIterator<PrefixKey>;
  entries(): IterableIterator<[PrefixKey, readonly Token[]]>;
}

/**
 * Why a generation run stopped
 *
 * - `exhausted`: the current prefix has no recorded continuation
 * - `limit`: the token budget was used up
 * - `write-error`: the output sink rejected a write
 */
export type GenerationOutcome = 'exhausted' | 'limit' | 'write-error';

export interface GenerateResult {
  tokens: Token[];
  outcome: Exclude<GenerationOutcome, 'write-error'>;
}

export interface WriteResult {
  emitted: number;
  outcome: Exclude<GenerationOutcome, 'write-error'>;
}

/**
 * Chunks accepted by the stream tokenizer (a Node Readable qualifies)
 */
export type TextSource = AsyncIterable<string | Uint8Array>;

export interface PrefixStats {
  prefix: PrefixKey;
  suffixCount: number;
  distinctSuffixes: number;
}

/**
 * Statistics for a built chain
 */
export interface ChainStats {
  order: number;
  totalPrefixes: number;
  totalTransitions: number;
  distinctTokens: number;
  avgSuffixesPerPrefix: number;
  maxSuffixesPerPrefix: number;
  topPrefixes: PrefixStats[];
}

export interface ChainStatsOptions {
  /** Number of prefixes listed in `topPrefixes`, default 10 */
  top?: number;
}

export const DEFAULT_ORDER = 2;
export const DEFAULT_MAX_TOKENS = 100;
export const DEFAULT_TOP_PREFIXES = 10;
