/**
 * Summary statistics for a built chain
 */

import type { ChainStats, ChainStatsOptions, PrefixStats, ReadonlyChain } from './types.js';
import { DEFAULT_TOP_PREFIXES } from './types.js';

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function getChainStats(chain: ReadonlyChain, options: ChainStatsOptions = {}): ChainStats {
  const top = options.top ?? DEFAULT_TOP_PREFIXES;
  const vocabulary = new Set<string>();
  const prefixes: PrefixStats[] = [];
  let maxSuffixes = 0;

  for (const [prefix, suffixes] of chain.entries()) {
    for (const token of suffixes) {
      vocabulary.add(token);
    }
    maxSuffixes = Math.max(maxSuffixes, suffixes.length);
    prefixes.push({
      prefix,
      suffixCount: suffixes.length,
      distinctSuffixes: new Set(suffixes).size,
    });
  }

  prefixes.sort((a, b) => b.suffixCount - a.suffixCount || compareKeys(a.prefix, b.prefix));

  const avg = chain.size === 0 ? 0 : chain.transitionCount / chain.size;

  return {
    order: chain.order,
    totalPrefixes: chain.size,
    totalTransitions: chain.transitionCount,
    distinctTokens: vocabulary.size,
    avgSuffixesPerPrefix: Math.round(avg * 100) / 100,
    maxSuffixesPerPrefix: maxSuffixes,
    topPrefixes: prefixes.slice(0, Math.max(top, 0)),
  };
}
