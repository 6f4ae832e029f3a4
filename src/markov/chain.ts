/**
 * Prefix to follow-on token mapping
 */

import { assertOrder } from './prefix.js';
import type { PrefixKey, ReadonlyChain, Token } from './types.js';

/**
 * Map of prefix keys to every token observed after them.
 *
 * Follow-on lists are append-only and keep duplicates, so a token seen
 * three times after a prefix occupies three slots and is three times as
 * likely to be picked. A key only exists once a token has been recorded
 * for it.
 */
export class Chain implements ReadonlyChain {
  readonly order: number;
  private readonly suffixes = new Map<PrefixKey, Token[]>();
  private transitions = 0;

  constructor(order: number) {
    assertOrder(order);
    this.order = order;
  }

  get size(): number {
    return this.suffixes.size;
  }

  get transitionCount(): number {
    return this.transitions;
  }

  /**
   * Record `token` as observed after the prefix `key`
   */
  record(key: PrefixKey, token: Token): void {
    const existing = this.suffixes.get(key);
    if (existing) {
      existing.push(token);
    } else {
      this.suffixes.set(key, [token]);
    }
    this.transitions++;
  }

  get(key: PrefixKey): readonly Token[] | undefined {
    return this.suffixes.get(key);
  }

  has(key: PrefixKey): boolean {
    return this.suffixes.has(key);
  }

  keys(): IterableIterator<PrefixKey> {
    return this.suffixes.keys();
  }

  entries(): IterableIterator<[PrefixKey, readonly Token[]]> {
    return this.suffixes.entries();
  }

  /**
   * Plain-object copy, mainly for assertions and JSON output
   */
  toJSON(): Record<PrefixKey, Token[]> {
    const out: Record<PrefixKey, Token[]> = {};
    for (const [key, tokens] of this.suffixes) {
      out[key] = [...tokens];
    }
    return out;
  }
}
