/**
 * Sliding window over the most recent tokens
 */

import type { PrefixKey, Token } from './types.js';

export const PREFIX_SEPARATOR = ' ';

export function assertOrder(order: number): void {
  if (!Number.isInteger(order) || order < 1) {
    throw new RangeError(`Prefix order must be a positive integer, got ${order}`);
  }
}

/**
 * Fixed-length prefix, starting as `order` empty strings.
 *
 * The leading empty strings key the first tokens of a text, so a builder
 * and a generator of the same order start from the same key.
 */
export class Prefix {
  private readonly words: Token[];

  constructor(order: number) {
    assertOrder(order);
    this.words = Array.from({ length: order }, () => '');
  }

  get order(): number {
    return this.words.length;
  }

  /**
   * Drop the oldest token and append `word`
   */
  shift(word: Token): void {
    this.words.copyWithin(0, 1);
    this.words[this.words.length - 1] = word;
  }

  key(): PrefixKey {
    return this.words.join(PREFIX_SEPARATOR);
  }

  toArray(): readonly Token[] {
    return [...this.words];
  }

  toString(): string {
    return this.key();
  }
}
