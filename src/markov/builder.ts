/**
 * Chain construction from a token stream
 */

import { Chain } from './chain.js';
import { Prefix } from './prefix.js';
import { splitTokens, tokenize } from './tokenizer.js';
import type { TextSource, Token } from './types.js';

/**
 * Fills a chain one token at a time.
 *
 * Holds nothing but the chain being filled and the prefix of the tokens
 * read so far.
 */
export class ChainBuilder {
  private readonly target: Chain;
  private readonly prefix: Prefix;

  constructor(order: number) {
    this.target = new Chain(order);
    this.prefix = new Prefix(order);
  }

  get chain(): Chain {
    return this.target;
  }

  add(token: Token): void {
    this.target.record(this.prefix.key(), token);
    this.prefix.shift(token);
  }

  addAll(tokens: Iterable<Token>): this {
    for (const token of tokens) {
      this.add(token);
    }
    return this;
  }
}

/**
 * Build a chain from a text stream, reading until it ends.
 * Rejects with ChainReadError if the stream fails.
 */
export async function buildChain(source: TextSource, order: number): Promise<Chain> {
  const builder = new ChainBuilder(order);
  for await (const token of tokenize(source)) {
    builder.add(token);
  }
  return builder.chain;
}

export function buildChainFromText(text: string, order: number): Chain {
  return new ChainBuilder(order).addAll(splitTokens(text)).chain;
}
