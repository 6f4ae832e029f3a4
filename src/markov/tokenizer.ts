/**
 * Whitespace tokenizer for strings and chunked streams
 */

import { StringDecoder } from 'node:string_decoder';
import { ChainReadError } from './errors.js';
import type { TextSource, Token } from './types.js';

const WHITESPACE = /\s+/;
const TRAILING_WHITESPACE = /\s$/;

/**
 * Split text on runs of whitespace, dropping empty pieces
 */
export function splitTokens(text: string): Token[] {
  return text.split(WHITESPACE).filter((token) => token.length > 0);
}

/**
 * Yield the tokens of a chunked text source in order.
 *
 * A token cut in two by a chunk boundary is held back until the next
 * chunk (or the end of input) completes it. Byte chunks are decoded as
 * UTF-8 without splitting multi-byte characters.
 */
export async function* tokenize(source: TextSource): AsyncGenerator<Token, void, undefined> {
  const decoder = new StringDecoder('utf8');
  let pending = '';

  try {
    for await (const chunk of source) {
      const text = pending + (typeof chunk === 'string' ? chunk : decoder.write(Buffer.from(chunk)));
      const pieces = splitTokens(text);

      pending = '';
      if (pieces.length > 0 && !TRAILING_WHITESPACE.test(text)) {
        pending = pieces.pop() ?? '';
      }
      yield* pieces;
    }
  } catch (error) {
    throw new ChainReadError(error);
  }

  yield* splitTokens(pending + decoder.end());
}
