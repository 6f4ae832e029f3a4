import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { splitTokens, tokenize } from '../../../src/markov/tokenizer.js';
import { ChainReadError } from '../../../src/markov/errors.js';
import { createFailingReadable } from '../../helpers/streams.js';

async function collect(source: AsyncIterable<string | Uint8Array>): Promise<string[]> {
  const tokens: string[] = [];
  for await (const token of tokenize(source)) {
    tokens.push(token);
  }
  return tokens;
}

describe('splitTokens', () => {
  it('splits on any run of whitespace', () => {
    expect(splitTokens('a  b\tc\n\nd\r\ne')).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('never yields empty tokens', () => {
    expect(splitTokens('   leading and trailing   ')).toEqual(['leading', 'and', 'trailing']);
    expect(splitTokens('')).toEqual([]);
    expect(splitTokens(' \n\t ')).toEqual([]);
  });

  it('keeps punctuation attached to words', () => {
    expect(splitTokens('Hello, world! "quoted"')).toEqual(['Hello,', 'world!', '"quoted"']);
  });
});

describe('tokenize', () => {
  it('tokenizes string chunks', async () => {
    expect(await collect(Readable.from(['one two ', 'three\n']))).toEqual(['one', 'two', 'three']);
  });

  it('joins a token split across chunks', async () => {
    expect(await collect(Readable.from(['the qu', 'ick br', 'own fox']))).toEqual([
      'the',
      'quick',
      'brown',
      'fox',
    ]);
  });

  it('separates tokens when a chunk ends in whitespace', async () => {
    expect(await collect(Readable.from(['ab ', 'cd']))).toEqual(['ab', 'cd']);
  });

  it('separates tokens when a chunk starts with whitespace', async () => {
    expect(await collect(Readable.from(['ab', '\ncd']))).toEqual(['ab', 'cd']);
  });

  it('decodes multi-byte characters split across byte chunks', async () => {
    const bytes = Buffer.from('café naïve', 'utf8');
    // 'é' is two bytes at offsets 3 and 4
    const chunks = [bytes.subarray(0, 4), bytes.subarray(4)];

    expect(await collect(Readable.from(chunks))).toEqual(['café', 'naïve']);
  });

  it('yields nothing for empty or blank input', async () => {
    expect(await collect(Readable.from([]))).toEqual([]);
    expect(await collect(Readable.from(['  ', '\n']))).toEqual([]);
  });

  it('wraps a read failure in ChainReadError', async () => {
    const source = createFailingReadable(['alpha beta '], 'device unplugged');

    const error = await collect(source).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ChainReadError);
    expect((error as ChainReadError).message).toBe('Failed to read input: device unplugged');
    expect((error as ChainReadError).cause).toBeInstanceOf(Error);
  });
});
