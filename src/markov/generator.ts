/**
 * Text generation by walking a built chain
 */

import type { Writable } from 'node:stream';
import { ChainWriteError } from './errors.js';
import { Prefix } from './prefix.js';
import { createRandomSource, pickIndex } from './random.js';
import type {
  GenerateResult,
  RandomSource,
  ReadonlyChain,
  Token,
  WriteResult,
} from './types.js';

type WalkOutcome = GenerateResult['outcome'];

function assertMaxTokens(maxTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens < 0) {
    throw new RangeError(`maxTokens must be a non-negative integer, got ${maxTokens}`);
  }
}

/**
 * Write `chunk` and wait until the sink acknowledges it
 */
export function writeChunk(output: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    // The stream emits 'error' after the callback fails; keep a listener
    // attached until then so the event has a handler.
    const onError = (error: Error) => reject(error);
    output.once('error', onError);
    output.write(chunk, (error) => {
      if (error) {
        reject(error);
        return;
      }
      output.off('error', onError);
      resolve();
    });
  });
}

/**
 * Generates token sequences from a chain without modifying it.
 * Every walk starts from a fresh prefix, so one generator can be reused.
 */
export class ChainGenerator {
  constructor(
    private readonly chain: ReadonlyChain,
    private readonly random: RandomSource = createRandomSource()
  ) {}

  /**
   * Yield up to `maxTokens` tokens; the return value tells why the walk
   * stopped.
   */
  *walk(maxTokens: number): Generator<Token, WalkOutcome, undefined> {
    assertMaxTokens(maxTokens);
    const prefix = new Prefix(this.chain.order);

    for (let i = 0; i < maxTokens; i++) {
      const candidates = this.chain.get(prefix.key());
      if (!candidates || candidates.length === 0) {
        return 'exhausted';
      }

      const next = candidates[pickIndex(this.random, candidates.length)];
      if (next === undefined) {
        return 'exhausted';
      }

      yield next;
      prefix.shift(next);
    }

    return 'limit';
  }

  generate(maxTokens: number): GenerateResult {
    const tokens: Token[] = [];
    const walker = this.walk(maxTokens);

    let step = walker.next();
    while (!step.done) {
      tokens.push(step.value);
      step = walker.next();
    }

    return { tokens, outcome: step.value };
  }

  /**
   * Write each generated token followed by a space, in order.
   * A rejected write aborts the run with ChainWriteError.
   */
  async writeTo(output: Writable, maxTokens: number): Promise<WriteResult> {
    const walker = this.walk(maxTokens);
    let emitted = 0;

    let step = walker.next();
    while (!step.done) {
      try {
        await writeChunk(output, `${step.value} `);
      } catch (error) {
        throw new ChainWriteError(error, emitted);
      }
      emitted++;
      step = walker.next();
    }

    return { emitted, outcome: step.value };
  }
}

/**
 * Generate at most `maxTokens` tokens from `chain`
 */
export function generate(
  chain: ReadonlyChain,
  maxTokens: number,
  random?: RandomSource
): Token[] {
  return new ChainGenerator(chain, random).generate(maxTokens).tokens;
}
