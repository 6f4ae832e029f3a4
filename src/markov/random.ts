/**
 * Random sources for generation
 */

import seedrandom from 'seedrandom';
import type { RandomSource } from './types.js';

/**
 * Create a PRNG. The same seed always yields the same sequence; without
 * one the generator is seeded from the current time.
 */
export function createRandomSource(seed?: string): RandomSource {
  const prng = seedrandom(seed ?? `${Date.now()}:${process.hrtime.bigint()}`);
  return () => prng();
}

/**
 * Uniform index into a collection of `length` items
 */
export function pickIndex(random: RandomSource, length: number): number {
  const index = Math.floor(random() * length);
  return Math.min(Math.max(index, 0), length - 1);
}
