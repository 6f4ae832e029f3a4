/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { DEFAULT_MAX_TOKENS, DEFAULT_ORDER } from '../markov/types.js';

const positiveInt = z.number().int().positive();

export const configSchema = z.object({
  /** Maximum number of tokens to generate */
  words: positiveInt.default(DEFAULT_MAX_TOKENS),
  /** Markov order: tokens per prefix */
  prefix: positiveInt.default(DEFAULT_ORDER),
  seed: z.string().min(1).optional(),
});

/**
 * Command-line values arrive as strings; all are optional so that the
 * config file and defaults can fill the gaps.
 */
export const cliOverridesSchema = z.object({
  words: z.coerce.number().pipe(positiveInt).optional(),
  prefix: z.coerce.number().pipe(positiveInt).optional(),
  seed: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;
export type CliOverrides = z.infer<typeof cliOverridesSchema>;
