/**
 * generate command - Build a chain from the input and print generated text
 */

import { Command } from 'commander';
import { resolveConfig } from '../../config/loader.js';
import { buildChain } from '../../markov/builder.js';
import { ChainGenerator, writeChunk } from '../../markov/generator.js';
import { createRandomSource } from '../../markov/random.js';
import { describeInput, openInput } from '../input.js';

interface GenerateCommandOptions {
  words?: string;
  prefix?: string;
  seed?: string;
  config?: string;
  verbose: boolean;
}

export const generateCommand = new Command('generate')
  .description('Generate text from a Markov chain built on the input')
  .argument('[file]', 'Text file to learn from (default: standard input)')
  .option('-w, --words <n>', 'Maximum number of words to print (default: 100)')
  .option('-p, --prefix <n>', 'Prefix length in words (default: 2)')
  .option('-s, --seed <seed>', 'Seed the random generator for reproducible output')
  .option('-c, --config <path>', 'Path to config file')
  .option('--verbose', 'Log build details to standard error', false)
  .action(async (file: string | undefined, options: GenerateCommandOptions) => {
    try {
      const config = await resolveConfig({
        configPath: options.config,
        overrides: {
          words: options.words,
          prefix: options.prefix,
          seed: options.seed,
        },
      });

      const startTime = Date.now();
      const chain = await buildChain(openInput(file), config.prefix);

      if (options.verbose) {
        console.error(`Read ${describeInput(file)}`);
        console.error(
          `Built chain of order ${chain.order}: ${chain.size} prefixes, ` +
          `${chain.transitionCount} transitions (${Date.now() - startTime}ms)`
        );
      }

      const generator = new ChainGenerator(chain, createRandomSource(config.seed));
      const result = await generator.writeTo(process.stdout, config.words);
      await writeChunk(process.stdout, '\n');

      if (options.verbose) {
        console.error(`Generated ${result.emitted} words (stopped: ${result.outcome})`);
      }

    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
