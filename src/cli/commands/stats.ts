/**
 * stats command - Show statistics for the chain built from the input
 */

import { Command } from 'commander';
import { z } from 'zod';
import { resolveConfig } from '../../config/loader.js';
import { buildChain } from '../../markov/builder.js';
import { getChainStats } from '../../markov/stats.js';
import { DEFAULT_TOP_PREFIXES } from '../../markov/types.js';
import { describeInput, openInput } from '../input.js';

interface StatsCommandOptions {
  prefix?: string;
  top: string;
  config?: string;
  json: boolean;
}

const topSchema = z.coerce.number().int().nonnegative();

function formatPrefix(prefix: string): string {
  return JSON.stringify(prefix);
}

export const statsCommand = new Command('stats')
  .description('Show statistics for the chain built from the input')
  .argument('[file]', 'Text file to learn from (default: standard input)')
  .option('-p, --prefix <n>', 'Prefix length in words (default: 2)')
  .option('-n, --top <n>', 'Number of most common prefixes to list', String(DEFAULT_TOP_PREFIXES))
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output as JSON', false)
  .action(async (file: string | undefined, options: StatsCommandOptions) => {
    try {
      const top = topSchema.safeParse(options.top);
      if (!top.success) {
        throw new Error(`Invalid options:\n  - --top: ${top.error.errors[0]?.message ?? 'invalid value'}`);
      }

      const config = await resolveConfig({
        configPath: options.config,
        overrides: { prefix: options.prefix },
      });

      const chain = await buildChain(openInput(file), config.prefix);
      const stats = getChainStats(chain, { top: top.data });

      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
      } else {
        console.log('Chain Statistics\n');
        console.log(`Input: ${describeInput(file)}`);
        console.log(`Prefix Length:      ${stats.order}`);
        console.log(`Prefixes:           ${stats.totalPrefixes}`);
        console.log(`Transitions:        ${stats.totalTransitions}`);
        console.log(`Distinct Words:     ${stats.distinctTokens}`);
        console.log(`Avg Suffixes:       ${stats.avgSuffixesPerPrefix}`);
        console.log(`Max Suffixes:       ${stats.maxSuffixesPerPrefix}`);

        if (stats.topPrefixes.length > 0) {
          console.log('\nMost Common Prefixes:');
          for (const entry of stats.topPrefixes) {
            console.log(`  ${formatPrefix(entry.prefix)}  ${entry.suffixCount} (${entry.distinctSuffixes} distinct)`);
          }
        }
      }

    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
