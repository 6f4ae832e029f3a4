#!/usr/bin/env node

/**
 * wordchain CLI
 */

import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { statsCommand } from './commands/stats.js';

const program = new Command();

program
  .name('wordchain')
  .description('wordchain - generate text from a Markov chain of the input')
  .version('1.0.0');

// Register commands
program.addCommand(generateCommand, { isDefault: true });
program.addCommand(statsCommand);

await program.parseAsync(process.argv);
