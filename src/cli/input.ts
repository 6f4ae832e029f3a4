/**
 * Input stream selection for CLI commands
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';

/**
 * Open `file` for reading, or standard input when it is absent or `-`
 */
export function openInput(file?: string): Readable {
  if (!file || file === '-') {
    return process.stdin;
  }
  return fs.createReadStream(path.resolve(file));
}

export function describeInput(file?: string): string {
  return !file || file === '-' ? 'standard input' : path.resolve(file);
}
