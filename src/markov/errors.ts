/**
 * Error types raised while building or generating
 */

/**
 * Base class for all wordchain errors
 */
export class WordChainError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WordChainError';
  }
}

/**
 * Thrown when the input stream fails for any reason other than its end
 */
export class ChainReadError extends WordChainError {
  constructor(cause: unknown) {
    super(`Failed to read input: ${describe(cause)}`, { cause });
    this.name = 'ChainReadError';
  }
}

/**
 * Thrown when the output sink rejects generated text
 */
export class ChainWriteError extends WordChainError {
  readonly outcome = 'write-error' as const;
  /** Tokens acknowledged by the sink before the failure */
  readonly emitted: number;

  constructor(cause: unknown, emitted: number) {
    super(`Failed to write output: ${describe(cause)}`, { cause });
    this.name = 'ChainWriteError';
    this.emitted = emitted;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
