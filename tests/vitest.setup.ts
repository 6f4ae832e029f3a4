/**
 * Vitest setup file
 * This file runs before each test file
 */

import { afterEach, vi } from 'vitest';

// Spies on console, process and stdout must never leak between tests
afterEach(() => {
  vi.restoreAllMocks();
});
