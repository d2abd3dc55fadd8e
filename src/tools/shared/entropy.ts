// ============================================================================
// Clock and Randomness
// ============================================================================
// The only way a handler may read the wall clock or random bytes. Swap the
// source to get deterministic output in tests.
// ============================================================================

import { randomBytes } from 'crypto';

export interface SystemSource {
  /** Milliseconds since the Unix epoch */
  now(): number;
  randomBytes(size: number): Uint8Array;
}

/**
 * Process clock and the OS CSPRNG. Holds no state between calls.
 */
export const systemSource: SystemSource = {
  now: () => Date.now(),
  randomBytes: (size) => randomBytes(size),
};

/**
 * A source that always returns the same instant and repeats `pattern` for
 * random bytes.
 */
export function fixedSource(nowMs: number, pattern: readonly number[]): SystemSource {
  if (pattern.length === 0) {
    throw new Error('fixedSource needs at least one byte in its pattern');
  }
  return {
    now: () => nowMs,
    randomBytes: (size) => Uint8Array.from({ length: size }, (_, i) => pattern[i % pattern.length]),
  };
}
