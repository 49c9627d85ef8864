// ============================================================================
// @nucleocode/core — Code Stream Generator
// ============================================================================
//
// Produces the unbounded sequence of candidate codes: the root codes first,
// then every code of the previous round with one alphabet symbol prepended,
// round after round. Rounds are generated recursively so only one string per
// round is alive at a time.
// ============================================================================

import { AmbiguousRootSetError, DegenerateAlphabetError } from './errors.js';
import { type Code, DEFAULT_ALPHABET } from './types.js';

/**
 * Split an alphabet into its symbols, rejecting alphabets that cannot
 * grow codes.
 *
 * @throws {DegenerateAlphabetError} If there are fewer than two symbols or a symbol repeats.
 */
export function alphabetSymbols(alphabet: string = DEFAULT_ALPHABET): string[] {
  const symbols = Array.from(alphabet);
  if (symbols.length < 2) {
    throw new DegenerateAlphabetError(alphabet, 'at least two symbols are required');
  }
  const unique = new Set(symbols);
  if (unique.size !== symbols.length) {
    throw new DegenerateAlphabetError(alphabet, 'symbols must not repeat');
  }
  return symbols;
}

/**
 * @throws {AmbiguousRootSetError} If the set is empty or contains an empty code.
 */
export function validateRootCodes(rootCodes: readonly Code[]): void {
  if (rootCodes.length === 0) {
    throw new AmbiguousRootSetError(rootCodes, 'at least one root code is required');
  }
  if (rootCodes.some((code) => code.length === 0)) {
    throw new AmbiguousRootSetError(rootCodes, 'the empty code is a prefix of every code');
  }
}

function* round(rootCodes: readonly Code[], symbols: readonly string[], depth: number): Generator<Code> {
  if (depth === 0) {
    yield* rootCodes;
    return;
  }
  for (const code of round(rootCodes, symbols, depth - 1)) {
    for (const symbol of symbols) {
      yield symbol + code;
    }
  }
}

/**
 * Lazily generate every code ending in one of `rootCodes`.
 *
 * @example
 * ```ts
 * take(9, codeStream(['010', '111']));
 * // → ['010', '111', 'A010', 'C010', 'G010', 'T010', 'A111', 'C111', 'G111']
 * ```
 */
export function* codeStream(
  rootCodes: readonly Code[],
  alphabet: string = DEFAULT_ALPHABET,
): Generator<Code, never> {
  const symbols = alphabetSymbols(alphabet);
  validateRootCodes(rootCodes);

  for (let depth = 0; ; depth++) {
    yield* round(rootCodes, symbols, depth);
  }
}

/**
 * Return the first `n` items of an iterable.
 */
export function take<T>(n: number, iterable: Iterable<T>): T[] {
  const out: T[] = [];
  if (n <= 0) return out;
  for (const item of iterable) {
    out.push(item);
    if (out.length >= n) break;
  }
  return out;
}
