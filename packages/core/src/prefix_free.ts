// ============================================================================
// @nucleocode/core — Prefix-Free Filter
// ============================================================================

import type { Code } from './types.js';

/**
 * Keeps candidates that neither start with an accepted code nor are a prefix
 * of one. Each instance owns its accepted list.
 *
 * @example
 * ```ts
 * const filter = new PrefixFreeFilter();
 * filter.accept('00');   // → true
 * filter.accept('001');  // → false ('00' is a prefix)
 * filter.accept('A00');  // → true
 * ```
 */
export class PrefixFreeFilter {
  private accepted: Code[] = [];

  /**
   * Offer a candidate. Returns true and records it when it is kept.
   */
  accept(candidate: Code): boolean {
    if (conflictsWithAny(candidate, this.accepted)) return false;
    this.accepted.push(candidate);
    return true;
  }

  /** Codes accepted so far, in acceptance order. */
  getAccepted(): readonly Code[] {
    return this.accepted;
  }

  get size(): number {
    return this.accepted.length;
  }
}

/**
 * Yield the items of `source` that survive a fresh {@link PrefixFreeFilter}.
 *
 * @example
 * ```ts
 * take(6, prefixFree(codeStream(['00', '01'])));
 * // → ['00', '01', 'A00', 'C00', 'G00', 'T00']
 * ```
 */
export function* prefixFree(source: Iterable<Code>): Generator<Code> {
  const filter = new PrefixFreeFilter();
  for (const candidate of source) {
    if (filter.accept(candidate)) yield candidate;
  }
}

function conflictsWithAny(candidate: Code, accepted: readonly Code[]): boolean {
  for (const code of accepted) {
    if (candidate.startsWith(code) || code.startsWith(candidate)) return true;
  }
  return false;
}

/**
 * Find the first pair of codes where one is a prefix of the other
 * (duplicates included), or null when the set is prefix-free.
 */
export function findPrefixConflict(codes: readonly Code[]): [Code, Code] | null {
  for (let i = 0; i < codes.length; i++) {
    const earlier = codes.slice(0, i);
    for (const code of earlier) {
      if (codes[i].startsWith(code) || code.startsWith(codes[i])) {
        return [code, codes[i]];
      }
    }
  }
  return null;
}
