// ============================================================================
// @nucleocode/core — Encoder
// ============================================================================

import type { TranslationDictionary } from './dictionary.js';
import { UnmappedSymbolError } from './errors.js';

/**
 * Replace every symbol of `text` with its code. The result has no
 * separators; decoding relies on the codes being prefix-free.
 *
 * @throws {UnmappedSymbolError} If a symbol has no dictionary entry.
 *
 * @example
 * ```ts
 * const dict = buildDictionary('aaaaa bbbb ccc dd e', ['01', '11']);
 * encode('dd e', dict);  // → 'G01G01A01T01'
 * ```
 */
export function encode(text: string, dictionary: TranslationDictionary): string {
  const parts: string[] = [];
  let index = 0;
  for (const symbol of text) {
    const code = dictionary.codeFor(symbol);
    if (code === undefined) {
      throw new UnmappedSymbolError(symbol, index);
    }
    parts.push(code);
    index++;
  }
  return parts.join('');
}
