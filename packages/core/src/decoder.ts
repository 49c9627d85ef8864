// ============================================================================
// @nucleocode/core — Decoders
// ============================================================================
//
// Greedy earliest-match decoding. Because no code is a prefix of another,
// the first code the accumulator equals is the only possible parse, so the
// decoder never backtracks.
//
// Two modes:
// - strict:   every character is a code character; leftovers are an error
// - tolerant: characters outside the code alphabet (line breaks, alignment
//             gaps) are passed through verbatim and code characters are
//             case-normalized first
// ============================================================================

import type { TranslationDictionary } from './dictionary.js';
import { IncompleteCodeError } from './errors.js';
import { debug } from './logger.js';
import {
  DEFAULT_ALPHABET,
  DEFAULT_UNRESOLVED_MARKER,
  type TextSymbol,
  type TolerantDecodeOptions,
} from './types.js';

/**
 * Lazily decode a concatenated code stream.
 *
 * Offsets reported in errors count characters (code points) from the start
 * of `stream`.
 *
 * @throws {IncompleteCodeError} When a run of characters cannot resolve to a
 * symbol, either because it grew past the longest code or the stream ended.
 */
export function* decodeSymbols(
  stream: string,
  dictionary: TranslationDictionary,
): Generator<TextSymbol> {
  const inverse = dictionary.inverse();
  let word = '';
  let start = 0;
  let offset = 0;

  for (const ch of stream) {
    if (word === '') start = offset;
    word += ch;
    offset++;

    const symbol = inverse.get(word);
    if (symbol !== undefined) {
      yield symbol;
      word = '';
    } else if (word.length >= dictionary.maxCodeLength) {
      throw new IncompleteCodeError(word, start);
    }
  }

  if (word !== '') {
    throw new IncompleteCodeError(word, start);
  }
}

/**
 * Decode a stream produced by {@link encode} back into text.
 *
 * @example
 * ```ts
 * const dict = buildDictionary('aaaaa bbbb ccc dd e', ['01', '11']);
 * decode('G01G01A01T01', dict);  // → 'dd e'
 * ```
 */
export function decode(stream: string, dictionary: TranslationDictionary): string {
  const text = Array.from(decodeSymbols(stream, dictionary)).join('');
  debug('decode', { streamLength: stream.length, textLength: text.length });
  return text;
}

// ---------------------------------------------------------------------------
// Pass-through tolerant decoding
// ---------------------------------------------------------------------------

/**
 * Characters that take part in codes: the alphabet plus every character any
 * dictionary code uses.
 */
export function codeCharacters(
  dictionary: TranslationDictionary,
  alphabet: string = DEFAULT_ALPHABET,
): Set<string> {
  const chars = new Set<string>(alphabet);
  for (const code of dictionary.codes()) {
    for (const ch of code) chars.add(ch);
  }
  return chars;
}

function normalizeCase(ch: string, codeChars: ReadonlySet<string>): string {
  if (codeChars.has(ch)) return ch;
  const upper = ch.toUpperCase();
  if (codeChars.has(upper)) return upper;
  const lower = ch.toLowerCase();
  if (codeChars.has(lower)) return lower;
  return ch;
}

/**
 * Lazily decode a stream that an external tool may have reformatted.
 *
 * Non-code characters are yielded as-is at the position they occur, after
 * any symbol completed before them. By default an unresolvable run throws;
 * with `markUnresolved` it is yielded as `unresolvedMarker + run` instead.
 *
 * @throws {IncompleteCodeError} Unless `markUnresolved` is set.
 */
export function* decodeTolerantSymbols(
  stream: string,
  dictionary: TranslationDictionary,
  options: TolerantDecodeOptions = {},
): Generator<string> {
  const inverse = dictionary.inverse();
  const codeChars = codeCharacters(dictionary, options.alphabet);
  const marker = options.unresolvedMarker ?? DEFAULT_UNRESOLVED_MARKER;
  let word = '';
  let start = 0;
  let offset = 0;

  for (const raw of stream) {
    const ch = normalizeCase(raw, codeChars);
    if (!codeChars.has(ch)) {
      yield raw;
      offset++;
      continue;
    }

    if (word === '') start = offset;
    word += ch;
    offset++;

    const symbol = inverse.get(word);
    if (symbol !== undefined) {
      yield symbol;
      word = '';
    } else if (word.length >= dictionary.maxCodeLength) {
      if (!options.markUnresolved) throw new IncompleteCodeError(word, start);
      yield marker + word;
      word = '';
    }
  }

  if (word !== '') {
    if (!options.markUnresolved) throw new IncompleteCodeError(word, start);
    yield marker + word;
  }
}

/**
 * Decode a reformatted stream, keeping the formatting characters in place.
 *
 * @example
 * ```ts
 * const dict = buildDictionary('aaaaa bbbb ccc dd e', ['01', '11']);
 * decodeTolerant('g01-g01\na01t01', dict);  // → 'd-d\n e'
 * ```
 */
export function decodeTolerant(
  stream: string,
  dictionary: TranslationDictionary,
  options: TolerantDecodeOptions = {},
): string {
  const text = Array.from(decodeTolerantSymbols(stream, dictionary, options)).join('');
  debug('decodeTolerant', { streamLength: stream.length, textLength: text.length });
  return text;
}
