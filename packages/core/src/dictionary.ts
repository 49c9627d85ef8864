// ============================================================================
// @nucleocode/core — Translation Dictionary
// ============================================================================
//
// Maps every distinct input symbol to a prefix-free code. The most frequent
// symbols receive the shortest codes. The dictionary must travel with the
// encoded stream: it is the only key to decoding it.
// ============================================================================

import { z } from 'zod';
import { alphabetSymbols, codeStream, validateRootCodes } from './code_stream.js';
import { AmbiguousRootSetError, DictionaryFormatError } from './errors.js';
import { timer } from './logger.js';
import { PrefixFreeFilter, findPrefixConflict } from './prefix_free.js';
import {
  type BuildOptions,
  type Code,
  DEFAULT_ALPHABET,
  DEFAULT_MAX_CANDIDATES,
  DEFAULT_ROOT_CODES,
  type DictionaryRecord,
  type FrequencyTable,
  type TextSymbol,
} from './types.js';

/**
 * Immutable bijection between input symbols and prefix-free codes.
 *
 * Construction validates that every key is a single code point, every code
 * is non-empty and unique, and no code is a prefix of another.
 *
 * @example
 * ```ts
 * const dict = TranslationDictionary.fromRecord({ a: '01', b: '11' });
 * dict.codeFor('a');     // → '01'
 * dict.symbolFor('11');  // → 'b'
 * ```
 */
export class TranslationDictionary {
  private readonly symbolToCode: ReadonlyMap<TextSymbol, Code>;
  private readonly codeToSymbol: ReadonlyMap<Code, TextSymbol>;

  /** Length of the longest code, 0 for an empty dictionary. */
  readonly maxCodeLength: number;

  private constructor(symbolToCode: Map<TextSymbol, Code>, codeToSymbol: Map<Code, TextSymbol>) {
    this.symbolToCode = symbolToCode;
    this.codeToSymbol = codeToSymbol;
    let max = 0;
    for (const code of codeToSymbol.keys()) max = Math.max(max, code.length);
    this.maxCodeLength = max;
  }

  /**
   * @throws {DictionaryFormatError} If the pairs do not form a prefix-free bijection.
   */
  static fromEntries(entries: Iterable<readonly [TextSymbol, Code]>): TranslationDictionary {
    const symbolToCode = new Map<TextSymbol, Code>();
    const codeToSymbol = new Map<Code, TextSymbol>();

    for (const [symbol, code] of entries) {
      if (Array.from(symbol).length !== 1) {
        throw new DictionaryFormatError(`key ${JSON.stringify(symbol)} is not a single character`);
      }
      if (code.length === 0) {
        throw new DictionaryFormatError(`symbol ${JSON.stringify(symbol)} has an empty code`);
      }
      if (symbolToCode.has(symbol)) {
        throw new DictionaryFormatError(`symbol ${JSON.stringify(symbol)} appears twice`);
      }
      const owner = codeToSymbol.get(code);
      if (owner !== undefined) {
        throw new DictionaryFormatError(
          `code "${code}" is assigned to both ${JSON.stringify(owner)} and ${JSON.stringify(symbol)}`,
        );
      }
      symbolToCode.set(symbol, code);
      codeToSymbol.set(code, symbol);
    }

    const conflict = findPrefixConflict([...codeToSymbol.keys()]);
    if (conflict) {
      throw new DictionaryFormatError(`code "${conflict[0]}" is a prefix of "${conflict[1]}"`);
    }

    return new TranslationDictionary(symbolToCode, codeToSymbol);
  }

  static fromRecord(record: DictionaryRecord): TranslationDictionary {
    return TranslationDictionary.fromEntries(Object.entries(record));
  }

  get size(): number {
    return this.symbolToCode.size;
  }

  has(symbol: TextSymbol): boolean {
    return this.symbolToCode.has(symbol);
  }

  codeFor(symbol: TextSymbol): Code | undefined {
    return this.symbolToCode.get(symbol);
  }

  symbolFor(code: Code): TextSymbol | undefined {
    return this.codeToSymbol.get(code);
  }

  /** Symbol/code pairs in assignment order. */
  entries(): [TextSymbol, Code][] {
    return [...this.symbolToCode.entries()];
  }

  symbols(): TextSymbol[] {
    return [...this.symbolToCode.keys()];
  }

  codes(): Code[] {
    return [...this.codeToSymbol.keys()];
  }

  /** Code → symbol view used for decoding. */
  inverse(): ReadonlyMap<Code, TextSymbol> {
    return this.codeToSymbol;
  }

  toJSON(): DictionaryRecord {
    return Object.fromEntries(this.symbolToCode);
  }
}

// ---------------------------------------------------------------------------
// Frequency analysis
// ---------------------------------------------------------------------------

/**
 * Count every code point of `text`, keyed in first-occurrence order.
 */
export function frequencyTable(text: string): FrequencyTable {
  const counts = new Map<TextSymbol, number>();
  for (const symbol of text) {
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
  }
  return counts;
}

function codePoint(symbol: TextSymbol): number {
  return symbol.codePointAt(0) ?? 0;
}

/**
 * Order symbols from most to least frequent. Equal counts fall back to the
 * higher code point first, so the ranking never depends on insertion order.
 */
export function rankSymbols(table: FrequencyTable): TextSymbol[] {
  return [...table.entries()]
    .sort(([a, countA], [b, countB]) => countB - countA || codePoint(b) - codePoint(a))
    .map(([symbol]) => symbol);
}

// ---------------------------------------------------------------------------
// Code assignment
// ---------------------------------------------------------------------------

/**
 * Draw the first `count` prefix-free codes seeded by `rootCodes`.
 *
 * @throws {AmbiguousRootSetError} If `maxCandidates` candidates are examined
 * before `count` codes are found, or if `strictRoots` is set and a root
 * duplicates or prefixes another.
 */
export function takeCodes(
  count: number,
  rootCodes: readonly Code[] = DEFAULT_ROOT_CODES,
  options: BuildOptions = {},
): Code[] {
  const alphabet = options.alphabet ?? DEFAULT_ALPHABET;
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;

  alphabetSymbols(alphabet);
  validateRootCodes(rootCodes);
  if (options.strictRoots) {
    const conflict = findPrefixConflict(rootCodes);
    if (conflict) {
      throw new AmbiguousRootSetError(
        rootCodes,
        `root "${conflict[0]}" conflicts with root "${conflict[1]}"`,
      );
    }
  }
  if (count <= 0) return [];

  const filter = new PrefixFreeFilter();
  let examined = 0;
  for (const candidate of codeStream(rootCodes, alphabet)) {
    if (examined >= maxCandidates) {
      throw new AmbiguousRootSetError(
        rootCodes,
        `only ${filter.size} of ${count} codes found within ${maxCandidates} candidates`,
      );
    }
    examined++;
    filter.accept(candidate);
    if (filter.size >= count) break;
  }
  return [...filter.getAccepted()];
}

/**
 * Build the translation dictionary for `text`.
 *
 * The first D prefix-free codes (D = distinct symbols) are sorted by length
 * and paired with the symbols ranked by {@link rankSymbols}.
 *
 * @example
 * ```ts
 * buildDictionary('aaaaa bbbb ccc dd e', ['01', '11']).toJSON();
 * // → { a: '01', b: '11', ' ': 'A01', c: 'C01', d: 'G01', e: 'T01' }
 * ```
 */
export function buildDictionary(
  text: string,
  rootCodes: readonly Code[] = DEFAULT_ROOT_CODES,
  options: BuildOptions = {},
): TranslationDictionary {
  const t = timer('buildDictionary');
  const ranked = rankSymbols(frequencyTable(text));
  const codes = takeCodes(ranked.length, rootCodes, options).sort((a, b) => a.length - b.length);
  const dictionary = TranslationDictionary.fromEntries(
    ranked.map((symbol, i): [TextSymbol, Code] => [symbol, codes[i]]),
  );
  t.endWith({ symbols: ranked.length, maxCodeLength: dictionary.maxCodeLength });
  return dictionary;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

const dictionarySchema = z.record(z.string());

/**
 * Serialize as a flat JSON object `{ symbol: code }`.
 */
export function serializeDictionary(dictionary: TranslationDictionary): string {
  return JSON.stringify(dictionary.toJSON());
}

/**
 * Parse and validate a serialized dictionary.
 *
 * @throws {DictionaryFormatError} On malformed JSON, a non-object payload,
 * non-string codes, or codes that are not prefix-free.
 */
export function parseDictionary(json: string): TranslationDictionary {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new DictionaryFormatError(`not valid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  const parsed = dictionarySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new DictionaryFormatError(`${issue ? issue.message : 'unexpected shape'}${where}`);
  }
  return TranslationDictionary.fromRecord(parsed.data);
}
