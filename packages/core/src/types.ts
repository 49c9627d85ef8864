// ============================================================================
// @nucleocode/core — Type Definitions & Defaults
// ============================================================================
//
// Shared types and constants for the code generator, dictionary builder,
// encoder and decoders.
// ============================================================================

/** A single input symbol: one Unicode code point. */
export type TextSymbol = string;

/** A code word over the code alphabet. */
export type Code = string;

/** Symbol → occurrence count, in first-occurrence order. */
export type FrequencyTable = ReadonlyMap<TextSymbol, number>;

/** Flat `{ symbol: code }` form used for serialization. */
export type DictionaryRecord = Record<TextSymbol, Code>;

/** Nucleotide alphabet used when none is given. */
export const DEFAULT_ALPHABET = 'ACGT';

/** Root codes used when none are given. */
export const DEFAULT_ROOT_CODES: readonly Code[] = ['AAA', 'CAA', 'TTT'];

/** Candidates the prefix-free filter may examine before a build gives up. */
export const DEFAULT_MAX_CANDIDATES = 1_000_000;

/** Prefix emitted before an unresolved code in marking mode. */
export const DEFAULT_UNRESOLVED_MARKER = '***';

/**
 * Options for building a translation dictionary.
 */
export interface BuildOptions {
  /** Symbols prepended to codes each round (default `ACGT`). */
  alphabet?: string;
  /** Upper bound on generated candidates examined while drawing codes. */
  maxCandidates?: number;
  /**
   * Reject root sets where a root duplicates or prefixes another root
   * instead of letting the prefix-free filter drop it.
   */
  strictRoots?: boolean;
}

/**
 * Options for the pass-through tolerant decoder.
 */
export interface TolerantDecodeOptions {
  /** Code alphabet; its characters are always treated as code characters. */
  alphabet?: string;
  /** Emit `unresolvedMarker + residual` instead of throwing. */
  markUnresolved?: boolean;
  unresolvedMarker?: string;
}
