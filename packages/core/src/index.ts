// ============================================================================
// @nucleocode/core — Public API
// ============================================================================

// Code generation
export { codeStream, take, alphabetSymbols, validateRootCodes } from './code_stream.js';
export { PrefixFreeFilter, prefixFree, findPrefixConflict } from './prefix_free.js';

// Dictionary
export {
  TranslationDictionary,
  buildDictionary,
  frequencyTable,
  rankSymbols,
  takeCodes,
  serializeDictionary,
  parseDictionary,
} from './dictionary.js';

// Encode / decode
export { encode } from './encoder.js';
export {
  decode,
  decodeSymbols,
  decodeTolerant,
  decodeTolerantSymbols,
  codeCharacters,
} from './decoder.js';

// Labeled records
export {
  textToRecords,
  formatHeader,
  formatRecords,
  parseRecords,
  restoreRecords,
  HEADER_SENTINEL,
  HEADER_TERMINATOR,
} from './records.js';
export type { TextRecord, FramedRecord } from './records.js';

// Metrics
export { compressionStats, bitsPerSymbol } from './metrics.js';
export type { CompressionStats, CompressionInput } from './metrics.js';

// Errors
export {
  NucleocodeError,
  UnmappedSymbolError,
  IncompleteCodeError,
  DegenerateAlphabetError,
  AmbiguousRootSetError,
  DictionaryFormatError,
} from './errors.js';

// Logging
export * as logger from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export type {
  TextSymbol,
  Code,
  FrequencyTable,
  DictionaryRecord,
  BuildOptions,
  TolerantDecodeOptions,
} from './types.js';
export {
  DEFAULT_ALPHABET,
  DEFAULT_ROOT_CODES,
  DEFAULT_MAX_CANDIDATES,
  DEFAULT_UNRESOLVED_MARKER,
} from './types.js';
