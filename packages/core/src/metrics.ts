// ============================================================================
// @nucleocode/core — Compression Metrics
// ============================================================================

import { type TranslationDictionary, serializeDictionary } from './dictionary.js';

export interface CompressionStats {
  /** UTF-8 size of the original text. */
  textBytes: number;
  /** Size of the encoded stream packed at ceil(log2(alphabet size)) bits per character. */
  encodedBytes: number;
  /** UTF-8 size of the serialized dictionary. */
  dictionaryBytes: number;
  /** (encodedBytes + dictionaryBytes) / textBytes; 0 for empty text. */
  ratio: number;
}

export interface CompressionInput {
  text: string;
  encoded: string;
  dictionary: TranslationDictionary;
  alphabetSize: number;
}

export function bitsPerSymbol(alphabetSize: number): number {
  return Math.max(1, Math.ceil(Math.log2(alphabetSize)));
}

/**
 * Size of the encoded output plus its dictionary relative to the input.
 *
 * @example
 * ```ts
 * compressionStats({ text, encoded, dictionary, alphabetSize: 4 }).ratio;
 * ```
 */
export function compressionStats(input: CompressionInput): CompressionStats {
  const textBytes = Buffer.byteLength(input.text, 'utf8');
  const encodedBytes = Math.ceil((input.encoded.length * bitsPerSymbol(input.alphabetSize)) / 8);
  const dictionaryBytes = Buffer.byteLength(serializeDictionary(input.dictionary), 'utf8');
  const ratio = textBytes === 0 ? 0 : (encodedBytes + dictionaryBytes) / textBytes;
  return { textBytes, encodedBytes, dictionaryBytes, ratio };
}
