// ============================================================================
// @nucleocode/cli — Commands
// ============================================================================
//
// File-level operations behind each CLI command. They read and write the
// artifacts; all code construction lives in @nucleocode/core.
// ============================================================================

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import {
  type CompressionStats,
  NucleocodeError,
  type TranslationDictionary,
  buildDictionary,
  compressionStats,
  decode,
  encode,
  formatRecords,
  logger,
  parseDictionary,
  restoreRecords,
  serializeDictionary,
  textToRecords,
} from '@nucleocode/core';
import { runAligner } from './aligner.js';
import type { ResolvedConfig } from './config.js';

export const ENCODED_EXT = '.pfc';
export const DICTIONARY_EXT = '.pfcd';
export const FASTA_EXT = '.fasta';

/** `dir/name.txt` → `dir/name` */
export function basePath(file: string): string {
  return path.join(path.dirname(file), path.basename(file, path.extname(file)));
}

function writeOutput(file: string, content: string): void {
  mkdirSync(path.dirname(file), { recursive: true });
  writeFileSync(file, content);
}

export function readDictionary(file: string): TranslationDictionary {
  return parseDictionary(readFileSync(file, 'utf-8'));
}

function buildFor(text: string, config: ResolvedConfig, rootCodes?: string[]): TranslationDictionary {
  const roots = rootCodes ?? config.rootCodes;
  const alphabet = new Set(config.alphabet);
  const foreign = roots.filter((root) => Array.from(root).some((ch) => !alphabet.has(ch)));
  if (foreign.length > 0) {
    logger.warn('root codes use characters outside the alphabet; aligners may reject them', {
      roots: foreign,
      alphabet: config.alphabet,
    });
  }
  return buildDictionary(text, roots, {
    alphabet: config.alphabet,
    maxCandidates: config.maxCandidates,
  });
}

// ---------------------------------------------------------------------------
// compress / decompress / stats
// ---------------------------------------------------------------------------

export interface CompressOptions {
  /** Output base path; `.pfc` and `.pfcd` are appended. */
  out?: string;
  rootCodes?: string[];
}

export interface CompressResult {
  encodedPath: string;
  dictionaryPath: string;
  symbols: number;
  stats: CompressionStats;
}

export function compressFile(
  inputPath: string,
  options: CompressOptions,
  config: ResolvedConfig,
): CompressResult {
  const text = readFileSync(inputPath, 'utf-8');
  const dictionary = buildFor(text, config, options.rootCodes);
  const encoded = encode(text, dictionary);

  const base = options.out ?? basePath(inputPath);
  const encodedPath = base + ENCODED_EXT;
  const dictionaryPath = base + DICTIONARY_EXT;
  writeOutput(encodedPath, encoded);
  writeOutput(dictionaryPath, serializeDictionary(dictionary));

  return {
    encodedPath,
    dictionaryPath,
    symbols: dictionary.size,
    stats: compressionStats({
      text,
      encoded,
      dictionary,
      alphabetSize: Array.from(config.alphabet).length,
    }),
  };
}

/**
 * Strict-decode an encoded file. Returns the text; writes it when `out` is set.
 */
export function decompressFile(inputPath: string, dictionaryPath: string, out?: string): string {
  const text = decode(readFileSync(inputPath, 'utf-8'), readDictionary(dictionaryPath));
  if (out) writeOutput(out, text);
  return text;
}

export interface StatsResult extends CompressionStats {
  symbols: number;
  maxCodeLength: number;
}

export function statsFile(inputPath: string, config: ResolvedConfig, rootCodes?: string[]): StatsResult {
  const text = readFileSync(inputPath, 'utf-8');
  const dictionary = buildFor(text, config, rootCodes);
  const encoded = encode(text, dictionary);
  return {
    ...compressionStats({ text, encoded, dictionary, alphabetSize: Array.from(config.alphabet).length }),
    symbols: dictionary.size,
    maxCodeLength: dictionary.maxCodeLength,
  };
}

// ---------------------------------------------------------------------------
// fasta / align / restore
// ---------------------------------------------------------------------------

export interface FastaOptions {
  /** Existing dictionary; one is built from the whole input when omitted. */
  dictionaryPath?: string;
  out?: string;
  rootCodes?: string[];
}

export interface FastaResult {
  fastaPath: string;
  dictionaryPath: string;
  records: number;
}

export function fastaFile(inputPath: string, options: FastaOptions, config: ResolvedConfig): FastaResult {
  const text = readFileSync(inputPath, 'utf-8');
  const base = basePath(inputPath);

  let dictionaryPath = options.dictionaryPath;
  let dictionary: TranslationDictionary;
  if (dictionaryPath) {
    dictionary = readDictionary(dictionaryPath);
  } else {
    dictionary = buildFor(text, config, options.rootCodes);
    dictionaryPath = base + DICTIONARY_EXT;
    writeOutput(dictionaryPath, serializeDictionary(dictionary));
  }

  const records = textToRecords(text);
  const fastaPath = options.out ?? base + FASTA_EXT;
  writeOutput(fastaPath, formatRecords(records, dictionary));
  return { fastaPath, dictionaryPath, records: records.length };
}

export async function alignFile(
  inputPath: string,
  config: ResolvedConfig,
  out?: string,
): Promise<string> {
  const aligned = await runAligner(inputPath, config.aligner);
  const outputPath = out ?? `${basePath(inputPath)}.aligned${FASTA_EXT}`;
  writeOutput(outputPath, aligned);
  return outputPath;
}

export interface RestoreOptions {
  out?: string;
  markUnresolved?: boolean;
}

export interface RestoreResult {
  outputPath: string;
  text: string;
}

export function restoreFile(
  inputPath: string,
  dictionaryPath: string,
  options: RestoreOptions,
  config: ResolvedConfig,
): RestoreResult {
  const text = restoreRecords(readFileSync(inputPath, 'utf-8'), readDictionary(dictionaryPath), {
    alphabet: config.alphabet,
    markUnresolved: options.markUnresolved ?? config.markUnresolved,
    unresolvedMarker: config.unresolvedMarker,
  });
  const outputPath = options.out ?? `${basePath(inputPath)}.restored.txt`;
  writeOutput(outputPath, text);
  return { outputPath, text };
}

// ---------------------------------------------------------------------------
// pipeline
// ---------------------------------------------------------------------------

export interface PipelineOptions {
  outDir?: string;
  skipAlign?: boolean;
  rootCodes?: string[];
}

export interface PipelineResult {
  compress: CompressResult;
  fastaPath: string;
  alignedPath?: string;
  restoredPath?: string;
}

/**
 * compress → verify round-trip → frame records → align → restore.
 */
export async function runPipeline(
  inputPath: string,
  options: PipelineOptions,
  config: ResolvedConfig,
): Promise<PipelineResult> {
  const name = path.basename(inputPath, path.extname(inputPath));
  const outDir = options.outDir ?? path.dirname(inputPath);
  const base = path.join(outDir, name);

  const compress = compressFile(inputPath, { out: base, rootCodes: options.rootCodes }, config);

  const original = readFileSync(inputPath, 'utf-8');
  if (decompressFile(compress.encodedPath, compress.dictionaryPath) !== original) {
    throw new NucleocodeError(`Round-trip check failed for ${inputPath}`);
  }
  logger.debug('round-trip verified', { input: inputPath });

  const { fastaPath } = fastaFile(
    inputPath,
    { dictionaryPath: compress.dictionaryPath, out: base + FASTA_EXT },
    config,
  );
  if (options.skipAlign) {
    return { compress, fastaPath };
  }

  const alignedPath = await alignFile(fastaPath, config, `${base}.aligned${FASTA_EXT}`);
  const { outputPath: restoredPath } = restoreFile(
    alignedPath,
    compress.dictionaryPath,
    { out: `${base}.restored.txt` },
    config,
  );
  return { compress, fastaPath, alignedPath, restoredPath };
}
