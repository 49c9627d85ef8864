// ============================================================================
// @nucleocode/core — Labeled Record Framing
// ============================================================================
//
// FASTA-style framing so encoded text can be fed to sequence aligners:
//
//   >label #
//   <encoded body>
//
// Aligners may re-wrap bodies over several lines, lower-case them and insert
// `-` gaps; `restoreRecords` undoes the encoding while keeping that layout.
// ============================================================================

import { decodeTolerant } from './decoder.js';
import type { TranslationDictionary } from './dictionary.js';
import { encode } from './encoder.js';
import type { TolerantDecodeOptions } from './types.js';

export const HEADER_SENTINEL = '>';
export const HEADER_TERMINATOR = ' #';

export interface TextRecord {
  label: string;
  text: string;
}

export interface FramedRecord {
  /** Full header line, sentinel included. */
  header: string;
  /** Body lines joined with `\n`. */
  body: string;
}

/**
 * One record per line of `text`, each labelled with the line itself.
 */
export function textToRecords(text: string): TextRecord[] {
  return text
    .split(/\r?\n/)
    .filter((line, i, lines) => !(i === lines.length - 1 && line === ''))
    .map((line) => ({ label: line, text: line }));
}

export function formatHeader(label: string): string {
  return `${HEADER_SENTINEL}${label}${HEADER_TERMINATOR}`;
}

/**
 * Encode each record and frame it under its header line.
 */
export function formatRecords(records: readonly TextRecord[], dictionary: TranslationDictionary): string {
  const lines: string[] = [];
  for (const record of records) {
    lines.push(formatHeader(record.label));
    lines.push(encode(record.text, dictionary));
  }
  return lines.join('\n');
}

/**
 * Split framed text into records. Lines before the first header are ignored.
 */
export function parseRecords(framed: string): FramedRecord[] {
  const records: FramedRecord[] = [];
  let current: { header: string; lines: string[] } | null = null;

  for (const line of framed.split(/\r?\n/)) {
    if (line.startsWith(HEADER_SENTINEL)) {
      if (current) records.push({ header: current.header, body: current.lines.join('\n') });
      current = { header: line, lines: [] };
    } else if (current) {
      current.lines.push(line);
    }
  }
  if (current) records.push({ header: current.header, body: current.lines.join('\n') });

  return records;
}

/**
 * Decode every record body with the tolerant decoder, keeping headers and
 * the aligner's line breaks and gaps.
 */
export function restoreRecords(
  framed: string,
  dictionary: TranslationDictionary,
  options: TolerantDecodeOptions = {},
): string {
  const lines: string[] = [];
  for (const record of parseRecords(framed)) {
    lines.push(record.header);
    lines.push(decodeTolerant(record.body, dictionary, options));
  }
  return lines.join('\n');
}
