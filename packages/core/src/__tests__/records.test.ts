import { describe, expect, it } from 'vitest';
import { buildDictionary } from '../dictionary.js';
import { bitsPerSymbol, compressionStats } from '../metrics.js';
import { formatRecords, parseRecords, restoreRecords, textToRecords } from '../records.js';
import { encode } from '../encoder.js';

const SAMPLE = 'aaaaa bbbb ccc dd e';

describe('textToRecords', () => {
  it('makes one record per line, labelled by the line', () => {
    expect(textToRecords('ab\ncd\n')).toEqual([
      { label: 'ab', text: 'ab' },
      { label: 'cd', text: 'cd' },
    ]);
  });

  it('keeps blank lines in the middle', () => {
    expect(textToRecords('ab\n\ncd')).toHaveLength(3);
    expect(textToRecords('')).toEqual([]);
  });
});

describe('formatRecords', () => {
  it('frames each encoded record under a header line', () => {
    const dict = buildDictionary(SAMPLE, ['01', '11']);
    expect(formatRecords([{ label: 'dd e', text: 'dd e' }], dict)).toBe('>dd e #\nG01G01A01T01');
  });
});

describe('parseRecords', () => {
  it('groups body lines under their header', () => {
    expect(parseRecords('>x #\nAC\nGT\n>y #\nTT')).toEqual([
      { header: '>x #', body: 'AC\nGT' },
      { header: '>y #', body: 'TT' },
    ]);
  });

  it('ignores lines before the first header', () => {
    expect(parseRecords('noise\n>x #\nAC')).toEqual([{ header: '>x #', body: 'AC' }]);
  });
});

describe('restoreRecords', () => {
  it('decodes aligned bodies while keeping headers and layout', () => {
    const dict = buildDictionary(SAMPLE, ['01', '11']);
    const aligned = 'junk\n>dd e #\ng01g01\na01t01\n>ab #\n0111';
    expect(restoreRecords(aligned, dict)).toBe('>dd e #\ndd\n e\n>ab #\nab');
  });

  it('round-trips framed text untouched by an aligner', () => {
    const text = 'aaaaa bbbb\nccc dd e\n';
    const dict = buildDictionary(text);
    const framed = formatRecords(textToRecords(text), dict);
    expect(restoreRecords(framed, dict)).toBe(
      ['>aaaaa bbbb #', 'aaaaa bbbb', '>ccc dd e #', 'ccc dd e'].join('\n'),
    );
  });
});

describe('compressionStats', () => {
  it('counts packed code bits plus the dictionary against the text', () => {
    const dict = buildDictionary(SAMPLE, ['01', '11']);
    const encoded = encode(SAMPLE, dict);
    expect(compressionStats({ text: SAMPLE, encoded, dictionary: dict, alphabetSize: 4 })).toEqual({
      textBytes: 19,
      encodedBytes: 12,
      dictionaryBytes: 59,
      ratio: 71 / 19,
    });
  });

  it('reports a zero ratio for empty text', () => {
    const dict = buildDictionary('');
    expect(compressionStats({ text: '', encoded: '', dictionary: dict, alphabetSize: 4 })).toEqual({
      textBytes: 0,
      encodedBytes: 0,
      dictionaryBytes: 2,
      ratio: 0,
    });
  });
});

describe('bitsPerSymbol', () => {
  it('rounds up to whole bits', () => {
    expect(bitsPerSymbol(4)).toBe(2);
    expect(bitsPerSymbol(2)).toBe(1);
    expect(bitsPerSymbol(5)).toBe(3);
    expect(bitsPerSymbol(1)).toBe(1);
  });
});
