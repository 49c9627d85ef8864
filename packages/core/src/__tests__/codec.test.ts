import { describe, expect, it } from 'vitest';
import { decode, decodeSymbols, decodeTolerant } from '../decoder.js';
import { TranslationDictionary, buildDictionary } from '../dictionary.js';
import { encode } from '../encoder.js';
import { IncompleteCodeError, UnmappedSymbolError } from '../errors.js';

const SAMPLE = 'aaaaa bbbb ccc dd e';
const SAMPLE_ENCODED = '0101010101A0111111111A01C01C01C01A01G01G01A01T01';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected function to throw');
}

describe('encode', () => {
  const dict = buildDictionary(SAMPLE, ['01', '11']);

  it('concatenates codes without separators', () => {
    expect(encode(SAMPLE, dict)).toBe(SAMPLE_ENCODED);
  });

  it('encodes empty text as an empty stream', () => {
    expect(encode('', dict)).toBe('');
  });

  it('throws UnmappedSymbolError for symbols without a code', () => {
    const err = captureError(() => encode('abz', dict));
    expect(err).toBeInstanceOf(UnmappedSymbolError);
    expect(err).toMatchObject({ symbol: 'z', index: 2 });
  });

  it('reports the index in code points', () => {
    const withDna = buildDictionary('🧬a', ['01', '11']);
    expect(captureError(() => encode('🧬🧬?', withDna))).toMatchObject({ symbol: '?', index: 2 });
  });
});

describe('decode (strict)', () => {
  const dict = buildDictionary(SAMPLE, ['01', '11']);

  it('restores the original text', () => {
    expect(decode(SAMPLE_ENCODED, dict)).toBe(SAMPLE);
  });

  it('yields symbols lazily', () => {
    const symbols = decodeSymbols('G01G01', dict);
    expect(symbols.next()).toEqual({ value: 'd', done: false });
    expect(symbols.next()).toEqual({ value: 'd', done: false });
    expect(symbols.next().done).toBe(true);
  });

  it('decodes an empty stream to empty text', () => {
    expect(decode('', dict)).toBe('');
  });

  it('throws IncompleteCodeError for a dangling tail', () => {
    const err = captureError(() => decode('0101A0', dict));
    expect(err).toBeInstanceOf(IncompleteCodeError);
    expect(err).toMatchObject({ residual: 'A0', offset: 4 });
  });

  it('fails as soon as the accumulator outgrows every code', () => {
    expect(captureError(() => decode('01XYZ01', dict))).toMatchObject({
      residual: 'XYZ',
      offset: 2,
    });
  });

  it('rejects a stream reformatted with line breaks', () => {
    expect(captureError(() => decode('01\n01', dict))).toMatchObject({
      residual: '\n01',
      offset: 2,
    });
  });

  it('rejects any input against an empty dictionary', () => {
    const empty = TranslationDictionary.fromEntries([]);
    expect(captureError(() => decode('A', empty))).toMatchObject({ residual: 'A', offset: 0 });
  });
});

describe('decodeTolerant', () => {
  const dict = buildDictionary(SAMPLE, ['01', '11']);

  it('passes line breaks and gaps through in place', () => {
    expect(decodeTolerant('g01-g01\na01t01', dict)).toBe('d-d\n e');
  });

  it('recovers the text from an aligner-style reformatting', () => {
    const lines = SAMPLE_ENCODED.toLowerCase().match(/.{1,10}/g) ?? [];
    const formatted = lines.join('\n');
    expect(formatted).toBe(
      '0101010101\na011111111\n1a01c01c01\nc01a01g01g\n01a01t01',
    );
    expect(decodeTolerant(formatted, dict)).toBe('aaaaa\n bbb\nb cc\nc d\nd e');
    expect(decodeTolerant(formatted, dict).replace(/\n/g, '')).toBe(SAMPLE);
  });

  it('throws on an unresolved tail by default', () => {
    expect(() => decodeTolerant('0101A0', dict)).toThrow(IncompleteCodeError);
  });

  it('marks unresolved tails when asked to', () => {
    expect(decodeTolerant('0101A0', dict, { markUnresolved: true })).toBe('aa***A0');
  });

  it('marks unresolved runs mid-stream and keeps decoding', () => {
    expect(decodeTolerant('GGG01', dict, { markUnresolved: true })).toBe('***GGGa');
    expect(decodeTolerant('GGG01', dict, { markUnresolved: true, unresolvedMarker: '?' })).toBe(
      '?GGGa',
    );
  });

  it('keeps characters that are code characters in their own case', () => {
    const lower = TranslationDictionary.fromRecord({ x: 'ac', y: 'AC' });
    expect(decodeTolerant('acAC', lower)).toBe('xy');
  });

  it('treats the whole alphabet as code characters', () => {
    const dict2 = buildDictionary('ab', ['AA', 'CC']);
    expect(captureError(() => decodeTolerant('AAg', dict2))).toMatchObject({
      residual: 'G',
      offset: 2,
    });
    expect(decodeTolerant('AAg', dict2, { alphabet: 'AC' })).toBe('bg');
  });
});
