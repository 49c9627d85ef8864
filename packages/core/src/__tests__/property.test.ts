import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { decode, decodeTolerant } from '../decoder.js';
import { buildDictionary, frequencyTable } from '../dictionary.js';
import { encode } from '../encoder.js';
import { findPrefixConflict } from '../prefix_free.js';

// ============================================================================
// Property-based tests over random texts and root sets
// ============================================================================

const rootSets = fc.constantFrom<readonly string[]>(
  ['01', '11'],
  ['AAA', 'CAA', 'TTT'],
  ['A', 'C'],
  ['GATT', 'ACA', 'T'],
  ['010', '010', '0101'],
);

const texts = fc.oneof(
  fc.string({ maxLength: 200 }),
  fc.fullUnicodeString({ maxLength: 80 }),
  fc.stringOf(fc.constantFrom('a', 'b', 'c', ' ', 'é'), { maxLength: 300 }),
);

describe('Property: round-trip', () => {
  it('decode(encode(text)) === text', () => {
    fc.assert(
      fc.property(texts, rootSets, (text, roots) => {
        const dict = buildDictionary(text, roots);
        expect(decode(encode(text, dict), dict)).toBe(text);
      }),
      { numRuns: 200 },
    );
  });

  it('tolerant decoding survives re-wrapping and lower-casing', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 200 }), fc.integer({ min: 1, max: 30 }), (text, width) => {
        const dict = buildDictionary(text);
        const encoded = encode(text, dict).toLowerCase();
        const wrapped = (encoded.match(new RegExp(`.{1,${width}}`, 'g')) ?? []).join('\n');
        expect(decodeTolerant(wrapped, dict).replace(/\n/g, '')).toBe(text);
      }),
      { numRuns: 200 },
    );
  });
});

describe('Property: dictionary invariants', () => {
  it('codes are pairwise prefix-free', () => {
    fc.assert(
      fc.property(texts, rootSets, (text, roots) => {
        expect(findPrefixConflict(buildDictionary(text, roots).codes())).toBeNull();
      }),
      { numRuns: 200 },
    );
  });

  it('construction is deterministic and ignores symbol order', () => {
    fc.assert(
      fc.property(texts, rootSets, (text, roots) => {
        const first = buildDictionary(text, roots).entries();
        const again = buildDictionary(text, roots).entries();
        const reversed = buildDictionary(Array.from(text).reverse().join(''), roots).entries();
        expect(again).toEqual(first);
        expect(reversed).toEqual(first);
      }),
      { numRuns: 200 },
    );
  });

  it('more frequent symbols never get longer codes', () => {
    fc.assert(
      fc.property(texts, rootSets, (text, roots) => {
        const dict = buildDictionary(text, roots);
        const freq = frequencyTable(text);
        for (const [s1, c1] of dict.entries()) {
          for (const [s2, c2] of dict.entries()) {
            if ((freq.get(s1) ?? 0) > (freq.get(s2) ?? 0)) {
              expect(c1.length).toBeLessThanOrEqual(c2.length);
            }
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});
