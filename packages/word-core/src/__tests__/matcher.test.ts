// packages/word-core/src/__tests__/matcher.test.ts
//
// Unit tests for matchWords() and friends.
//
// Covered cases:
//   • Words shorter than 4 letters are excluded even when constructible
//   • Letters may be reused
//   • Case-insensitive alphabets, non-alphabetic input, empty alphabet
//   • Multi-character entries are members no word can use
//   • Every result satisfies the constructibility rule
//   • A larger alphabet never loses words a smaller one found

import {
  MIN_WORD_LENGTH,
  createCorpus,
  isConstructible,
  matchWords,
  sortByLengthDesc,
  toAlphabet,
} from '../index.js';

const corpus = createCorpus([
  'chaise',
  'ace',
  'cat',
  'achiest',
  'teeth',
  'each',
  'itch',
  'stitches',
  'zebra',
  'Sachet',
  'this',
]);

const ACEHIST = ['a', 'c', 'e', 'h', 'i', 's', 't'];

describe('matchWords', () => {
  it('finds words of 4+ letters built only from the alphabet', () => {
    const small = createCorpus(['chaise', 'ace', 'cat', 'achiest']);
    expect(matchWords(ACEHIST, small)).toEqual(['chaise', 'achiest']);
  });

  it('lets letters repeat', () => {
    expect(matchWords(['t', 'e', 'h'], corpus)).toEqual(['teeth']);
  });

  it('ignores alphabet case and duplicate letters', () => {
    const lower = matchWords(ACEHIST, corpus);
    expect(matchWords(['A', 'C', 'E', 'H', 'I', 'S', 'T', 'a', 't'], corpus)).toEqual(lower);
  });

  it('normalizes corpus case at load time', () => {
    expect(matchWords(ACEHIST, corpus)).toContain('sachet');
  });

  it('returns [] when nothing matches', () => {
    expect(matchWords(['x', 'y', 'z'], corpus)).toEqual([]);
  });

  it('returns [] for an empty alphabet', () => {
    expect(matchWords([], corpus)).toEqual([]);
  });

  it('treats non-alphabetic letters as never matching', () => {
    expect(matchWords(['1', '-', '?'], corpus)).toEqual([]);
    expect(matchWords(['t', 'e', 'h', '!'], corpus)).toEqual(['teeth']);
  });

  it('accepts a prebuilt Alphabet', () => {
    expect(matchWords(toAlphabet(['T', ' e ', 'H']), corpus)).toEqual(['teeth']);
  });

  it('never splits a multi-character entry into letters', () => {
    const small = createCorpus(['abba', 'chaise', 'achiest']);
    expect(matchWords(['ab'], small)).toEqual([]);
    expect(matchWords(['acehist'], small)).toEqual([]);
    expect(matchWords(['a', 'b', 'ab'], small)).toEqual(['abba']);
  });

  it('only returns constructible words of the minimum length', () => {
    const alphabet = toAlphabet(ACEHIST);
    const words = matchWords(alphabet, corpus);
    expect(words.length).toBeGreaterThan(0);
    for (const w of words) {
      expect(w.length).toBeGreaterThanOrEqual(MIN_WORD_LENGTH);
      for (const ch of w) expect(alphabet.letters.has(ch)).toBe(true);
    }
  });

  it('is monotonic in the alphabet', () => {
    const smaller = matchWords(['c', 'h', 'a', 'e'], corpus);
    const larger = new Set(matchWords(ACEHIST, corpus));
    expect(smaller).toEqual(['each']);
    for (const w of smaller) expect(larger.has(w)).toBe(true);
  });

  it('returns the same words on repeated queries', () => {
    expect(matchWords(ACEHIST, corpus)).toEqual(matchWords(ACEHIST, corpus));
  });
});

describe('isConstructible', () => {
  const alphabet = toAlphabet(ACEHIST);

  it('applies the same rules as matchWords', () => {
    expect(isConstructible('Chaise', alphabet)).toBe(true);
    expect(isConstructible('ace', alphabet)).toBe(false);
    expect(isConstructible('zebra', alphabet)).toBe(false);
    expect(isConstructible('ch-ase', alphabet)).toBe(false);
  });
});

describe('sortByLengthDesc', () => {
  it('orders longest first, then alphabetically', () => {
    expect(sortByLengthDesc(['each', 'chaise', 'itch', 'achiest'])).toEqual([
      'achiest',
      'chaise',
      'each',
      'itch',
    ]);
  });
});
