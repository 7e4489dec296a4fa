// packages/word-core/src/matcher.ts
//
// Matching engine: which corpus words can be built from an alphabet?
//
// Rules:
//   • A word qualifies when every one of its letters is in the alphabet.
//     Letters may be reused any number of times.
//   • Words shorter than MIN_WORD_LENGTH are never returned.
//   • An alphabet that matches nothing yields an empty list, not an error.
//
// The engine is pure and synchronous. It only reads the corpus, so any number
// of callers may share one corpus concurrently.

import { maskOf, toAlphabet, type Alphabet } from './alphabet.js';
import type { Corpus } from './corpus.js';

export const MIN_WORD_LENGTH = 4;

/**
 * isConstructible checks a single word against an alphabet, applying the
 * same rules as matchWords. Useful for validating words that did not come
 * from a local corpus.
 */
export function isConstructible(word: string, alphabet: Alphabet): boolean {
  const w = word.toLowerCase();
  if (w.length < MIN_WORD_LENGTH || !/^[a-z]+$/.test(w)) return false;
  return (maskOf(w) & ~alphabet.mask) === 0;
}

/**
 * matchWords returns every corpus word constructible from the alphabet, in
 * corpus order.
 *
 * Example:
 *   alphabet = {a,c,e,h,i,s,t}, corpus = ["chaise","ace","cat","achiest"]
 *   → ["chaise", "achiest"]
 */
export function matchWords(
  alphabet: Alphabet | Iterable<string>,
  corpus: Corpus,
): string[] {
  const { mask } = isAlphabet(alphabet) ? alphabet : toAlphabet(alphabet);
  if (mask === 0) return [];

  const missing = ~mask;
  const out: string[] = [];
  for (const entry of corpus.entries) {
    if (entry.word.length < MIN_WORD_LENGTH) continue;
    if ((entry.mask & missing) === 0) out.push(entry.word);
  }
  return out;
}

/** Longest first, ties broken alphabetically. Returns a new array. */
export function sortByLengthDesc(words: readonly string[]): string[] {
  return [...words].sort(
    (a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0),
  );
}

function isAlphabet(value: Alphabet | Iterable<string>): value is Alphabet {
  return (
    typeof value === 'object' &&
    value !== null &&
    'mask' in value &&
    'letters' in value
  );
}
