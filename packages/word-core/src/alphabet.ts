// packages/word-core/src/alphabet.ts
//
// Alphabet handling for word lookups.
//
// An alphabet is the set of letters a player may use in one round. Letters
// are reusable: a word qualifies as long as each of its characters is in the
// set, however often it repeats.
//
// Besides the plain character set we keep a 26-bit mask (bit 0 = 'a',
// bit 25 = 'z'). Corpus entries carry the same mask, so the constructibility
// test in matcher.ts is a single bitwise AND.

export type Alphabet = {
  /** Lowercased members, including any that are not a single a–z letter. */
  letters: ReadonlySet<string>;
  /** Bitmask of the a–z members of `letters`. */
  mask: number;
};

const CODE_A = 'a'.charCodeAt(0);
const CODE_Z = 'z'.charCodeAt(0);

/**
 * Returns the mask bit for a lowercase character, or 0 for anything outside
 * a–z.
 */
export function letterBit(ch: string): number {
  const code = ch.charCodeAt(0);
  if (ch.length !== 1 || code < CODE_A || code > CODE_Z) return 0;
  return 1 << (code - CODE_A);
}

/** OR of the bits of every character in `word` (assumed lowercase). */
export function maskOf(word: string): number {
  let mask = 0;
  for (const ch of word) mask |= letterBit(ch);
  return mask;
}

/**
 * toAlphabet builds an Alphabet from loosely shaped input.
 *
 * Each entry is one member of the set, compared after trimming and
 * lowercasing. Only single a–z characters can appear in a word, so an entry
 * such as `'ab'` is a member that no word ever uses: `['ab']` matches
 * nothing. Blank entries are skipped and duplicates collapse.
 *
 * Example:
 *   toAlphabet(['A', 'c', 'E', 'e'])
 *   → letters {a, c, e}, mask 0b10101
 */
export function toAlphabet(entries: Iterable<string>): Alphabet {
  const letters = new Set<string>();
  let mask = 0;
  for (const entry of entries) {
    const member = entry.trim().toLowerCase();
    if (!member) continue;
    letters.add(member);
    mask |= letterBit(member);
  }
  return { letters, mask };
}

/** Sorted letters of an alphabet, handy for logs and prompts. */
export function alphabetToString(alphabet: Alphabet): string {
  return [...alphabet.letters].sort().join('');
}
