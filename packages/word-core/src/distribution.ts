// packages/word-core/src/distribution.ts
//
// Length statistics over a result set. Everything here is descriptive:
// the analyzer reports facts such as "exactly one word has the maximum
// length" and leaves move choice to whoever reads them.

export type LengthDistribution = Map<number, number>;

/**
 * Outlook of the longest-word tier:
 *   - "forced-win"   → exactly one word of maximum length
 *   - "forcing-pair" → exactly two
 *   - "open"         → three or more
 *   - "none"         → empty result set
 */
export type TierOutlook = 'forced-win' | 'forcing-pair' | 'open' | 'none';

export type LongestTier = {
  length: number;
  words: string[];
  outlook: TierOutlook;
};

export function lengthDistribution(
  words: Iterable<string>,
): LengthDistribution {
  const dist: LengthDistribution = new Map();
  for (const w of words) dist.set(w.length, (dist.get(w.length) ?? 0) + 1);
  return dist;
}

/** Length of the longest word, 0 for an empty set. */
export function maxLength(words: Iterable<string>): number {
  let max = 0;
  for (const w of words) if (w.length > max) max = w.length;
  return max;
}

/** Words of exactly `length` characters, in input order. */
export function wordsOfLength(
  words: Iterable<string>,
  length: number,
): string[] {
  const out: string[] = [];
  for (const w of words) if (w.length === length) out.push(w);
  return out;
}

/** Groups words by length; keys are ordered longest first. */
export function groupByLength(words: Iterable<string>): Map<number, string[]> {
  const groups = new Map<number, string[]>();
  for (const w of words) {
    const bucket = groups.get(w.length);
    if (bucket) bucket.push(w);
    else groups.set(w.length, [w]);
  }
  return new Map([...groups.entries()].sort((a, b) => b[0] - a[0]));
}

export function describeLongestTier(words: readonly string[]): LongestTier {
  const length = maxLength(words);
  const tier = length === 0 ? [] : wordsOfLength(words, length);
  let outlook: TierOutlook;
  if (tier.length === 0) outlook = 'none';
  else if (tier.length === 1) outlook = 'forced-win';
  else if (tier.length === 2) outlook = 'forcing-pair';
  else outlook = 'open';
  return { length, words: tier, outlook };
}
