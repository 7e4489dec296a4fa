// packages/word-core/src/narration.ts
//
// Turns result sets into prompt text for a language model.
//
// Output is plain text meant to be appended to an observation:
//
//   Here are some possible words you can form with the available letters:
//   7-letter words: achiest
//   6-letter words: chaise, sachet
//   4-letter words: each, etch, itch, ... (and 12 more)
//
// On the first move a strategic analysis section follows, built from the
// distribution and longest-tier facts in distribution.ts.

import {
  describeLongestTier,
  groupByLength,
  type LongestTier,
} from './distribution.js';
import { sortByLengthDesc } from './matcher.js';

export const SUGGESTIONS_HEADER =
  'Here are some possible words you can form with the available letters:';

const OUTLOOK_NOTES: Record<LongestTier['outlook'], string> = {
  'forced-win':
    'Only one word has the maximum length. Whoever plays it first leaves the opponent no longer word.',
  'forcing-pair':
    'Exactly two words share the maximum length. If the opponent plays one of them, the other one wins.',
  open: 'Several words share the maximum length. Playing shorter words first keeps the long ones in reserve.',
  none: '',
};

/**
 * formatWordSuggestions lists words grouped by length, longest group first.
 * Each group shows at most `perLength` words and notes how many were cut.
 * Returns an empty string for an empty list.
 */
export function formatWordSuggestions(
  words: readonly string[],
  perLength = 10,
): string {
  if (words.length === 0) return '';
  const lines = [SUGGESTIONS_HEADER];
  for (const [length, group] of groupByLength(sortByLengthDesc(words))) {
    let line = `${length}-letter words: ${group.slice(0, perLength).join(', ')}`;
    if (group.length > perLength) {
      line += ` (and ${group.length - perLength} more)`;
    }
    lines.push(line);
  }
  return lines.join('\n');
}

export function formatStrategicAnalysis(words: readonly string[]): string {
  if (words.length === 0) return '';
  const groups = groupByLength(sortByLengthDesc(words));
  const tier = describeLongestTier(sortByLengthDesc(words));

  const lines = ['# Strategic Analysis', '', 'Word length distribution:'];
  for (const [length, group] of groups) {
    lines.push(`- ${length}-letter words: ${group.length}`);
  }
  lines.push(
    '',
    `## Longest words (${tier.length} letters)`,
    `There ${tier.words.length === 1 ? 'is 1 word' : `are ${tier.words.length} words`} of maximum length ${tier.length}: ${tier.words.join(', ')}`,
    OUTLOOK_NOTES[tier.outlook],
  );
  return lines.join('\n');
}

/**
 * enhanceObservation appends suggestions (and, on the first move, the
 * strategic analysis) to an observation. With no words the observation is
 * returned unchanged.
 */
export function enhanceObservation(
  observation: string,
  words: readonly string[],
  opts: { firstMove?: boolean; perLength?: number } = {},
): string {
  if (words.length === 0) return observation;
  let out = `${observation}\n\n${formatWordSuggestions(words, opts.perLength)}`;
  if (opts.firstMove) out += `\n\n${formatStrategicAnalysis(words)}`;
  return out;
}
