// packages/word-core/src/observation.ts
//
// Helpers for reading the textual observations a game environment sends.
// Only the pieces the word lookup needs are parsed; everything else in the
// observation is passed through untouched.

export type GameType = 'spelling_bee' | 'poker' | 'other';

const ALLOWED_LETTERS_RE = /Allowed Letters:\s*([a-z]+)/i;

/**
 * extractLetters finds the "Allowed Letters: <chars>" marker and returns the
 * letters lowercased, or null when the observation has no such marker.
 *
 * Example:
 *   extractLetters('[GAME] Allowed Letters: AEHKTVW') → ['a','e','h','k','t','v','w']
 */
export function extractLetters(observation: string): string[] | null {
  const match = ALLOWED_LETTERS_RE.exec(observation);
  if (!match) return null;
  return [...match[1].toLowerCase()];
}

export function detectGameType(observation: string): GameType {
  const lower = observation.toLowerCase();
  if (lower.includes('spelling bee') || lower.includes('allowed letters')) {
    return 'spelling_bee';
  }
  if (
    lower.includes('poker') ||
    lower.includes('texas hold') ||
    lower.includes('cards:')
  ) {
    return 'poker';
  }
  return 'other';
}

/** No move has been logged yet ("[Player N]" lines appear once one has). */
export function isFirstMove(observation: string): boolean {
  return (
    observation.includes('You are Player') && !observation.includes('[Player')
  );
}
