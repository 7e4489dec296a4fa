// packages/word-core/src/index.ts
//
// Entry point for the word-core package.
// Re-exports the lookup engine so consumers can import from one place.
//
// Includes:
//   • alphabet.ts     → Alphabet type, toAlphabet, letter masks
//   • corpus.ts       → Corpus loading/normalization, FatalLoadError
//   • matcher.ts      → matchWords, isConstructible, MIN_WORD_LENGTH
//   • distribution.ts → length histogram and longest-tier facts
//   • observation.ts  → parsing "Allowed Letters:" and game hints
//   • narration.ts    → prompt text built from result sets
//
// Example usage:
//   import { loadCorpus, matchWords } from '@wordfinder/word-core';

export * from './alphabet.js';
export * from './corpus.js';
export * from './matcher.js';
export * from './distribution.js';
export * from './observation.js';
export * from './narration.js';
