// packages/word-core/src/corpus.ts
//
// Word corpus loading.
//
// A corpus is built once when a process starts and is never mutated after
// that. Normalization (trim, lowercase, dedupe, drop non a–z entries) and the
// per-word letter mask both happen here so that queries never re-scan
// characters.
//
// Source files are plain text, one word per line. Blank lines and lines
// starting with '#' are skipped.

import fs from 'node:fs';

import { maskOf } from './alphabet.js';

export type CorpusEntry = {
  readonly word: string;
  /** Letters the word needs, as an a–z bitmask. */
  readonly mask: number;
};

export type Corpus = {
  readonly entries: ReadonlyArray<CorpusEntry>;
  readonly size: number;
  /** Where the words came from (a file path or "memory"). */
  readonly source: string;
  /** Raw entries dropped during normalization (duplicates excluded). */
  readonly rejected: number;
};

/** The corpus source is missing, unreadable or holds no usable words. */
export class FatalLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalLoadError';
  }
}

const WORD_RE = /^[a-z]+$/;

export function normalizeWord(raw: string): string {
  return raw.trim().toLowerCase();
}

/**
 * createCorpus normalizes a list of raw words into a frozen Corpus.
 * Order of first appearance is preserved.
 */
export function createCorpus(
  rawWords: Iterable<string>,
  source = 'memory',
): Corpus {
  const seen = new Set<string>();
  const entries: CorpusEntry[] = [];
  let rejected = 0;

  for (const raw of rawWords) {
    const word = normalizeWord(raw);
    if (!word || word.startsWith('#')) continue;
    if (!WORD_RE.test(word)) {
      rejected++;
      continue;
    }
    if (seen.has(word)) continue;
    seen.add(word);
    entries.push(Object.freeze({ word, mask: maskOf(word) }));
  }

  return Object.freeze({
    entries: Object.freeze(entries),
    size: entries.length,
    source,
    rejected,
  });
}

/**
 * loadCorpus reads a word list from disk.
 *
 * @throws FatalLoadError when the file cannot be read or yields no words.
 */
export function loadCorpus(path: string): Corpus {
  let raw: string;
  try {
    raw = fs.readFileSync(path, 'utf8');
  } catch (err) {
    throw new FatalLoadError(`Cannot read word list at ${path}`, {
      cause: err,
    });
  }

  const corpus = createCorpus(raw.split(/\r?\n/), path);
  if (corpus.size === 0) {
    throw new FatalLoadError(`Word list at ${path} contains no usable words`);
  }
  return corpus;
}
