// apps/server/src/wordService.ts
//
// The one engine behind both protocols. Adapters parse their own wire format,
// call `findWords`, and serialize the answer; no matching logic lives in the
// adapters.

import {
  alphabetToString,
  matchWords,
  sortByLengthDesc,
  toAlphabet,
  type Corpus,
} from '@wordfinder/word-core';
import type { Logger } from 'pino';

export class WordService {
  constructor(
    readonly corpus: Corpus,
    private readonly log: Logger,
  ) {}

  /**
   * Words constructible from `letters`, longest first.
   * An alphabet with no matches returns [].
   */
  findWords(letters: readonly string[], log: Logger = this.log): string[] {
    const started = performance.now();
    const alphabet = toAlphabet(letters);
    const words = sortByLengthDesc(matchWords(alphabet, this.corpus));
    log.info(
      {
        letters: alphabetToString(alphabet),
        count: words.length,
        ms: Math.round((performance.now() - started) * 100) / 100,
      },
      'find_words',
    );
    return words;
  }
}
