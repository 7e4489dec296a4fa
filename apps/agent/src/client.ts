// apps/agent/src/client.ts
//
// WordFinder: one `findWords` call for the agent, whatever the state of the
// remote word service.
//
//   Idle → RemoteAttempt ─ success ─────────────────→ Done (source "remote")
//                        └ failure → LocalFallback → Done (source "fallback")
//
// Exactly one remote attempt per query, bounded by `timeoutMs`. When it
// fails for any reason the lookup runs in-process against the secondary
// corpus. Failures are logged; they never reach the caller.

import {
  isConstructible,
  matchWords,
  sortByLengthDesc,
  toAlphabet,
  type Alphabet,
  type Corpus,
} from '@wordfinder/word-core';
import type { Logger } from 'pino';

import {
  TransportError,
  toTransportError,
  type RemoteWordSource,
  type TransportFailureKind,
} from './transport.js';

export * from './transport.js';

export type WordSource = 'remote' | 'fallback';

export type WordLookup = {
  /** Result set, longest first. */
  words: string[];
  source: WordSource;
  /** Why the remote attempt was abandoned, when it was. */
  failure?: { kind: TransportFailureKind; message: string };
};

export type WordFinderOptions = {
  remote: RemoteWordSource;
  fallbackCorpus: Corpus;
  timeoutMs: number;
  logger: Logger;
};

/**
 * Runs `task` with an abort signal that fires after `ms`. The returned
 * promise rejects with a timeout TransportError at the deadline even if the
 * task ignores the signal; a late result is discarded.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TransportError('timeout', `no answer within ${ms} ms`);
      controller.abort(err);
      reject(err);
    }, ms);
  });
  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export class WordFinder {
  private readonly remote: RemoteWordSource;
  private readonly fallbackCorpus: Corpus;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: WordFinderOptions) {
    this.remote = opts.remote;
    this.fallbackCorpus = opts.fallbackCorpus;
    this.timeoutMs = opts.timeoutMs;
    this.log = opts.logger;
  }

  async findWords(letters: Iterable<string>): Promise<WordLookup> {
    const alphabet = toAlphabet(letters);
    try {
      const words = await withDeadline(
        (signal) => this.remote.fetchWords([...alphabet.letters], signal),
        this.timeoutMs,
      );
      return { words: this.accept(words, alphabet), source: 'remote' };
    } catch (err) {
      const failure = toTransportError(err);
      this.log.warn(
        {
          kind: failure.kind,
          reason: failure.message,
          protocol: this.remote.protocol,
          url: this.remote.url,
        },
        'remote lookup failed, using local word list',
      );
      return {
        words: sortByLengthDesc(matchWords(alphabet, this.fallbackCorpus)),
        source: 'fallback',
        failure: { kind: failure.kind, message: failure.message },
      };
    }
  }

  /** Applies the local rules to a remote answer: dedupe, validate, order. */
  private accept(words: readonly string[], alphabet: Alphabet): string[] {
    const unique = [...new Set(words.map((w) => w.toLowerCase()))];
    const valid = unique.filter((w) => isConstructible(w, alphabet));
    if (valid.length !== unique.length) {
      this.log.warn(
        { dropped: unique.length - valid.length },
        'remote returned words outside the alphabet',
      );
    }
    return sortByLengthDesc(valid);
  }
}
