// apps/agent/src/__tests__/client.test.ts
//
// WordFinder: one remote attempt, then a silent local fallback.
//
// Remote behaviour is driven through a fake fetch, except for the
// connection-refused case which targets a port released just before the
// call.

import http from 'node:http';
import { fileURLToPath } from 'node:url';
import pino from 'pino';

import {
  createCorpus,
  isConstructible,
  loadCorpus,
  toAlphabet,
} from '@wordfinder/word-core';

import {
  WordFinder,
  createQuerySource,
  createToolSource,
  withDeadline,
  type FetchLike,
  type RemoteWordSource,
} from '../client.js';
import { DEFAULT_FALLBACK_WORDS_FILE } from '../config.js';

const ACEHIST = ['a', 'c', 'e', 'h', 'i', 's', 't'];
const MIXED_LIST = fileURLToPath(new URL('./fixtures/fallback-words.txt', import.meta.url));
const silent = pino({ level: 'silent' });
const fallbackCorpus = createCorpus(['chaise', 'ace', 'achiest', 'itch', 'zebra']);

function finderWith(remote: RemoteWordSource, logger = silent, timeoutMs = 200) {
  return new WordFinder({ remote, fallbackCorpus, timeoutMs, logger });
}

function respond(body: string, status = 200): FetchLike {
  return vi.fn(async () => new Response(body, { status }));
}

async function releasedPort(): Promise<number> {
  const server = http.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  const port = typeof addr === 'object' && addr !== null ? addr.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

describe('remote success', () => {
  it('returns the tool-call result, validated and longest first', async () => {
    const fetchImpl = respond(
      JSON.stringify({ result: ['each', 'chaise', 'zzzz', 'CHAISE'] }),
    );
    const lookup = await finderWith(
      createToolSource('http://svc/', fetchImpl),
    ).findWords(ACEHIST);

    expect(lookup).toEqual({ words: ['chaise', 'each'], source: 'remote' });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://svc/tools/call',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ name: 'find_words', input: { letters: ACEHIST } }),
      }),
    );
  });

  it('speaks the plain query protocol too', async () => {
    const fetchImpl = respond(JSON.stringify(['achiest', 'each']));
    const lookup = await finderWith(
      createQuerySource('http://svc', fetchImpl),
    ).findWords(['A', 'C', 'E', 'H', 'I', 'S', 'T']);

    expect(lookup.source).toBe('remote');
    expect(lookup.words).toEqual(['achiest', 'each']);
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://svc/find_words?letters=a%2Cc%2Ce%2Ch%2Ci%2Cs%2Ct',
      expect.anything(),
    );
  });

  it('accepts an empty remote answer as a valid result', async () => {
    const lookup = await finderWith(
      createToolSource('http://svc', respond('{"result":[]}')),
    ).findWords(['x', 'y', 'z']);
    expect(lookup).toEqual({ words: [], source: 'remote' });
  });
});

describe('fallback', () => {
  const local = { words: ['achiest', 'chaise', 'itch'], source: 'fallback' };

  it('falls back on an error status', async () => {
    const lookup = await finderWith(
      createToolSource('http://svc', respond('Error: boom', 500)),
    ).findWords(ACEHIST);
    expect(lookup).toEqual({ ...local, failure: { kind: 'http', message: 'HTTP 500: Error: boom' } });
  });

  it('falls back on a structured remote error', async () => {
    const lookup = await finderWith(
      createToolSource('http://svc', respond('{"error":"bad letters"}', 400)),
    ).findWords(ACEHIST);
    expect(lookup).toEqual({ ...local, failure: { kind: 'remote', message: 'bad letters' } });
  });

  it('falls back on a malformed payload', async () => {
    const lookup = await finderWith(
      createQuerySource('http://svc', respond('{"words":[]}')),
    ).findWords(ACEHIST);
    expect(lookup.source).toBe('fallback');
    expect(lookup.failure?.kind).toBe('payload');
  });

  it('falls back on a non-JSON success body', async () => {
    const lookup = await finderWith(
      createToolSource('http://svc', respond('<html>')),
    ).findWords(ACEHIST);
    expect(lookup.failure).toEqual({ kind: 'payload', message: 'response is not JSON' });
  });

  it('falls back when the remote never answers', async () => {
    const hang: FetchLike = vi.fn(() => new Promise<Response>(() => {}));
    const lookup = await finderWith(
      createToolSource('http://svc', hang),
      silent,
      20,
    ).findWords(ACEHIST);
    expect(lookup).toEqual({
      ...local,
      failure: { kind: 'timeout', message: 'no answer within 20 ms' },
    });
    expect(hang).toHaveBeenCalledTimes(1);
  });

  it('falls back when the connection is refused', async () => {
    const port = await releasedPort();
    const lookup = await finderWith(
      createToolSource(`http://127.0.0.1:${port}`),
      silent,
      2000,
    ).findWords(ACEHIST);
    expect(lookup.source).toBe('fallback');
    expect(lookup.failure?.kind).toBe('unreachable');
    expect(lookup.words).toEqual(local.words);
  });

  it('logs the failure at warn level', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'warn' }, { write: (msg: string) => lines.push(msg) });
    await finderWith(
      createToolSource('http://svc', respond('nope', 503)),
      logger,
    ).findWords(ACEHIST);

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 40,
      kind: 'http',
      protocol: 'tool',
      url: 'http://svc/tools/call',
      msg: 'remote lookup failed, using local word list',
    });
  });

  it('answers from a fallback list file when the service is down', async () => {
    const port = await releasedPort();
    const finder = new WordFinder({
      remote: createQuerySource(`http://127.0.0.1:${port}`),
      fallbackCorpus: loadCorpus(MIXED_LIST),
      timeoutMs: 2000,
      logger: silent,
    });
    const alphabet = toAlphabet(ACEHIST);
    const lookup = await finder.findWords(ACEHIST);

    expect(lookup.source).toBe('fallback');
    expect(lookup.words).toContain('chaise');
    expect(lookup.words).toContain('achiest');
    for (const w of lookup.words) expect(isConstructible(w, alphabet)).toBe(true);
  });

  it('falls back to the packaged dictionary by default', async () => {
    const down: RemoteWordSource = {
      protocol: 'tool',
      url: 'http://svc/tools/call',
      fetchWords: async () => {
        throw new TypeError('fetch failed');
      },
    };
    const finder = new WordFinder({
      remote: down,
      fallbackCorpus: loadCorpus(DEFAULT_FALLBACK_WORDS_FILE),
      timeoutMs: 200,
      logger: silent,
    });
    const lookup = await finder.findWords(['t', 'h', 'a', 'w', 'i']);

    expect(lookup.source).toBe('fallback');
    expect(lookup.words).toContain('that');
    expect(lookup.words).toContain('with');
  });
});

describe('withDeadline', () => {
  it('aborts the signal when time runs out', async () => {
    let seen: AbortSignal | undefined;
    await expect(
      withDeadline((signal) => {
        seen = signal;
        return new Promise<never>(() => {});
      }, 10),
    ).rejects.toMatchObject({ name: 'TransportError', kind: 'timeout' });
    expect(seen?.aborted).toBe(true);
  });

  it('passes through a result that arrives in time', async () => {
    await expect(withDeadline(async () => 'ok', 1000)).resolves.toBe('ok');
  });
});
