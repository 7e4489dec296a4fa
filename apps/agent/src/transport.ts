// apps/agent/src/transport.ts
//
// Remote word sources: thin fetch wrappers around the two service protocols.
//
//   createToolSource  → POST {base}/tools/call     (Protocol A)
//   createQuerySource → GET  {base}/find_words?... (Protocol B)
//
// Every failure surfaces as a TransportError tagged with a kind.

import {
  FIND_WORDS_PATH,
  FIND_WORDS_TOOL,
  describeIssues,
  findWordsRes,
  toolCallRes,
  type ToolCallReq,
} from '@wordfinder/protocol';

export type TransportFailureKind =
  | 'timeout' // no answer within the deadline
  | 'unreachable' // connection refused, DNS failure, reset
  | 'http' // non-2xx status
  | 'remote' // service answered with { error }
  | 'payload'; // body is not the expected shape

export class TransportError extends Error {
  constructor(
    readonly kind: TransportFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export type RemoteProtocol = 'tool' | 'query';

export interface RemoteWordSource {
  readonly protocol: RemoteProtocol;
  readonly url: string;
  fetchWords(letters: readonly string[], signal: AbortSignal): Promise<string[]>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const trimSlash = (base: string) => base.replace(/\/+$/, '');

/** Maps whatever fetch threw into a TransportError. */
export function toTransportError(err: unknown, signal?: AbortSignal): TransportError {
  if (err instanceof TransportError) return err;
  if (signal?.aborted) {
    const reason = signal.reason;
    return reason instanceof TransportError
      ? reason
      : new TransportError('timeout', 'request aborted', { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError('unreachable', message, { cause: err });
}

async function request(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
): Promise<{ status: number; ok: boolean; body: unknown }> {
  let res: Response;
  let text: string;
  try {
    res = await fetchImpl(url, init);
    text = await res.text();
  } catch (err) {
    throw toTransportError(err, init.signal ?? undefined);
  }
  try {
    return { status: res.status, ok: res.ok, body: JSON.parse(text) };
  } catch (err) {
    if (!res.ok) {
      throw new TransportError('http', `HTTP ${res.status}: ${text.slice(0, 200)}`);
    }
    throw new TransportError('payload', 'response is not JSON', { cause: err });
  }
}

/** Protocol A client. */
export function createToolSource(
  baseUrl: string,
  fetchImpl: FetchLike = fetch,
): RemoteWordSource {
  const url = `${trimSlash(baseUrl)}/tools/call`;
  return {
    protocol: 'tool',
    url,
    async fetchWords(letters, signal) {
      const call: ToolCallReq = { name: FIND_WORDS_TOOL, input: { letters: [...letters] } };
      const { status, ok, body } = await request(fetchImpl, url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(call),
        signal,
      });
      const parsed = toolCallRes.safeParse(body);
      if (!parsed.success) {
        if (!ok) throw new TransportError('http', `HTTP ${status}`);
        throw new TransportError('payload', describeIssues(parsed.error));
      }
      if ('error' in parsed.data) {
        throw new TransportError('remote', parsed.data.error);
      }
      if (!ok) throw new TransportError('http', `HTTP ${status}`);
      return parsed.data.result;
    },
  };
}

/** Protocol B client. */
export function createQuerySource(
  baseUrl: string,
  fetchImpl: FetchLike = fetch,
): RemoteWordSource {
  const base = `${trimSlash(baseUrl)}${FIND_WORDS_PATH}`;
  return {
    protocol: 'query',
    url: base,
    async fetchWords(letters, signal) {
      const url = `${base}?letters=${encodeURIComponent(letters.join(','))}`;
      const { status, ok, body } = await request(fetchImpl, url, { signal });
      if (!ok) throw new TransportError('http', `HTTP ${status}`);
      const parsed = findWordsRes.safeParse(body);
      if (!parsed.success) {
        throw new TransportError('payload', describeIssues(parsed.error));
      }
      return parsed.data;
    },
  };
}

export function createRemoteSource(
  protocol: RemoteProtocol,
  baseUrl: string,
  fetchImpl: FetchLike = fetch,
): RemoteWordSource {
  return protocol === 'tool'
    ? createToolSource(baseUrl, fetchImpl)
    : createQuerySource(baseUrl, fetchImpl);
}
