// apps/server/src/service.ts
//
// Service frontend: one WordService, two listeners.
//
//   tool  listener → Protocol A (toolApp.ts)
//   query listener → Protocol B (queryApp.ts)
//
// Both listeners run concurrently on Node's event loop. Lookups are
// synchronous reads of an immutable corpus, so requests never share
// mutable state.

import type { Corpus } from '@wordfinder/word-core';
import type { Logger } from 'pino';

import { startListener, type RunningListener } from './listen.js';
import { createQueryApp } from './queryApp.js';
import { createToolApp } from './toolApp.js';
import { WordService } from './wordService.js';

export { WordService } from './wordService.js';
export { createQueryApp } from './queryApp.js';
export { createToolApp } from './toolApp.js';
export { startListener, type RunningListener } from './listen.js';

export type WordServiceOptions = {
  corpus: Corpus;
  host: string;
  toolPort: number;
  queryPort: number;
  logger: Logger;
};

export type RunningWordService = {
  service: WordService;
  tool: RunningListener;
  query: RunningListener;
  close: () => Promise<void>;
};

/**
 * Binds both listeners without blocking the caller.
 * If either port cannot be bound, the other listener is closed and the bind
 * error is rethrown.
 */
export async function startWordService(
  opts: WordServiceOptions,
): Promise<RunningWordService> {
  const { corpus, host, logger } = opts;
  const service = new WordService(corpus, logger);

  const [tool, query] = await Promise.allSettled([
    startListener('tool', createToolApp(service, logger), { host, port: opts.toolPort }, logger),
    startListener('query', createQueryApp(service, logger), { host, port: opts.queryPort }, logger),
  ]);

  if (tool.status === 'fulfilled' && query.status === 'fulfilled') {
    const listeners = [tool.value, query.value];
    return {
      service,
      tool: tool.value,
      query: query.value,
      close: async () => {
        await Promise.all(listeners.map((l) => l.close()));
      },
    };
  }

  let failure: unknown;
  for (const r of [tool, query]) {
    if (r.status === 'fulfilled') await r.value.close();
    else failure ??= r.reason;
  }
  throw failure;
}
