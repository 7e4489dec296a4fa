// apps/server/src/index.ts
//
// Word service entry point.
//
// Responsibilities:
//   • Read configuration from the environment (.env supported).
//   • Load the primary word list once; a missing or empty list aborts startup.
//   • Start the tool listener (Protocol A) and the query listener (Protocol B).
//   • Close both listeners on SIGINT/SIGTERM.
//
// ---------------------------------------------------------------------------

import 'dotenv/config';
import pino from 'pino';

import { FatalLoadError, loadCorpus, type Corpus } from '@wordfinder/word-core';

import { loadConfig } from './config.js';
import { startWordService } from './service.js';

const config = loadConfig();
const log = pino({ name: 'word-service', level: config.logLevel });

/* -------------------------------------------------------------------------- */
/*                           Dictionary initialization                        */
/* -------------------------------------------------------------------------- */
function loadCorpusOrExit(path: string): Corpus {
  try {
    return loadCorpus(path);
  } catch (err) {
    if (err instanceof FatalLoadError) {
      log.fatal({ err }, 'cannot start without a word list');
      process.exit(1);
    }
    throw err;
  }
}

const corpus = loadCorpusOrExit(config.wordsFile);
log.info(
  { words: corpus.size, rejected: corpus.rejected, source: corpus.source },
  'word list loaded',
);

/* -------------------------------------------------------------------------- */
/*                                   Boot                                     */
/* -------------------------------------------------------------------------- */
try {
  const running = await startWordService({
    corpus,
    host: config.host,
    toolPort: config.toolPort,
    queryPort: config.queryPort,
    logger: log,
  });
  log.info({ tool: running.tool.port, query: running.query.port }, 'server up');

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'shutting down');
    running.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
} catch (err) {
  log.fatal({ err }, 'failed to bind listeners');
  process.exit(1);
}
