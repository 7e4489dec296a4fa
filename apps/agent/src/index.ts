// apps/agent/src/index.ts
//
// Lookup CLI: `npm run lookup -- acehist`
//
// Asks the configured word service for the words, falls back to the local
// list when the service is down, and prints them grouped by length together
// with the length distribution.

import 'dotenv/config';
import pino from 'pino';

import {
  FatalLoadError,
  formatWordSuggestions,
  lengthDistribution,
  loadCorpus,
  maxLength,
} from '@wordfinder/word-core';

import { WordFinder, createRemoteSource } from './client.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const log = pino({ name: 'word-lookup', level: config.logLevel });

const letters = [...process.argv.slice(2).join('').replace(/\s+/g, '')];
if (letters.length === 0) {
  process.stderr.write('usage: lookup <letters>\n');
  process.exit(2);
}

try {
  const finder = new WordFinder({
    remote: createRemoteSource(config.protocol, config.serviceUrl),
    fallbackCorpus: loadCorpus(config.fallbackWordsFile),
    timeoutMs: config.timeoutMs,
    logger: log,
  });

  const { words, source } = await finder.findWords(letters);
  const dist = [...lengthDistribution(words)].sort((a, b) => b[0] - a[0]);

  const out = [
    `source: ${source} (${words.length} words, longest ${maxLength(words)})`,
    formatWordSuggestions(words, Number.POSITIVE_INFINITY),
    '',
    ...dist.map(([length, count]) => `${length}: ${count}`),
  ];
  process.stdout.write(`${out.join('\n')}\n`);
} catch (err) {
  if (!(err instanceof FatalLoadError)) throw err;
  log.fatal({ err }, 'cannot load fallback word list');
  process.exit(1);
}
