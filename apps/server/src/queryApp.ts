// apps/server/src/queryApp.ts
//
// Protocol B: plain HTTP queries.
//
//   GET /find_words?letters=a,c,e,h,i,s,t  → 200 ["achiest","chaise",...]
//   GET /health                            → 200 {"status":"ok","words":N}
//   anything else                          → 404 "Not Found" (text/plain)
//
// A malformed `letters` parameter is a 400, a failing lookup a 500; both
// answer in plain text and only affect the request that hit them.

import cors from 'cors';
import express, {
  type ErrorRequestHandler,
  type Express,
  type Response,
} from 'express';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

import {
  FIND_WORDS_PATH,
  describeIssues,
  findWordsQuery,
  type FindWordsRes,
} from '@wordfinder/protocol';

import { BadRequestError, toHttpError } from './errors.js';
import type { WordService } from './wordService.js';

function sendError(res: Response, err: unknown, log: Logger): void {
  const httpErr = toHttpError(err);
  if (httpErr.status >= 500) log.error({ err }, 'query failed');
  else log.warn({ reason: httpErr.message }, 'rejected query');
  res
    .status(httpErr.status)
    .type('text/plain')
    .send(`Error: ${httpErr.message}`);
}

export function createQueryApp(service: WordService, log: Logger): Express {
  const app = express();
  app.use(cors());

  app.get(FIND_WORDS_PATH, (req, res) => {
    const reqLog = log.child({ reqId: nanoid(10), protocol: 'query' });
    try {
      const parsed = findWordsQuery.safeParse(req.query);
      if (!parsed.success) {
        throw new BadRequestError(describeIssues(parsed.error));
      }
      const words: FindWordsRes = service.findWords(parsed.data.letters, reqLog);
      res.status(200).json(words);
    } catch (err) {
      sendError(res, err, reqLog);
    }
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', words: service.corpus.size });
  });

  app.use((_req, res) => {
    res.status(404).type('text/plain').send('Not Found');
  });

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    sendError(res, err, log);
  };
  app.use(onError);

  return app;
}
