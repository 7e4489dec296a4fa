// apps/server/src/toolApp.ts
//
// Protocol A: structured tool calls over HTTP/JSON.
//
// Routes:
//   GET  /tools       → { tools: [findWordsTool] }
//   POST /tools/call  → { name, input: { letters } } ⇒ { result } | { error }
//   POST /jsonrpc     → JSON-RPC 2.0 "call_tool" envelope around the same call
//
// Status codes: 200 on success, 400 for malformed input, 404 for an unknown
// tool or route, 500 when the lookup itself fails. Errors never escape the
// request that caused them.

import cors from 'cors';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

import {
  FIND_WORDS_TOOL,
  describeIssues,
  findWordsTool,
  rpcCallReq,
  rpcId,
  toolCallReq,
  type RpcCallRes,
  type RpcId,
  type ToolCallRes,
} from '@wordfinder/protocol';

import { BadRequestError, toHttpError } from './errors.js';
import type { WordService } from './wordService.js';

type ToolReply = { status: number; body: ToolCallRes };

/**
 * Runs one tool call. Always returns a reply; failures become `{ error }`.
 */
export function callTool(
  service: WordService,
  payload: unknown,
  log: Logger,
): ToolReply {
  try {
    const parsed = toolCallReq.safeParse(payload);
    if (!parsed.success) {
      throw new BadRequestError(describeIssues(parsed.error));
    }
    const { name, input } = parsed.data;
    if (name !== FIND_WORDS_TOOL) {
      log.warn({ name }, 'unknown tool');
      return { status: 404, body: { error: `Unknown tool: ${name}` } };
    }
    return { status: 200, body: { result: service.findWords(input.letters, log) } };
  } catch (err) {
    const httpErr = toHttpError(err);
    if (httpErr.status >= 500) {
      log.error({ err }, 'tool call failed');
      return { status: httpErr.status, body: { error: 'Internal error' } };
    }
    log.warn({ reason: httpErr.message }, 'rejected tool call');
    return { status: httpErr.status, body: { error: httpErr.message } };
  }
}

function idOf(body: unknown): RpcId {
  if (typeof body !== 'object' || body === null || !('id' in body)) return null;
  const parsed = rpcId.safeParse(body.id);
  return parsed.success ? parsed.data : null;
}

export function createToolApp(service: WordService, log: Logger): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '64kb' }));

  app.get('/tools', (_req, res) => {
    res.json({ tools: [findWordsTool] });
  });

  app.post('/tools/call', (req, res) => {
    const reqLog = log.child({ reqId: nanoid(10), protocol: 'tool' });
    const { status, body } = callTool(service, req.body, reqLog);
    res.status(status).json(body);
  });

  app.post('/jsonrpc', (req, res) => {
    const reqLog = log.child({ reqId: nanoid(10), protocol: 'jsonrpc' });
    const envelope = rpcCallReq.safeParse(req.body);
    if (!envelope.success) {
      const reason = describeIssues(envelope.error);
      reqLog.warn({ reason }, 'rejected rpc envelope');
      const reply: RpcCallRes = { jsonrpc: '2.0', id: idOf(req.body), error: reason };
      return res.status(400).json(reply);
    }
    const { status, body } = callTool(service, envelope.data.params, reqLog);
    const reply: RpcCallRes = { jsonrpc: '2.0', id: envelope.data.id ?? null, ...body };
    res.status(status).json(reply);
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // Reached for body-parser failures (bad JSON, oversized body)
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    const httpErr = toHttpError(err);
    if (httpErr.status >= 500) log.error({ err }, 'tool listener error');
    else log.warn({ reason: httpErr.message }, 'rejected tool request');
    res
      .status(httpErr.status)
      .json({ error: httpErr.status >= 500 ? 'Internal error' : httpErr.message });
  };
  app.use(onError);

  return app;
}
