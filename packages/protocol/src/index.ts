// packages/protocol/src/index.ts
//
// Shared protocol definitions for the word service and its clients.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Protocol A: structured tool call (`{ name, input: { letters } }`),
//     optionally wrapped in a JSON-RPC 2.0 envelope.
//   - Protocol B: plain query (`GET /find_words?letters=a,b,c`).
//   - The `find_words` tool descriptor served by `GET /tools`.
//
// These schemas are consumed on both ends (server validates inputs, client
// validates whatever comes back before trusting it).

import { z } from 'zod';

export const FIND_WORDS_TOOL = 'find_words';
export const FIND_WORDS_PATH = '/find_words';

/* -------------------------------------------------------------------------- */
/*                         Protocol A: tool call                              */
/* -------------------------------------------------------------------------- */

const SINGLE_LETTER = 'each letter must be a single character';

/**
 * Tool input.
 *  - letters: available letters, each a single-character string
 */
export const findWordsInput = z.object({
  letters: z.array(
    z.string({ invalid_type_error: 'letters must be strings' }).length(1, SINGLE_LETTER),
  ),
});
export type FindWordsInput = z.infer<typeof findWordsInput>;

/**
 * Tool call request:
 *  - name:  tool to invoke (only "find_words" exists)
 *  - input: tool arguments
 */
export const toolCallReq = z.object({
  name: z.string().min(1),
  input: findWordsInput,
});
export type ToolCallReq = z.infer<typeof toolCallReq>;

export const toolCallOk = z.object({ result: z.array(z.string()) });
export const toolCallErr = z.object({ error: z.string() });
export const toolCallRes = z.union([toolCallOk, toolCallErr]);
export type ToolCallRes = z.infer<typeof toolCallRes>;

/**
 * JSON-RPC 2.0 envelope around a tool call, as sent by generic RPC clients:
 *   { jsonrpc: "2.0", id: 1, method: "call_tool", params: { name, input } }
 */
export const rpcId = z.union([z.string(), z.number(), z.null()]);
export type RpcId = z.infer<typeof rpcId>;

export const rpcCallReq = z.object({
  jsonrpc: z.literal('2.0'),
  id: rpcId.optional(),
  method: z.literal('call_tool'),
  params: toolCallReq,
});
export type RpcCallReq = z.infer<typeof rpcCallReq>;

export type RpcCallRes = { jsonrpc: '2.0'; id: RpcId } & ToolCallRes;

/** Descriptor returned by `GET /tools`. */
export const findWordsTool = {
  name: FIND_WORDS_TOOL,
  description:
    'Find every word of 4 or more letters that can be spelled using only the given letters (letters may repeat).',
  inputSchema: {
    type: 'object',
    properties: {
      letters: {
        type: 'array',
        items: { type: 'string' },
        description: "Allowed letters, e.g. ['a', 'c', 'e', 'h']",
      },
    },
    required: ['letters'],
  },
} as const;

/* -------------------------------------------------------------------------- */
/*                         Protocol B: plain query                            */
/* -------------------------------------------------------------------------- */

/**
 * Query string of `GET /find_words`.
 *  - letters: comma-separated letters ("a,c,e"); empty pieces are dropped
 *    and every other piece must be one character. Must appear exactly once.
 */
export const findWordsQuery = z.object({
  letters: z
    .string({
      required_error: 'letters query parameter is required',
      invalid_type_error: 'letters must be given once as a comma-separated list',
    })
    .transform((s) =>
      s
        .split(',')
        .map((l) => l.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string().length(1, SINGLE_LETTER))),
});
export type FindWordsQuery = z.output<typeof findWordsQuery>;

/** Response body of `GET /find_words`: a JSON array of words. */
export const findWordsRes = z.array(z.string());
export type FindWordsRes = z.infer<typeof findWordsRes>;

/**
 * Flattens a ZodError into one readable line, e.g.
 *   "input.letters.1: letters must be strings"
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}
