// apps/agent/src/config.ts
//
// Environment configuration for the agent side.
//
//   LOG_LEVEL                pino level (default "info")
//   WORD_SERVICE_URL         base URL of the word service (default http://localhost:8000)
//   WORD_SERVICE_PROTOCOL    "tool" (Protocol A) or "query" (Protocol B)
//   WORD_SERVICE_TIMEOUT_MS  bound on the remote attempt (default 3000, at most 60000)
//   FALLBACK_WORDS_FILE      secondary word list for local lookups
//                            (default: the word-list package's dictionary)

import wordListPath from 'word-list';
import { z } from 'zod';

export const DEFAULT_FALLBACK_WORDS_FILE: string = wordListPath;
export const MAX_TIMEOUT_MS = 60_000;

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  WORD_SERVICE_URL: z.string().url().default('http://localhost:8000'),
  WORD_SERVICE_PROTOCOL: z.enum(['tool', 'query']).default('tool'),
  WORD_SERVICE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_TIMEOUT_MS, `must be at most ${MAX_TIMEOUT_MS} ms`)
    .default(3000),
  FALLBACK_WORDS_FILE: z.string().min(1).default(DEFAULT_FALLBACK_WORDS_FILE),
});

export type AgentConfig = {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  serviceUrl: string;
  protocol: 'tool' | 'query';
  timeoutMs: number;
  fallbackWordsFile: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const e = envSchema.parse(env);
  return {
    logLevel: e.LOG_LEVEL,
    serviceUrl: e.WORD_SERVICE_URL,
    protocol: e.WORD_SERVICE_PROTOCOL,
    timeoutMs: e.WORD_SERVICE_TIMEOUT_MS,
    fallbackWordsFile: e.FALLBACK_WORDS_FILE,
  };
}
