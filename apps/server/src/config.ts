// apps/server/src/config.ts
//
// Environment configuration for the word service.
//
//   LOG_LEVEL   pino level (default "info")
//   HOST        interface both listeners bind to (default 0.0.0.0)
//   TOOL_PORT   Protocol A listener, structured tool calls (default 8000)
//   QUERY_PORT  Protocol B listener, GET /find_words (default 8080)
//   WORDS_FILE  primary word list (default: the word-list package's dictionary)

import wordListPath from 'word-list';
import { z } from 'zod';

export const DEFAULT_WORDS_FILE: string = wordListPath;

const port = z.coerce.number().int().min(0).max(65535);

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  HOST: z.string().min(1).default('0.0.0.0'),
  TOOL_PORT: port.default(8000),
  QUERY_PORT: port.default(8080),
  WORDS_FILE: z.string().min(1).default(DEFAULT_WORDS_FILE),
});

export type ServerConfig = {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  host: string;
  toolPort: number;
  queryPort: number;
  wordsFile: string;
};

/**
 * Parses server settings from an environment map.
 * @throws ZodError when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const e = envSchema.parse(env);
  return {
    logLevel: e.LOG_LEVEL,
    host: e.HOST,
    toolPort: e.TOOL_PORT,
    queryPort: e.QUERY_PORT,
    wordsFile: e.WORDS_FILE,
  };
}
