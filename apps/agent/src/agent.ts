// apps/agent/src/agent.ts
//
// Word agent: sits between a game environment and a language model and
// appends word-lookup results to each observation before the model sees it.
//
// The model and the environment are collaborators reached through the two
// small interfaces below; connection setup, model choice and credentials
// belong to whoever implements them.

import {
  detectGameType,
  enhanceObservation,
  extractLetters,
  isFirstMove,
} from '@wordfinder/word-core';
import type { Logger } from 'pino';

import type { WordFinder } from './client.js';

export interface LanguageModel {
  generate(prompt: string): Promise<string>;
}

export interface GameEnvironment {
  /** Current textual observation. */
  observe(): Promise<string>;
  /** Submits the chosen action (e.g. "[chaise]"). */
  act(action: string): Promise<void>;
}

export type WordAgent = (observation: string) => Promise<string>;

/**
 * The agent remembers the last "Allowed Letters:" it saw, since later
 * observations in a match may omit them. Until letters are known the
 * observation is passed to the model unchanged.
 */
export function createWordAgent(deps: {
  model: LanguageModel;
  finder: Pick<WordFinder, 'findWords'>;
  logger: Logger;
}): WordAgent {
  const { model, finder, logger } = deps;
  let letters: string[] | null = null;

  return async (observation) => {
    const seen = extractLetters(observation);
    if (seen && seen.length > 0) letters = seen;

    if (!letters) {
      logger.debug({ game: detectGameType(observation) }, 'no letters yet, passing through');
      return model.generate(observation);
    }

    const current = letters;
    const lookup = await finder.findWords(current);
    const firstMove = isFirstMove(observation);
    logger.info(
      { letters: current.join(''), count: lookup.words.length, source: lookup.source, firstMove },
      'observation enriched',
    );
    return model.generate(enhanceObservation(observation, lookup.words, { firstMove }));
  };
}

/** One observe → decide → act round trip. Returns the submitted action. */
export async function playTurn(env: GameEnvironment, agent: WordAgent): Promise<string> {
  const observation = await env.observe();
  const action = await agent(observation);
  await env.act(action);
  return action;
}
