// apps/agent/src/__tests__/agent.test.ts
//
// Word agent wiring with a fake model and finder: letters are picked up from
// observations, remembered across turns, and the enriched prompt reaches the
// model.

import pino from 'pino';

import { enhanceObservation } from '@wordfinder/word-core';

import {
  createWordAgent,
  playTurn,
  type GameEnvironment,
  type LanguageModel,
} from '../agent.js';
import type { WordLookup } from '../client.js';

const silent = pino({ level: 'silent' });
const WORDS = ['chaise', 'each'];

function setup() {
  const generate = vi.fn(async (_prompt: string) => '[chaise]');
  const model: LanguageModel = { generate };
  const findWords = vi.fn(
    async (_letters: Iterable<string>): Promise<WordLookup> => ({
      words: WORDS,
      source: 'remote',
    }),
  );
  const agent = createWordAgent({ model, finder: { findWords }, logger: silent });
  return { agent, generate, findWords };
}

describe('createWordAgent', () => {
  it('passes observations through until letters are known', async () => {
    const { agent, generate, findWords } = setup();
    await expect(agent('Waiting for the game to start')).resolves.toBe('[chaise]');
    expect(generate).toHaveBeenCalledWith('Waiting for the game to start');
    expect(findWords).not.toHaveBeenCalled();
  });

  it('adds suggestions and analysis on the first move', async () => {
    const { agent, generate, findWords } = setup();
    const obs = 'You are Player 0 in Spelling Bee.\nAllowed Letters: ACEHIST';
    await agent(obs);

    expect(findWords).toHaveBeenCalledWith(['a', 'c', 'e', 'h', 'i', 's', 't']);
    expect(generate).toHaveBeenCalledWith(
      enhanceObservation(obs, WORDS, { firstMove: true }),
    );
  });

  it('remembers letters for later observations', async () => {
    const { agent, generate, findWords } = setup();
    await agent('You are Player 0.\nAllowed Letters: acehist');
    const later = 'You are Player 0.\n[Player 1] [each]';
    await agent(later);

    expect(findWords).toHaveBeenLastCalledWith(['a', 'c', 'e', 'h', 'i', 's', 't']);
    expect(generate).toHaveBeenLastCalledWith(
      enhanceObservation(later, WORDS, { firstMove: false }),
    );
  });
});

describe('playTurn', () => {
  it('observes, decides and submits the action', async () => {
    const { agent } = setup();
    const act = vi.fn(async (_action: string) => {});
    const env: GameEnvironment = {
      observe: async () => 'Allowed Letters: acehist',
      act,
    };

    await expect(playTurn(env, agent)).resolves.toBe('[chaise]');
    expect(act).toHaveBeenCalledWith('[chaise]');
  });
});
