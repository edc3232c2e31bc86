import {
  type ChatCompletionsApi,
  type CompletionFn,
  ConsolePlayer,
  GreedyPlayer,
  type LineReader,
  LlmPlayer,
  RandomPlayer,
  createOpenAICompletion,
} from 'tilegrid-agents';
import { GameError, type Player, errorMessage } from 'tilegrid-core';
import type { SeatKind } from './config.js';

/** Symbols per seat, matching the original two-player layout */
export const SEAT_SYMBOLS = ['*', 'o'] as const;

const SEAT_NAMES: Record<SeatKind, string> = {
  human: 'human',
  openai: 'agent',
  random: 'random',
  greedy: 'greedy',
};

export interface SeatDeps {
  /** Needed only when a human seat is configured */
  reader: () => LineReader;
  /** Needed only when an openai seat is configured; creating the client may throw without an API key */
  completion: () => CompletionFn;
}

/**
 * Completion factory for openai seats. The SDK client refuses to construct
 * without an API key; that surfaces as a configuration error.
 */
export function openAICompletionFactory(createClient: () => ChatCompletionsApi, model: string): () => CompletionFn {
  return () => {
    let client: ChatCompletionsApi;
    try {
      client = createClient();
    } catch (error) {
      throw new GameError('INVALID_CONFIG', 'OPENAI_API_KEY is required for openai seats', {
        cause: errorMessage(error),
      });
    }
    return createOpenAICompletion(client, { model });
  };
}

export function createSeat(kind: SeatKind, id: string, name: string, symbol: string, deps: SeatDeps): Player {
  switch (kind) {
    case 'human':
      return new ConsolePlayer(id, name, symbol, deps.reader());
    case 'openai':
      return new LlmPlayer({ id, name, symbol, complete: deps.completion() });
    case 'random':
      return new RandomPlayer(id, name, symbol);
    case 'greedy':
      return new GreedyPlayer(id, name, symbol);
  }
}

/**
 * Build both seats. Identical kinds get numbered names so the scoreboard can tell them apart.
 */
export function createSeats(p1: SeatKind, p2: SeatKind, deps: SeatDeps): [Player, Player] {
  const same = p1 === p2;
  const name = (kind: SeatKind, seat: number) => (same ? `${SEAT_NAMES[kind]} ${seat}` : SEAT_NAMES[kind]);
  return [
    createSeat(p1, 'p1', name(p1, 1), SEAT_SYMBOLS[0], deps),
    createSeat(p2, 'p2', name(p2, 2), SEAT_SYMBOLS[1], deps),
  ];
}
