import type { Board, PlayerId } from '../board/index.js';
import { findComponents } from './components.js';

export interface PlayerScore {
  playerId: PlayerId;
  /** Size of the player's largest connected component; this is the score */
  largest: number;
  /** Number of separate components the player owns */
  components: number;
  /** Total cells the player owns */
  tiles: number;
}

export type GameWinner = PlayerId | 'draw';

export interface ScoreResult {
  winner: GameWinner;
  scores: PlayerScore[];
}

/**
 * Score every listed player. Owners not in `playerIds` are ignored; listed players
 * without tiles score 0.
 */
export function scoreBoard(board: Board, playerIds: readonly PlayerId[]): PlayerScore[] {
  const byPlayer = new Map<PlayerId, PlayerScore>();
  for (const playerId of playerIds) {
    byPlayer.set(playerId, { playerId, largest: 0, components: 0, tiles: 0 });
  }

  for (const component of findComponents(board)) {
    const score = byPlayer.get(component.owner);
    if (!score) continue;
    score.components++;
    score.tiles += component.cells.length;
    score.largest = Math.max(score.largest, component.cells.length);
  }

  return playerIds.map((playerId) => byPlayer.get(playerId) ?? { playerId, largest: 0, components: 0, tiles: 0 });
}

/** Strictly highest `largest` wins; a shared maximum is a draw */
export function decideResult(scores: readonly PlayerScore[]): ScoreResult {
  let best: PlayerScore | null = null;
  let tied = false;

  for (const score of scores) {
    if (!best || score.largest > best.largest) {
      best = score;
      tied = false;
    } else if (score.largest === best.largest) {
      tied = true;
    }
  }

  return {
    winner: best && !tied ? best.playerId : 'draw',
    scores: scores.map((score) => ({ ...score })),
  };
}
