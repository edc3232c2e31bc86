export {
  DEFAULT_COLS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_ROWS,
  TileGridGame,
  createGameId,
} from './tile-grid-game.js';
export type {
  GameConfig,
  GameEndReason,
  GameEvents,
  GameResult,
  GameState,
  MoveRecord,
} from './tile-grid-game.js';
export type { MoveContext, Player, PlayerKind } from './player.js';
