export const TILEGRID_VERSION = '0.1.0';

export { GameError, errorMessage, isGameError } from './errors/index.js';
export type { GameErrorCode } from './errors/index.js';

export {
  Board,
  EMPTY_SYMBOL,
  OPPONENT_SYMBOL,
  OWN_SYMBOL,
  formatPosition,
  formatPositions,
  perspectiveSymbols,
  positionKey,
  positionsEqual,
  renderBoard,
  symbolsFromTable,
} from './board/index.js';
export type { BoardSnapshot, Cell, PlayerId, PlayerNameResolver, Position, SymbolFor } from './board/index.js';

export { decideResult, findComponents, largestComponentAfter, scoreBoard } from './rules/index.js';
export type { Component, GameWinner, PlayerScore, ScoreResult } from './rules/index.js';

export { parseMove } from './moves/index.js';

export {
  DEFAULT_COLS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_ROWS,
  TileGridGame,
  createGameId,
} from './game/index.js';
export type {
  GameConfig,
  GameEndReason,
  GameEvents,
  GameResult,
  GameState,
  MoveContext,
  MoveRecord,
  Player,
  PlayerKind,
} from './game/index.js';

// Arena wire protocol
export {
  isArenaPayload,
  isErrorPayload,
  isGameEnd,
  isGameStart,
  isGameState,
  isJoin,
  isMove,
  isMoveRejected,
  isTurnRequest,
  isWaiting,
} from './protocol/index.js';
export type {
  ArenaPayload,
  ClientPayload,
  ErrorPayload,
  GameEndPayload,
  GameStartPayload,
  GameStatePayload,
  JoinPayload,
  MovePayload,
  MoveRejectedPayload,
  ServerPayload,
  TurnRequestPayload,
  WaitingPayload,
  WireEndReason,
  WireWinner,
} from './protocol/index.js';
