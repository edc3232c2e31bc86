/**
 * Arena Wire Protocol Types
 *
 * JSON messages exchanged between the arena game server and remote agents.
 * One message per WebSocket frame.
 */

import type { BoardSnapshot, PlayerId, Position } from '../board/index.js';
import type { PlayerScore } from '../rules/index.js';

/** Winner as reported on the wire */
export type WireWinner = PlayerId | 'draw' | null;

/** Why a remote game ended */
export type WireEndReason = 'board-full' | 'forfeit' | 'disconnect' | 'aborted';

// ============================================
// Client -> Server
// ============================================

/**
 * Join the arena queue under a display name
 */
export interface JoinPayload {
  type: 'join';
  name: string;
}

/**
 * Move answer to a turn request. `turn` and `attempt` echo the request being answered.
 */
export interface MovePayload {
  type: 'move';
  gameId: string;
  turn: number;
  attempt: number;
  row: number;
  col: number;
}

// ============================================
// Server -> Client
// ============================================

/**
 * Joined, waiting for an opponent
 */
export interface WaitingPayload {
  type: 'waiting';
}

export interface GameStartPayload {
  type: 'game-start';
  gameId: string;
  you: PlayerId;
  symbol: string;
  opponent: { name: string; symbol: string };
  rows: number;
  cols: number;
}

/**
 * Server asks the client for a move
 */
export interface TurnRequestPayload {
  type: 'turn-request';
  gameId: string;
  turn: number;
  attempt: number;
  board: BoardSnapshot;
  /** Board drawn from the receiver's perspective (own `o`, opponent `*`) */
  rendered: string;
  openPositions: Position[];
  feedback: string[];
}

export interface MoveRejectedPayload {
  type: 'move-rejected';
  gameId: string;
  reason: string;
}

/**
 * Broadcast after every accepted move
 */
export interface GameStatePayload {
  type: 'game-state';
  gameId: string;
  board: BoardSnapshot;
  lastMove: { playerId: PlayerId; row: number; col: number };
}

export interface GameEndPayload {
  type: 'game-end';
  gameId: string;
  winner: WireWinner;
  reason: WireEndReason;
  scores: PlayerScore[];
}

export interface ErrorPayload {
  type: 'error';
  error: string;
}

export type ClientPayload = JoinPayload | MovePayload;

export type ServerPayload =
  | WaitingPayload
  | GameStartPayload
  | TurnRequestPayload
  | MoveRejectedPayload
  | GameStatePayload
  | GameEndPayload
  | ErrorPayload;

export type ArenaPayload = ClientPayload | ServerPayload;

const PAYLOAD_TYPES: ReadonlySet<string> = new Set([
  'join',
  'move',
  'waiting',
  'game-start',
  'turn-request',
  'move-rejected',
  'game-state',
  'game-end',
  'error',
]);

/** Loose record view used by the guards below */
function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

function isCoordinate(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isPosition(value: unknown): value is Position {
  const p = asRecord(value);
  return !!p && isCoordinate(p.row) && isCoordinate(p.col);
}

function isBoardSnapshot(value: unknown): value is BoardSnapshot {
  const b = asRecord(value);
  if (!b || !isCoordinate(b.rows) || !isCoordinate(b.cols) || !Array.isArray(b.cells)) return false;
  return b.cells.every(
    (row: unknown) => Array.isArray(row) && row.every((cell: unknown) => cell === null || typeof cell === 'string'),
  );
}

function isPlayerScore(value: unknown): value is PlayerScore {
  const s = asRecord(value);
  return (
    !!s && isNonEmptyString(s.playerId) && isCoordinate(s.largest) && isCoordinate(s.components) && isCoordinate(s.tiles)
  );
}

/**
 * Type guard to check if a value is any arena payload
 */
export function isArenaPayload(payload: unknown): payload is ArenaPayload {
  const p = asRecord(payload);
  return !!p && typeof p.type === 'string' && PAYLOAD_TYPES.has(p.type);
}

export function isJoin(payload: unknown): payload is JoinPayload {
  const p = asRecord(payload);
  if (!p || p.type !== 'join') return false;
  return isNonEmptyString(p.name);
}

export function isMove(payload: unknown): payload is MovePayload {
  const p = asRecord(payload);
  if (!p || p.type !== 'move') return false;
  if (!isNonEmptyString(p.gameId)) return false;
  if (!isCoordinate(p.turn) || !isCoordinate(p.attempt)) return false;
  return isCoordinate(p.row) && isCoordinate(p.col);
}

export function isWaiting(payload: unknown): payload is WaitingPayload {
  return asRecord(payload)?.type === 'waiting';
}

export function isGameStart(payload: unknown): payload is GameStartPayload {
  const p = asRecord(payload);
  if (!p || p.type !== 'game-start') return false;
  if (!isNonEmptyString(p.gameId) || !isNonEmptyString(p.you) || !isNonEmptyString(p.symbol)) return false;
  const opponent = asRecord(p.opponent);
  if (!opponent || !isNonEmptyString(opponent.name) || !isNonEmptyString(opponent.symbol)) return false;
  return isCoordinate(p.rows) && isCoordinate(p.cols);
}

export function isTurnRequest(payload: unknown): payload is TurnRequestPayload {
  const p = asRecord(payload);
  if (!p || p.type !== 'turn-request') return false;
  if (!isNonEmptyString(p.gameId)) return false;
  if (!isCoordinate(p.turn) || !isCoordinate(p.attempt)) return false;
  if (!isBoardSnapshot(p.board) || typeof p.rendered !== 'string') return false;
  if (!Array.isArray(p.openPositions) || !p.openPositions.every(isPosition)) return false;
  return Array.isArray(p.feedback) && p.feedback.every((f: unknown) => typeof f === 'string');
}

export function isMoveRejected(payload: unknown): payload is MoveRejectedPayload {
  const p = asRecord(payload);
  if (!p || p.type !== 'move-rejected') return false;
  return isNonEmptyString(p.gameId) && typeof p.reason === 'string';
}

export function isGameState(payload: unknown): payload is GameStatePayload {
  const p = asRecord(payload);
  if (!p || p.type !== 'game-state') return false;
  if (!isNonEmptyString(p.gameId) || !isBoardSnapshot(p.board)) return false;
  const last = asRecord(p.lastMove);
  return !!last && isNonEmptyString(last.playerId) && isCoordinate(last.row) && isCoordinate(last.col);
}

export function isGameEnd(payload: unknown): payload is GameEndPayload {
  const p = asRecord(payload);
  if (!p || p.type !== 'game-end') return false;
  if (!isNonEmptyString(p.gameId)) return false;
  if (p.winner !== null && !isNonEmptyString(p.winner)) return false;
  if (!isValidEndReason(p.reason)) return false;
  return Array.isArray(p.scores) && p.scores.every(isPlayerScore);
}

export function isErrorPayload(payload: unknown): payload is ErrorPayload {
  const p = asRecord(payload);
  return !!p && p.type === 'error' && typeof p.error === 'string';
}

/** Helper to validate WireEndReason type */
function isValidEndReason(reason: unknown): reason is WireEndReason {
  return reason === 'board-full' || reason === 'forfeit' || reason === 'disconnect' || reason === 'aborted';
}
