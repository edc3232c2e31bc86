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
} from './payloads.js';
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
} from './payloads.js';
