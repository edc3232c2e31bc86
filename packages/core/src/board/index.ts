export { Board } from './board.js';
export type { PlayerNameResolver } from './board.js';
export type { BoardSnapshot, Cell, PlayerId, Position } from './types.js';
export { positionKey, positionsEqual } from './types.js';
export {
  EMPTY_SYMBOL,
  OPPONENT_SYMBOL,
  OWN_SYMBOL,
  formatPosition,
  formatPositions,
  perspectiveSymbols,
  renderBoard,
  symbolsFromTable,
} from './render.js';
export type { SymbolFor } from './render.js';
