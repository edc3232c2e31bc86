export { GameError, errorMessage, isGameError } from './game-error.js';
export type { GameErrorCode } from './game-error.js';
