export type GameErrorCode =
  | 'INVALID_DIMENSIONS'
  | 'OUT_OF_BOUNDS'
  | 'CELL_OCCUPIED'
  | 'INVALID_MOVE_FORMAT'
  | 'INVALID_CONFIG'
  | 'GAME_OVER'
  | 'GAME_IN_PROGRESS'
  | 'AGENT_FAILED'
  | 'INVALID_PAYLOAD'
  | 'TIMEOUT';

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GameErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
  }
}

/** Narrow an unknown thrown value to its message, keeping GameError text intact */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isGameError(error: unknown, code?: GameErrorCode): error is GameError {
  if (!(error instanceof GameError)) return false;
  return code === undefined || error.code === code;
}
