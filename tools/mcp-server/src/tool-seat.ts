import { GameError, type MoveContext, type Player, type Position } from 'tilegrid-core';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function defer<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

interface PendingAnswer {
  resolve: (position: Position) => void;
  cleanup: () => void;
}

/**
 * Seat driven by tool calls. The engine's move request parks here until
 * `submit` hands it a position; `nextRequest` resolves when the engine asks
 * again, which is how a caller learns its move was rejected or the
 * opponent has replied.
 *
 * Counts as a human seat, so a rejected move never forfeits the game.
 */
export class ToolSeat implements Player {
  readonly kind = 'human';
  private requested = defer<MoveContext>();
  private answer: PendingAnswer | null = null;

  constructor(
    readonly id: string,
    readonly name: string,
    readonly symbol: string,
  ) {}

  proposeMove(context: MoveContext): Promise<Position> {
    return new Promise<Position>((resolve, reject) => {
      const onAbort = () => {
        this.answer = null;
        reject(new GameError('GAME_OVER', 'Game stopped'));
      };
      context.signal.addEventListener('abort', onAbort, { once: true });
      this.answer = { resolve, cleanup: () => context.signal.removeEventListener('abort', onAbort) };
      this.requested.resolve(context);
    });
  }

  /** Resolves with the context of the engine's next move request */
  nextRequest(): Promise<MoveContext> {
    return this.requested.promise;
  }

  isAwaitingMove(): boolean {
    return this.answer !== null;
  }

  /**
   * Answer the pending move request.
   *
   * @returns false when the engine is not waiting on this seat
   */
  submit(position: Position): boolean {
    const answer = this.answer;
    if (!answer) return false;
    this.answer = null;
    this.requested = defer<MoveContext>();
    answer.cleanup();
    answer.resolve(position);
    return true;
  }
}
