import { GameError, type MoveContext, type Player, type Position, largestComponentAfter } from 'tilegrid-core';

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

function requireOpenPositions(context: MoveContext): Position[] {
  const open = context.board.openPositions();
  if (open.length === 0) {
    throw new GameError('GAME_OVER', 'No open positions left');
  }
  return open;
}

/**
 * Claims a uniformly random open cell.
 */
export class RandomPlayer implements Player {
  readonly kind = 'bot';

  constructor(
    readonly id: string,
    readonly name: string,
    readonly symbol: string,
    private readonly random: RandomSource = Math.random,
  ) {}

  async proposeMove(context: MoveContext): Promise<Position> {
    const open = requireOpenPositions(context);
    const index = Math.min(open.length - 1, Math.floor(this.random() * open.length));
    return open[index];
  }
}

/**
 * Claims the open cell that makes its own largest component as big as possible.
 * Ties go to the first such cell in row-major order.
 */
export class GreedyPlayer implements Player {
  readonly kind = 'bot';

  constructor(
    readonly id: string,
    readonly name: string,
    readonly symbol: string,
  ) {}

  async proposeMove(context: MoveContext): Promise<Position> {
    const open = requireOpenPositions(context);
    let best = open[0];
    let bestSize = -1;
    for (const pos of open) {
      const size = largestComponentAfter(context.board, pos, context.playerId);
      if (size > bestSize) {
        best = pos;
        bestSize = size;
      }
    }
    return best;
  }
}
