import { type MoveContext, type Player, type Position, parseMove } from 'tilegrid-core';

export const MOVE_PROMPT = 'Enter row-column move: ';

/** The part of a `node:readline/promises` Interface the console player uses */
export interface LineReader {
  question(query: string, options?: { signal?: AbortSignal }): Promise<string>;
}

/**
 * Human seat reading `row,col` answers from a terminal.
 */
export class ConsolePlayer implements Player {
  readonly kind = 'human';

  constructor(
    readonly id: string,
    readonly name: string,
    readonly symbol: string,
    private readonly reader: LineReader,
  ) {}

  async proposeMove(context: MoveContext): Promise<Position> {
    const last = context.feedback[context.feedback.length - 1];
    if (last !== undefined) {
      console.log(`Move rejected: ${last}`);
    }
    const answer = await this.reader.question(MOVE_PROMPT, { signal: context.signal });
    return parseMove(answer);
  }
}
