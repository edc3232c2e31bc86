import type { Board } from '../board/index.js';
import { type PlayerId, type Position, positionKey } from '../board/index.js';

/** Maximal 4-connected group of cells sharing one owner */
export interface Component {
  owner: PlayerId;
  /** Cells in breadth-first discovery order, starting at the row-major first cell */
  cells: Position[];
}

/**
 * Breadth-first flood fill from `start` over cells owned by `owner`.
 * `visited` is shared so callers can sweep the whole board once.
 */
function floodFill(board: Board, start: Position, owner: PlayerId, visited: Set<string>): Position[] {
  const cells: Position[] = [];
  const queue: Position[] = [start];
  visited.add(positionKey(start));

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    cells.push(current);
    for (const next of board.getNeighbors(current)) {
      const key = positionKey(next);
      if (visited.has(key) || board.ownerAt(next) !== owner) continue;
      visited.add(key);
      queue.push(next);
    }
  }
  return cells;
}

/**
 * All connected components on the board, ordered by their first cell in row-major order.
 * Empty cells belong to no component.
 */
export function findComponents(board: Board): Component[] {
  const visited = new Set<string>();
  const components: Component[] = [];

  for (let row = 0; row < board.rows; row++) {
    for (let col = 0; col < board.cols; col++) {
      const pos = { row, col };
      const owner = board.ownerAt(pos);
      if (owner === null || visited.has(positionKey(pos))) continue;
      components.push({ owner, cells: floodFill(board, pos, owner, visited) });
    }
  }
  return components;
}

/**
 * Size of the component `playerId` would own around `pos` after claiming it.
 * Returns 0 when the cell is off the board or taken. The board is not modified.
 */
export function largestComponentAfter(board: Board, pos: Position, playerId: PlayerId): number {
  if (!board.inBounds(pos) || board.ownerAt(pos) !== null) return 0;

  const visited = new Set<string>([positionKey(pos)]);
  let size = 1;
  for (const neighbor of board.getNeighbors(pos)) {
    if (visited.has(positionKey(neighbor)) || board.ownerAt(neighbor) !== playerId) continue;
    size += floodFill(board, neighbor, playerId, visited).length;
  }
  return size;
}
