import { GameError } from '../errors/index.js';
import type { BoardSnapshot, Cell, PlayerId, Position } from './types.js';

/** Resolves a player id to a display name for error messages */
export type PlayerNameResolver = (playerId: PlayerId) => string;

/** Orthogonal offsets in up, down, left, right order */
const NEIGHBOR_OFFSETS: readonly Position[] = [
  { row: -1, col: 0 },
  { row: 1, col: 0 },
  { row: 0, col: -1 },
  { row: 0, col: 1 },
];

/**
 * Rectangular grid of cells, stored row-major.
 *
 * Cells start empty and can be claimed exactly once.
 */
export class Board {
  readonly rows: number;
  readonly cols: number;
  private readonly cells: Cell[];
  private filled = 0;

  constructor(rows: number, cols: number) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new GameError('INVALID_DIMENSIONS', `Invalid grid dimensions (${rows}, ${cols})`, { rows, cols });
    }
    this.rows = rows;
    this.cols = cols;
    this.cells = Array.from({ length: rows * cols }, () => ({ owner: null }));
  }

  static fromSnapshot(snapshot: BoardSnapshot): Board {
    const board = new Board(snapshot.rows, snapshot.cols);
    if (!Array.isArray(snapshot.cells) || snapshot.cells.length !== snapshot.rows) {
      throw new GameError('INVALID_PAYLOAD', `Snapshot must have ${snapshot.rows} rows`);
    }
    snapshot.cells.forEach((line, row) => {
      if (!Array.isArray(line) || line.length !== snapshot.cols) {
        throw new GameError('INVALID_PAYLOAD', `Snapshot row ${row} must have ${snapshot.cols} cells`);
      }
      line.forEach((owner, col) => {
        if (owner === null) return;
        if (typeof owner !== 'string' || owner.length === 0) {
          throw new GameError('INVALID_PAYLOAD', `Snapshot cell (${row}, ${col}) has an invalid owner`);
        }
        board.claim({ row, col }, owner);
      });
    });
    return board;
  }

  get cellCount(): number {
    return this.cells.length;
  }

  get filledCount(): number {
    return this.filled;
  }

  inBounds(pos: Position): boolean {
    return (
      Number.isInteger(pos.row) &&
      Number.isInteger(pos.col) &&
      pos.row >= 0 &&
      pos.col >= 0 &&
      pos.row < this.rows &&
      pos.col < this.cols
    );
  }

  getCell(pos: Position): Readonly<Cell> {
    this.assertInBounds(pos);
    return this.cells[pos.row * this.cols + pos.col];
  }

  ownerAt(pos: Position): PlayerId | null {
    return this.getCell(pos).owner;
  }

  /**
   * Orthogonal neighbours on the board. Diagonal cells are not adjacent.
   */
  getNeighbors(pos: Position): Position[] {
    const neighbors: Position[] = [];
    for (const offset of NEIGHBOR_OFFSETS) {
      const next = { row: pos.row + offset.row, col: pos.col + offset.col };
      if (this.inBounds(next)) {
        neighbors.push(next);
      }
    }
    return neighbors;
  }

  /**
   * Give an empty cell to a player.
   *
   * @throws GameError OUT_OF_BOUNDS or CELL_OCCUPIED; the board is unchanged on failure
   */
  claim(pos: Position, playerId: PlayerId, nameOf?: PlayerNameResolver): void {
    this.assertInBounds(pos);
    const cell = this.cells[pos.row * this.cols + pos.col];
    if (cell.owner !== null) {
      const name = nameOf ? nameOf(cell.owner) : cell.owner;
      throw new GameError('CELL_OCCUPIED', `Cell is already owned by player ${name}.`, {
        row: pos.row,
        col: pos.col,
        owner: cell.owner,
      });
    }
    cell.owner = playerId;
    this.filled++;
  }

  isFull(): boolean {
    return this.filled === this.cells.length;
  }

  /** Empty positions in row-major order */
  openPositions(): Position[] {
    const open: Position[] = [];
    this.cells.forEach((cell, index) => {
      if (cell.owner === null) {
        open.push({ row: Math.floor(index / this.cols), col: index % this.cols });
      }
    });
    return open;
  }

  snapshot(): BoardSnapshot {
    const cells: (PlayerId | null)[][] = [];
    for (let row = 0; row < this.rows; row++) {
      cells.push(this.cells.slice(row * this.cols, (row + 1) * this.cols).map((cell) => cell.owner));
    }
    return { rows: this.rows, cols: this.cols, cells };
  }

  clone(): Board {
    const copy = new Board(this.rows, this.cols);
    this.cells.forEach((cell, index) => {
      copy.cells[index].owner = cell.owner;
    });
    copy.filled = this.filled;
    return copy;
  }

  private assertInBounds(pos: Position): void {
    if (!this.inBounds(pos)) {
      throw new GameError(
        'OUT_OF_BOUNDS',
        `Invalid position (${pos.row}, ${pos.col}) for board with dimensions (${this.rows}, ${this.cols})`,
        { row: pos.row, col: pos.col },
      );
    }
  }
}
