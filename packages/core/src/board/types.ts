/** Zero-indexed grid coordinate; row 0 is the top row */
export interface Position {
  row: number;
  col: number;
}

/** Player identifier, unique within a game */
export type PlayerId = string;

export interface Cell {
  owner: PlayerId | null;
}

/** Plain, JSON-safe view of a board */
export interface BoardSnapshot {
  rows: number;
  cols: number;
  /** cells[row][col] holds the owning player id, or null when empty */
  cells: (PlayerId | null)[][];
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

export function positionKey(pos: Position): string {
  return `${pos.row},${pos.col}`;
}
