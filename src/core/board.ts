import { Board, BoardDimensions, Cell, ClearResult, Color, Point } from './types';

export class MatrixBoard implements Board {
  public readonly width: number;
  public readonly height: number;
  private cells: Cell[][];

  constructor(dimensions: BoardDimensions) {
    this.width = dimensions.width;
    this.height = dimensions.height;
    this.cells = Array.from({ length: this.height }, () => emptyRow(this.width));
  }

  static fromRows(rows: readonly (readonly Cell[])[]): MatrixBoard {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    if (height === 0 || width === 0) {
      throw new Error('Board rows must not be empty');
    }
    const board = new MatrixBoard({ width, height });
    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw new Error(`Row ${y} has ${row.length} cells, expected ${width}`);
      }
      row.forEach((cell, x) => board.set(x, y, cell));
    });
    return board;
  }

  clone(): MatrixBoard {
    return MatrixBoard.fromRows(this.cells);
  }

  get(x: number, y: number): Cell | undefined {
    if (!this.isInside(x, y)) {
      return undefined;
    }
    return this.cells[y]?.[x];
  }

  set(x: number, y: number, value: Cell): void {
    if (!this.isInside(x, y)) {
      throw new Error(`Coordinates (${x}, ${y}) are outside of the board`);
    }
    const row = this.cells[y];
    if (!row) {
      throw new Error(`Row ${y} missing in board data`);
    }
    row[x] = value;
  }

  isInside(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // Only meaningful for inside coordinates; outside reads as empty.
  isOccupied(x: number, y: number): boolean {
    return (this.get(x, y) ?? null) !== null;
  }

  fits(cells: readonly Point[]): boolean {
    return cells.every(({ x, y }) => this.isInside(x, y) && !this.isOccupied(x, y));
  }

  // Cells off the grid are dropped; a piece locked above the top shows up
  // as a failed spawn.
  commit(cells: readonly Point[], color: Color): void {
    for (const { x, y } of cells) {
      if (this.isInside(x, y)) {
        this.set(x, y, color);
      }
    }
  }

  clearFullRows(): ClearResult {
    const clearedRows: number[] = [];
    const survivors: Cell[][] = [];
    this.cells.forEach((row, y) => {
      if (row.every((cell) => cell !== null)) {
        clearedRows.push(y);
      } else {
        survivors.push(row);
      }
    });
    if (clearedRows.length === 0) {
      return { count: 0, clearedRows };
    }

    const fresh = Array.from({ length: clearedRows.length }, () => emptyRow(this.width));
    this.cells = [...fresh, ...survivors];
    return { count: clearedRows.length, clearedRows };
  }

  rows(): Cell[][] {
    return this.cells.map((row) => [...row]);
  }
}

function emptyRow(width: number): Cell[] {
  return Array.from({ length: width }, (): Cell => null);
}

export const STANDARD_BOARD: BoardDimensions = {
  width: 10,
  height: 20,
};
