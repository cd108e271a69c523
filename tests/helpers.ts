import { MatrixBoard } from '../src/core/board';
import { Cell, Color } from '../src/core/types';

export const GARBAGE: Color = '#808080';

/** Makes every shuffle keep catalog order: I O T S Z J L. */
export const inOrder = (): number => 0.99;

export function emptyRows(width: number, height: number): Cell[][] {
  return Array.from({ length: height }, () => Array.from({ length: width }, (): Cell => null));
}

export function boardWith(
  width: number,
  height: number,
  cells: readonly [number, number][],
  color: Color = GARBAGE,
): MatrixBoard {
  const board = new MatrixBoard({ width, height });
  for (const [x, y] of cells) {
    board.set(x, y, color);
  }
  return board;
}

export function fillRow(board: MatrixBoard, y: number, skip: readonly number[] = []): void {
  for (let x = 0; x < board.width; x += 1) {
    if (!skip.includes(x)) {
      board.set(x, y, GARBAGE);
    }
  }
}
