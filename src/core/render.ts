import { PIECE_COLORS, SHAPE_KINDS } from './pieces';
import { Cell, GameSnapshot, Point, ShapeKind } from './types';

const ACTIVE_CHAR = '@';
const GHOST_CHAR = '+';
const EMPTY_CHAR = ' ';
const UNKNOWN_CHAR = '#';

const KIND_BY_COLOR = new Map<string, ShapeKind>(
  SHAPE_KINDS.map((kind) => [PIECE_COLORS[kind], kind]),
);

function cellChar(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) {
    return EMPTY_CHAR;
  }
  return KIND_BY_COLOR.get(cell) ?? UNKNOWN_CHAR;
}

export interface RenderOptions {
  ghost?: readonly Point[];
}

/**
 * Draws the stack as text: locked cells show their piece letter, the falling
 * piece is `@`, and its landing spot `+`.
 */
export function renderBoard(snapshot: GameSnapshot, options: RenderOptions = {}): string {
  const overlay = new Map<string, string>();
  for (const cell of options.ghost ?? []) {
    overlay.set(`${cell.x},${cell.y}`, GHOST_CHAR);
  }
  if (!snapshot.terminated) {
    for (const cell of snapshot.active.cells) {
      overlay.set(`${cell.x},${cell.y}`, ACTIVE_CHAR);
    }
  }

  const width = snapshot.board[0]?.length ?? 0;
  const border = `+${'-'.repeat(width)}+`;
  const lines = [border];
  snapshot.board.forEach((row, y) => {
    let rowString = '|';
    for (let x = 0; x < width; x += 1) {
      rowString += overlay.get(`${x},${y}`) ?? cellChar(row[x]);
    }
    lines.push(`${rowString}|`);
  });
  lines.push(border);
  return lines.join('\n');
}

export function renderStatus(snapshot: GameSnapshot): string {
  const hold = snapshot.hold ?? '-';
  const next = snapshot.next.join(' ');
  const state = snapshot.terminated ? 'GAME OVER' : 'playing';
  return `Hold=${hold} Next=${next} Lines=${snapshot.stats.lines} Time=${snapshot.stats.elapsed.toFixed(1)}s [${state}]`;
}
