export type ShapeKind = 'I' | 'O' | 'T' | 'S' | 'Z' | 'J' | 'L';

export type Rotation = 0 | 1 | 2 | 3;

export type RotationDirection = -1 | 1;

export interface Point {
  x: number;
  y: number;
}

/** CSS hex color, e.g. `#00ffff`. */
export type Color = string;

export type Cell = Color | null;

export interface BoardDimensions {
  width: number;
  height: number;
}

export interface PieceState {
  kind: ShapeKind;
  rotation: Rotation;
  x: number;
  y: number;
}

export interface ActivePieceView extends PieceState {
  color: Color;
  cells: Point[];
}

export type GamePhase = 'active' | 'gameOver';

export interface GameStats {
  lines: number;
  piecesLocked: number;
  /** Total seconds fed through `tick`. */
  elapsed: number;
}

export interface ClearResult {
  count: number;
  clearedRows: number[];
}

export interface GameSnapshot {
  board: Cell[][];
  active: ActivePieceView;
  hold: ShapeKind | null;
  holdUsed: boolean;
  next: ShapeKind[];
  stats: GameStats;
  phase: GamePhase;
  terminated: boolean;
  lockTimer: number;
  dropTimer: number;
}

export interface Board {
  readonly width: number;
  readonly height: number;
  clone(): Board;
  get(x: number, y: number): Cell | undefined;
  set(x: number, y: number, value: Cell): void;
  isInside(x: number, y: number): boolean;
  isOccupied(x: number, y: number): boolean;
  fits(cells: readonly Point[]): boolean;
  commit(cells: readonly Point[], color: Color): void;
  clearFullRows(): ClearResult;
  rows(): Cell[][];
}
