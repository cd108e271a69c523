import { getAbsoluteCells, PIECE_COLORS, rotate } from './pieces';
import {
  ActivePieceView,
  Color,
  PieceState,
  Point,
  Rotation,
  RotationDirection,
  ShapeKind,
} from './types';

/**
 * A falling piece. It knows its own cells but nothing about the board:
 * callers check placements and put the previous state back with
 * {@link Piece.restore} when a change does not fit.
 */
export class Piece {
  public readonly kind: ShapeKind;
  public readonly color: Color;
  public rotation: Rotation = 0;
  public x: number;
  public y: number;

  constructor(kind: ShapeKind, x: number, y: number) {
    this.kind = kind;
    this.color = PIECE_COLORS[kind];
    this.x = x;
    this.y = y;
  }

  occupiedCells(): Point[] {
    return getAbsoluteCells(this.kind, this.rotation, { x: this.x, y: this.y });
  }

  rotate(direction: RotationDirection): void {
    this.rotation = rotate(this.rotation, direction);
  }

  moveBy(dx: number, dy: number): void {
    this.x += dx;
    this.y += dy;
  }

  resetToSpawn(column: number, row: number): void {
    this.x = column;
    this.y = row;
    this.rotation = 0;
  }

  snapshot(): PieceState {
    return { kind: this.kind, rotation: this.rotation, x: this.x, y: this.y };
  }

  restore(state: PieceState): void {
    if (state.kind !== this.kind) {
      throw new Error(`Cannot restore ${state.kind} state onto ${this.kind} piece`);
    }
    this.rotation = state.rotation;
    this.x = state.x;
    this.y = state.y;
  }

  clone(): Piece {
    const copy = new Piece(this.kind, this.x, this.y);
    copy.rotation = this.rotation;
    return copy;
  }

  view(): ActivePieceView {
    return { ...this.snapshot(), color: this.color, cells: this.occupiedCells() };
  }
}
