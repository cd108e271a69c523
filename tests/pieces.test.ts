import { describe, expect, it } from 'vitest';

import { Piece } from '../src/core/piece';
import {
  getAbsoluteCells,
  normaliseRotation,
  PIECE_COLORS,
  ROTATION_TABLE,
  rotations,
  SHAPE_KINDS,
} from '../src/core/pieces';

describe('shape catalog', () => {
  it('lists the seven kinds once each', () => {
    expect([...SHAPE_KINDS]).toEqual(['I', 'O', 'T', 'S', 'Z', 'J', 'L']);
  });

  it('has four distinct cells in every rotation of every kind', () => {
    for (const kind of SHAPE_KINDS) {
      for (let rotation = 0; rotation < 4; rotation += 1) {
        const cells = rotations(kind, rotation);
        const keys = new Set(cells.map(([dx, dy]) => `${dx},${dy}`));
        expect(cells).toHaveLength(4);
        expect(keys.size).toBe(4);
      }
    }
  });

  it('wraps rotation indices modulo four', () => {
    expect(normaliseRotation(4)).toBe(0);
    expect(normaliseRotation(-1)).toBe(3);
    expect(normaliseRotation(6)).toBe(2);
    expect(rotations('T', -1)).toEqual(rotations('T', 3));
    expect(rotations('J', 5)).toEqual(rotations('J', 1));
  });

  it('is frozen', () => {
    expect(Object.isFrozen(ROTATION_TABLE)).toBe(true);
    expect(Object.isFrozen(ROTATION_TABLE.S)).toBe(true);
    expect(Object.isFrozen(ROTATION_TABLE.S[1])).toBe(true);
    expect(Object.isFrozen(PIECE_COLORS)).toBe(true);
  });

  it('shifts offsets by the anchor', () => {
    expect(getAbsoluteCells('O', 0, { x: 3, y: 5 })).toEqual([
      { x: 3, y: 5 },
      { x: 4, y: 5 },
      { x: 3, y: 6 },
      { x: 4, y: 6 },
    ]);
    expect(getAbsoluteCells('Z', 1, { x: 0, y: 0 })).toContainEqual({ x: 1, y: -1 });
  });
});

describe('Piece', () => {
  it('spawns in rotation 0 with the color of its kind', () => {
    const piece = new Piece('T', 3, 0);
    expect(piece.rotation).toBe(0);
    expect(piece.color).toBe('#800080');
    expect(piece.occupiedCells()).toEqual([
      { x: 3, y: 1 },
      { x: 4, y: 1 },
      { x: 5, y: 1 },
      { x: 4, y: 0 },
    ]);
  });

  it('keeps exactly four distinct cells through any rotation sequence', () => {
    for (const kind of SHAPE_KINDS) {
      const piece = new Piece(kind, 4, 4);
      for (const step of [1, 1, -1, 1, 1, 1, -1, -1] as const) {
        piece.rotate(step);
        const keys = new Set(piece.occupiedCells().map(({ x, y }) => `${x},${y}`));
        expect(keys.size).toBe(4);
      }
    }
  });

  it('rotates both ways around the table', () => {
    const piece = new Piece('L', 0, 0);
    piece.rotate(-1);
    expect(piece.rotation).toBe(3);
    piece.rotate(1);
    piece.rotate(1);
    expect(piece.rotation).toBe(1);
  });

  it('restores a saved state exactly', () => {
    const piece = new Piece('S', 3, 0);
    const saved = piece.snapshot();
    piece.moveBy(2, 5);
    piece.rotate(1);
    piece.restore(saved);
    expect(piece.snapshot()).toEqual({ kind: 'S', rotation: 0, x: 3, y: 0 });
  });

  it('refuses a state from another kind', () => {
    const piece = new Piece('S', 3, 0);
    expect(() => piece.restore({ kind: 'Z', rotation: 0, x: 0, y: 0 })).toThrow(
      'Cannot restore Z state onto S piece',
    );
  });

  it('clones independently', () => {
    const piece = new Piece('I', 3, 0);
    const copy = piece.clone();
    copy.moveBy(0, 3);
    expect(piece.y).toBe(0);
    expect(copy.y).toBe(3);
  });
});
