import { Color, Point, Rotation, ShapeKind } from './types';

type Offset = readonly [number, number];

type RotationState = readonly [Offset, Offset, Offset, Offset];

type RotationTable = Readonly<
  Record<ShapeKind, readonly [RotationState, RotationState, RotationState, RotationState]>
>;

export const SHAPE_KINDS: readonly ShapeKind[] = Object.freeze([
  'I',
  'O',
  'T',
  'S',
  'Z',
  'J',
  'L',
]);

// Offsets are [column, row] from the anchor; row grows downwards.
const ROTATION_DATA: RotationTable = {
  I: [
    [[0, 0], [1, 0], [2, 0], [3, 0]],
    [[0, 0], [0, 1], [0, 2], [0, 3]],
    [[0, 0], [1, 0], [2, 0], [3, 0]],
    [[0, 0], [0, 1], [0, 2], [0, 3]],
  ],
  O: [
    [[0, 0], [1, 0], [0, 1], [1, 1]],
    [[0, 0], [1, 0], [0, 1], [1, 1]],
    [[0, 0], [1, 0], [0, 1], [1, 1]],
    [[0, 0], [1, 0], [0, 1], [1, 1]],
  ],
  T: [
    [[0, 1], [1, 1], [2, 1], [1, 0]],
    [[1, 0], [1, 1], [1, 2], [2, 1]],
    [[0, 0], [1, 0], [2, 0], [1, 1]],
    [[0, 1], [1, 1], [1, 0], [1, 2]],
  ],
  S: [
    [[1, 0], [2, 0], [0, 1], [1, 1]],
    [[1, 0], [1, 1], [2, 1], [2, 2]],
    [[1, 1], [2, 1], [0, 2], [1, 2]],
    [[0, 0], [0, 1], [1, 1], [1, 2]],
  ],
  // The vertical states reach one row above the anchor, so a Z at row 0
  // cannot turn upright until it has fallen a row.
  Z: [
    [[0, 0], [1, 0], [1, 1], [2, 1]],
    [[1, -1], [1, 0], [0, 0], [0, 1]],
    [[0, 0], [1, 0], [1, 1], [2, 1]],
    [[1, -1], [1, 0], [0, 0], [0, 1]],
  ],
  J: [
    [[1, 0], [1, 1], [1, 2], [0, 2]],
    [[0, 0], [0, 1], [1, 1], [2, 1]],
    [[0, 0], [0, 1], [0, 2], [1, 0]],
    [[0, 0], [1, 0], [2, 0], [2, 1]],
  ],
  L: [
    [[0, 0], [0, 1], [0, 2], [1, 2]],
    [[0, 0], [1, 0], [2, 0], [0, 1]],
    [[1, 0], [1, 1], [1, 2], [0, 0]],
    [[0, 1], [1, 1], [2, 1], [2, 0]],
  ],
};

export const ROTATION_TABLE: RotationTable = deepFreeze(ROTATION_DATA);

export const PIECE_COLORS: Readonly<Record<ShapeKind, Color>> = Object.freeze({
  I: '#00ffff',
  O: '#ffff00',
  T: '#800080',
  S: '#00ff00',
  Z: '#ff0000',
  J: '#0000ff',
  L: '#ffa500',
});

export function normaliseRotation(value: number): Rotation {
  const wrapped = ((value % 4) + 4) % 4;
  switch (wrapped) {
    case 0:
      return 0;
    case 1:
      return 1;
    case 2:
      return 2;
    default:
      return 3;
  }
}

export function rotate(rotation: Rotation, delta: number): Rotation {
  return normaliseRotation(rotation + delta);
}

export function rotations(kind: ShapeKind, rotationIndex: number): readonly Offset[] {
  return ROTATION_TABLE[kind][normaliseRotation(rotationIndex)];
}

export function getAbsoluteCells(
  kind: ShapeKind,
  rotation: number,
  position: Point,
): Point[] {
  return rotations(kind, rotation).map(([dx, dy]) => ({
    x: position.x + dx,
    y: position.y + dy,
  }));
}

function deepFreeze<T>(value: T): T {
  if (Array.isArray(value) || (typeof value === 'object' && value !== null)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
