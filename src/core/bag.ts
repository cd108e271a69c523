import { Piece } from './piece';
import { SHAPE_KINDS } from './pieces';
import { ShapeKind } from './types';

export const BAG_SIZE = SHAPE_KINDS.length;

function shuffle<T>(input: readonly T[], nextRandom: () => number): T[] {
  const array = input.slice();
  for (let i = array.length - 1; i > 0; i -= 1) {
    const j = Math.floor(nextRandom() * (i + 1));
    const temp = array[i]!;
    array[i] = array[j]!;
    array[j] = temp;
  }
  return array;
}

export interface BagOptions {
  seed?: number;
  /** Replaces the seeded generator; must return values in [0, 1). */
  random?: () => number;
}

export class BagRandomizer {
  private state: number;
  private readonly random: (() => number) | undefined;

  constructor(options: BagOptions = {}) {
    this.state = (options.seed ?? Date.now()) >>> 0;
    this.random = options.random;
  }

  private nextRandom(): number {
    if (this.random) {
      return this.random();
    }
    this.state += 0x6d2b79f5;
    let t = Math.imul(this.state ^ (this.state >>> 15), this.state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextBag(): ShapeKind[] {
    return shuffle(SHAPE_KINDS, () => this.nextRandom());
  }
}

export interface SpawnPoint {
  column: number;
  row: number;
}

/**
 * Upcoming pieces. Whole bags are appended at the tail, so every run of
 * seven draws starting on a bag boundary holds each kind exactly once.
 */
export class PieceQueue {
  private readonly pieces: Piece[] = [];

  constructor(
    private readonly randomizer: BagRandomizer,
    private readonly spawn: SpawnPoint,
  ) {}

  get length(): number {
    return this.pieces.length;
  }

  refill(): void {
    for (const kind of this.randomizer.nextBag()) {
      this.pieces.push(new Piece(kind, this.spawn.column, this.spawn.row));
    }
  }

  draw(): Piece {
    if (this.pieces.length < BAG_SIZE) {
      this.refill();
    }
    const next = this.pieces.shift();
    if (!next) {
      throw new Error('Piece queue is empty after refill');
    }
    return next;
  }

  peek(count: number): ShapeKind[] {
    return this.pieces.slice(0, count).map((piece) => piece.kind);
  }
}
