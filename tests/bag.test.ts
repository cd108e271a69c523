import { describe, expect, it } from 'vitest';

import { BagRandomizer, PieceQueue } from '../src/core/bag';
import { SHAPE_KINDS } from '../src/core/pieces';
import { ShapeKind } from '../src/core/types';
import { inOrder } from './helpers';

const sorted = (kinds: readonly ShapeKind[]): ShapeKind[] => [...kinds].sort();

describe('BagRandomizer', () => {
  it('produces all seven pieces before repeating', () => {
    const bag = new BagRandomizer({ seed: 1234 });
    for (let i = 0; i < 20; i += 1) {
      expect(sorted(bag.nextBag())).toEqual(sorted(SHAPE_KINDS));
    }
  });

  it('repeats its sequence for the same seed', () => {
    const first = new BagRandomizer({ seed: 42 });
    const second = new BagRandomizer({ seed: 42 });
    for (let i = 0; i < 5; i += 1) {
      expect(first.nextBag()).toEqual(second.nextBag());
    }
  });

  it('uses an injected random source', () => {
    const bag = new BagRandomizer({ random: inOrder });
    expect(bag.nextBag()).toEqual(['I', 'O', 'T', 'S', 'Z', 'J', 'L']);
  });

  it('puts every kind first about equally often', () => {
    const bag = new BagRandomizer({ seed: 7 });
    const counts = new Map<ShapeKind, number>();
    for (let i = 0; i < 7000; i += 1) {
      const head = bag.nextBag()[0];
      if (head) {
        counts.set(head, (counts.get(head) ?? 0) + 1);
      }
    }
    for (const kind of SHAPE_KINDS) {
      const count = counts.get(kind) ?? 0;
      expect(count).toBeGreaterThan(800);
      expect(count).toBeLessThan(1200);
    }
  });
});

describe('PieceQueue', () => {
  it('refills only when fewer than seven pieces remain', () => {
    const queue = new PieceQueue(new BagRandomizer({ random: inOrder }), { column: 3, row: 0 });
    expect(queue.length).toBe(0);
    expect(queue.draw().kind).toBe('I');
    expect(queue.length).toBe(6);
    expect(queue.draw().kind).toBe('O');
    expect(queue.length).toBe(12);
    expect(queue.peek(3)).toEqual(['T', 'S', 'Z']);
  });

  it('creates pieces at the spawn point', () => {
    const queue = new PieceQueue(new BagRandomizer({ random: inOrder }), { column: 4, row: 1 });
    const piece = queue.draw();
    expect(piece.snapshot()).toEqual({ kind: 'I', rotation: 0, x: 4, y: 1 });
  });

  it('keeps every run of seven draws from a bag boundary a permutation', () => {
    const queue = new PieceQueue(new BagRandomizer({ seed: 99 }), { column: 3, row: 0 });
    const drawn: ShapeKind[] = [];
    for (let i = 0; i < 70; i += 1) {
      drawn.push(queue.draw().kind);
    }
    for (let start = 0; start < drawn.length; start += 7) {
      expect(sorted(drawn.slice(start, start + 7))).toEqual(sorted(SHAPE_KINDS));
    }
  });
});
