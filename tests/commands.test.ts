import { describe, expect, it } from 'vitest';

import {
  applyCommand,
  CommandParseError,
  FRAME_SECONDS,
  MAX_SCRIPT_COMMANDS,
  parseCommandScript,
} from '../src/core/commands';
import { GameEngine } from '../src/core/game';
import { inOrder } from './helpers';

describe('parseCommandScript', () => {
  it('maps every named command, ignoring case and extra whitespace', () => {
    expect(parseCommandScript('  left RIGHT\ncw  ccw\tdown drop hold ')).toEqual([
      { type: 'move', dx: -1 },
      { type: 'move', dx: 1 },
      { type: 'rotate', direction: 1 },
      { type: 'rotate', direction: -1 },
      { type: 'softDrop' },
      { type: 'hardDrop' },
      { type: 'hold' },
    ]);
  });

  it('returns nothing for an empty script', () => {
    expect(parseCommandScript('   ')).toEqual([]);
  });

  it('repeats a command with a star suffix', () => {
    expect(parseCommandScript('left*3 drop')).toEqual([
      { type: 'move', dx: -1 },
      { type: 'move', dx: -1 },
      { type: 'move', dx: -1 },
      { type: 'hardDrop' },
    ]);
  });

  it('reads a single frame from tick', () => {
    expect(parseCommandScript('tick:0.25')).toEqual([{ type: 'tick', dt: 0.25 }]);
  });

  it('splits wait into frames', () => {
    const frames = parseCommandScript('wait:0.05');
    expect(frames).toHaveLength(3);
    let total = 0;
    for (const frame of frames) {
      expect(frame.type).toBe('tick');
      if (frame.type === 'tick') {
        expect(frame.dt).toBeLessThanOrEqual(FRAME_SECONDS);
        total += frame.dt;
      }
    }
    expect(total).toBeCloseTo(0.05);
    expect(parseCommandScript('wait:0')).toEqual([]);
  });

  it.each<[string, string]>([
    ['left jump', 'Bad command "jump" at position 2: unknown command'],
    ['tick', 'Bad command "tick" at position 1: unknown command'],
    ['drop left*0', 'Bad command "left*0" at position 2: repeat count must be a positive integer'],
    ['cw*x', 'Bad command "cw*x" at position 1: repeat count must be a positive integer'],
    ['tick:-1', 'Bad command "tick:-1" at position 1: expected a non-negative number of seconds'],
    ['wait:', 'Bad command "wait:" at position 1: expected a non-negative number of seconds'],
  ])('rejects %s', (script, message) => {
    expect(() => parseCommandScript(script)).toThrow(CommandParseError);
    expect(() => parseCommandScript(script)).toThrow(message);
  });

  it('returns a fresh object for every command', () => {
    const [first, second] = parseCommandScript('left left');
    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    const [third, fourth] = parseCommandScript('drop*2');
    expect(third).not.toBe(fourth);
    expect(parseCommandScript('hold')[0]).not.toBe(parseCommandScript('hold')[0]);
  });

  it('caps how far a script may expand', () => {
    expect(MAX_SCRIPT_COMMANDS).toBe(100000);
    expect(parseCommandScript('left*100000')).toHaveLength(100000);
    expect(() => parseCommandScript('wait:1e9')).toThrow(
      'Bad command "wait:1e9" at position 1: script expands to more than 100000 commands',
    );
    expect(() => parseCommandScript('drop left*100000')).toThrow(
      'Bad command "left*100000" at position 2: script expands to more than 100000 commands',
    );
  });

  it('does not treat object keys as commands', () => {
    expect(() => parseCommandScript('constructor')).toThrow(CommandParseError);
  });
});

describe('applyCommand', () => {
  it('forwards to the engine and reports the outcome', () => {
    const game = new GameEngine({ random: inOrder });
    expect(applyCommand(game, { type: 'move', dx: 1 })).toBe(true);
    expect(game.getActivePiece().x).toBe(4);
    expect(applyCommand(game, { type: 'rotate', direction: 1 })).toBe(true);
    expect(game.getActivePiece().rotation).toBe(1);
    expect(applyCommand(game, { type: 'tick', dt: 0.1 })).toBe(false);
    expect(applyCommand(game, { type: 'hold' })).toBe(true);
    expect(game.getHoldPiece()).toBe('I');
    expect(applyCommand(game, { type: 'softDrop' })).toBe(true);
    expect(applyCommand(game, { type: 'hardDrop' })).toBe(true);
    expect(game.getStats().piecesLocked).toBe(1);
  });
});
