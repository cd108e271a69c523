import { GameEngine } from './game';
import { RotationDirection } from './types';

export type GameCommand =
  | { type: 'move'; dx: -1 | 1 }
  | { type: 'rotate'; direction: RotationDirection }
  | { type: 'softDrop' }
  | { type: 'hardDrop' }
  | { type: 'hold' }
  | { type: 'tick'; dt: number };

export const FRAME_SECONDS = 1 / 60;

/** Upper bound on the commands a single script may expand to. */
export const MAX_SCRIPT_COMMANDS = 100000;

export class CommandParseError extends Error {
  constructor(
    public readonly token: string,
    public readonly index: number,
    reason: string,
  ) {
    super(`Bad command "${token}" at position ${index + 1}: ${reason}`);
    this.name = 'CommandParseError';
  }
}

const SIMPLE_COMMANDS = new Map<string, GameCommand>([
  ['left', { type: 'move', dx: -1 }],
  ['right', { type: 'move', dx: 1 }],
  ['down', { type: 'softDrop' }],
  ['drop', { type: 'hardDrop' }],
  ['cw', { type: 'rotate', direction: 1 }],
  ['ccw', { type: 'rotate', direction: -1 }],
  ['hold', { type: 'hold' }],
]);

/** Returns whether the command changed the game; for `tick`, whether a piece locked. */
export function applyCommand(game: GameEngine, command: GameCommand): boolean {
  switch (command.type) {
    case 'move':
      return game.move(command.dx);
    case 'rotate':
      return game.rotate(command.direction);
    case 'softDrop':
      return game.softDrop();
    case 'hardDrop':
      return game.hardDrop();
    case 'hold':
      return game.hold();
    case 'tick':
      return game.tick(command.dt);
    default: {
      const unreachable: never = command;
      throw new Error(`Unhandled command ${JSON.stringify(unreachable)}`);
    }
  }
}

function parseSeconds(token: string, raw: string, index: number): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new CommandParseError(token, index, 'expected a non-negative number of seconds');
  }
  return value;
}

/**
 * Parses a whitespace separated script such as `left left cw drop wait:1`.
 * `tick:s` is a single frame of `s` seconds; `wait:s` is split into frames of
 * at most {@link FRAME_SECONDS}. A `name*n` suffix repeats a command.
 * Scripts longer than {@link MAX_SCRIPT_COMMANDS} once expanded are rejected.
 */
export function parseCommandScript(script: string): GameCommand[] {
  const commands: GameCommand[] = [];
  const tokens = script.split(/\s+/).filter((token) => token.length > 0);
  tokens.forEach((token, index) => {
    const [body = '', repeatRaw] = token.toLowerCase().split('*');
    const repeat = repeatRaw === undefined ? 1 : Number(repeatRaw);
    if (!Number.isInteger(repeat) || repeat < 1) {
      throw new CommandParseError(token, index, 'repeat count must be a positive integer');
    }
    const expanded = parseToken(token, body, index);
    if (commands.length + expanded.length * repeat > MAX_SCRIPT_COMMANDS) {
      throw new CommandParseError(token, index, `script expands to more than ${MAX_SCRIPT_COMMANDS} commands`);
    }
    for (let i = 0; i < repeat; i += 1) {
      for (const command of expanded) {
        commands.push({ ...command });
      }
    }
  });
  return commands;
}

function parseToken(token: string, body: string, index: number): GameCommand[] {
  const simple = SIMPLE_COMMANDS.get(body);
  if (simple) {
    return [{ ...simple }];
  }
  const [name, argument] = body.split(':');
  if (name === 'tick' && argument !== undefined) {
    return [{ type: 'tick', dt: parseSeconds(token, argument, index) }];
  }
  if (name === 'wait' && argument !== undefined) {
    let remaining = parseSeconds(token, argument, index);
    if (remaining / FRAME_SECONDS > MAX_SCRIPT_COMMANDS) {
      throw new CommandParseError(token, index, `script expands to more than ${MAX_SCRIPT_COMMANDS} commands`);
    }
    const frames: GameCommand[] = [];
    while (remaining > 1e-9) {
      const dt = Math.min(FRAME_SECONDS, remaining);
      frames.push({ type: 'tick', dt });
      remaining -= dt;
    }
    return frames;
  }
  throw new CommandParseError(token, index, 'unknown command');
}
