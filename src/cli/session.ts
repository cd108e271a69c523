import { applyCommand, FRAME_SECONDS, GameCommand } from '../core/commands';
import { configFromEnv, EngineConfig, seedFromEnv } from '../core/config';
import { GameEngine } from '../core/game';
import { renderBoard, renderStatus } from '../core/render';

export interface CliOptions {
  script: string | null;
  scriptFile: string | null;
  interactive: boolean;
  render: boolean;
  frameMs: number;
  seed: number | undefined;
  engine: Partial<EngineConfig>;
}

type Env = Record<string, string | undefined>;

export function parseOptions(args: readonly string[], env: Env = process.env): CliOptions {
  const getString = (flag: string): string | null => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      return args[index + 1] ?? null;
    }
    return null;
  };
  const getNumber = (flag: string, fallback: number): number => {
    const raw = getString(flag);
    if (raw !== null) {
      const value = Number(raw);
      if (!Number.isNaN(value)) {
        return value;
      }
    }
    return fallback;
  };
  const hasFlag = (flag: string): boolean => args.includes(flag);

  const seedRaw = getString('--seed');
  const seedValue = seedRaw === null ? NaN : Number(seedRaw);
  return {
    script: getString('--script'),
    scriptFile: getString('--script-file'),
    interactive: hasFlag('--interactive'),
    render: hasFlag('--render'),
    frameMs: getNumber('--frame-ms', Math.round(FRAME_SECONDS * 1000)),
    seed: Number.isInteger(seedValue) ? seedValue : seedFromEnv(env),
    engine: configFromEnv(env),
  };
}

export function createGame(options: CliOptions): GameEngine {
  return new GameEngine({ ...options.engine, seed: options.seed });
}

export function describeFrame(game: GameEngine): string {
  const snapshot = game.snapshot();
  const ghost = snapshot.terminated ? [] : game.ghostCells();
  return `${renderBoard(snapshot, { ghost })}\n${renderStatus(snapshot)}`;
}

export interface ReplayResult {
  applied: number;
  ignored: number;
  /** Commands left unplayed because the game ended first. */
  skipped: number;
}

/**
 * Plays `commands` against `game` in order. `onFrame` sees the game after
 * every command that changed it.
 */
export function replay(
  game: GameEngine,
  commands: readonly GameCommand[],
  onFrame?: (game: GameEngine, command: GameCommand) => void,
): ReplayResult {
  let applied = 0;
  let ignored = 0;
  for (const [index, command] of commands.entries()) {
    if (game.isGameOver()) {
      return { applied, ignored, skipped: commands.length - index };
    }
    if (applyCommand(game, command)) {
      applied += 1;
      onFrame?.(game, command);
    } else {
      ignored += 1;
    }
  }
  return { applied, ignored, skipped: 0 };
}

export interface Keypress {
  name?: string;
  ctrl?: boolean;
}

export type KeyAction = GameCommand | { type: 'quit' };

export function keyToAction(key: Keypress): KeyAction | null {
  if (key.ctrl && key.name === 'c') {
    return { type: 'quit' };
  }
  switch (key.name) {
    case 'left':
      return { type: 'move', dx: -1 };
    case 'right':
      return { type: 'move', dx: 1 };
    case 'down':
      return { type: 'softDrop' };
    case 'space':
      return { type: 'hardDrop' };
    case 'up':
    case 'x':
      return { type: 'rotate', direction: 1 };
    case 'z':
      return { type: 'rotate', direction: -1 };
    case 'c':
      return { type: 'hold' };
    case 'q':
    case 'escape':
      return { type: 'quit' };
    default:
      return null;
  }
}
