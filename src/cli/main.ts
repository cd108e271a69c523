#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import readline from 'readline';

import { parseCommandScript } from '../core/commands';
import {
  CliOptions,
  createGame,
  describeFrame,
  Keypress,
  keyToAction,
  parseOptions,
  replay,
} from './session';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

function loadScript(options: CliOptions): string | null {
  if (options.scriptFile) {
    const resolved = path.resolve(process.cwd(), options.scriptFile);
    return fs.readFileSync(resolved, 'utf-8');
  }
  return options.script;
}

function runScript(script: string, options: CliOptions): void {
  const commands = parseCommandScript(script);
  const game = createGame(options);
  const result = replay(game, commands, (current, command) => {
    if (options.render && command.type !== 'tick') {
      // eslint-disable-next-line no-console
      console.log(describeFrame(current));
    }
  });
  // eslint-disable-next-line no-console
  console.log(describeFrame(game));
  const stats = game.getStats();
  // eslint-disable-next-line no-console
  console.log(
    `Replay finished: applied=${result.applied}, ignored=${result.ignored}, skipped=${result.skipped}, lines=${stats.lines}, pieces=${stats.piecesLocked}`,
  );
}

function runInteractive(options: CliOptions): void {
  const input = process.stdin;
  if (!input.isTTY) {
    throw new Error('Interactive mode needs a terminal; pass --script instead');
  }
  const game = createGame(options);
  readline.emitKeypressEvents(input);
  input.setRawMode(true);
  input.resume();

  let lastFrame = performance.now();
  const draw = (): void => {
    process.stdout.write(`${CLEAR_SCREEN}${describeFrame(game)}\n`);
  };

  let stopped = false;
  const stop = (): void => {
    if (stopped) {
      return;
    }
    stopped = true;
    clearInterval(timer);
    input.setRawMode(false);
    input.pause();
    draw();
    const stats = game.getStats();
    // eslint-disable-next-line no-console
    console.log(`Game finished: lines=${stats.lines}, pieces=${stats.piecesLocked}`);
  };

  const timer = setInterval(() => {
    const now = performance.now();
    game.tick((now - lastFrame) / 1000);
    lastFrame = now;
    draw();
    if (game.isGameOver()) {
      stop();
    }
  }, options.frameMs);

  input.on('keypress', (_text: string | undefined, key: Keypress | undefined) => {
    const action = key ? keyToAction(key) : null;
    if (stopped || !action) {
      return;
    }
    if (action.type === 'quit') {
      stop();
      return;
    }
    replay(game, [action]);
    draw();
  });
}

function main(): void {
  const options = parseOptions(process.argv.slice(2));
  const script = loadScript(options);
  if (script !== null) {
    runScript(script, options);
    return;
  }
  if (options.interactive || process.stdin.isTTY) {
    runInteractive(options);
    return;
  }
  throw new Error('Nothing to play: pass --script, --script-file or --interactive');
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
