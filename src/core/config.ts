import { STANDARD_BOARD } from './board';

export interface EngineConfig {
  width: number;
  height: number;
  /** Seconds a grounded piece may rest before it locks. */
  lockDelay: number;
  /** Seconds between automatic one-row drops. */
  dropInterval: number;
  spawnColumn: number;
  spawnRow: number;
  previewCount: number;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
  width: STANDARD_BOARD.width,
  height: STANDARD_BOARD.height,
  lockDelay: 0.5,
  dropInterval: 0.5,
  spawnColumn: 3,
  spawnRow: 0,
  previewCount: 2,
});

export const MIN_PREVIEW = 2;
// A draw leaves at least one bag minus one piece queued.
export const MAX_PREVIEW = 6;

export class EngineConfigError extends Error {
  constructor(
    public readonly field: keyof EngineConfig | 'board',
    message: string,
  ) {
    super(`Invalid engine config "${field}": ${message}`);
    this.name = 'EngineConfigError';
  }
}

function requirePositiveInteger(field: keyof EngineConfig, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new EngineConfigError(field, `expected a positive integer, got ${value}`);
  }
}

export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  // A key present but undefined keeps its default.
  const config: EngineConfig = {
    width: overrides.width ?? DEFAULT_CONFIG.width,
    height: overrides.height ?? DEFAULT_CONFIG.height,
    lockDelay: overrides.lockDelay ?? DEFAULT_CONFIG.lockDelay,
    dropInterval: overrides.dropInterval ?? DEFAULT_CONFIG.dropInterval,
    spawnColumn: overrides.spawnColumn ?? DEFAULT_CONFIG.spawnColumn,
    spawnRow: overrides.spawnRow ?? DEFAULT_CONFIG.spawnRow,
    previewCount: overrides.previewCount ?? DEFAULT_CONFIG.previewCount,
  };

  requirePositiveInteger('width', config.width);
  requirePositiveInteger('height', config.height);

  if (!Number.isInteger(config.spawnColumn) || config.spawnColumn < 0 || config.spawnColumn >= config.width) {
    throw new EngineConfigError(
      'spawnColumn',
      `expected an integer in [0, ${config.width - 1}], got ${config.spawnColumn}`,
    );
  }
  if (!Number.isInteger(config.spawnRow) || config.spawnRow < 0 || config.spawnRow >= config.height) {
    throw new EngineConfigError(
      'spawnRow',
      `expected an integer in [0, ${config.height - 1}], got ${config.spawnRow}`,
    );
  }
  if (!Number.isFinite(config.lockDelay) || config.lockDelay < 0) {
    throw new EngineConfigError('lockDelay', `expected a non-negative number of seconds, got ${config.lockDelay}`);
  }
  if (!Number.isFinite(config.dropInterval) || config.dropInterval <= 0) {
    throw new EngineConfigError('dropInterval', `expected a positive number of seconds, got ${config.dropInterval}`);
  }
  if (
    !Number.isInteger(config.previewCount) ||
    config.previewCount < MIN_PREVIEW ||
    config.previewCount > MAX_PREVIEW
  ) {
    throw new EngineConfigError(
      'previewCount',
      `expected an integer in [${MIN_PREVIEW}, ${MAX_PREVIEW}], got ${config.previewCount}`,
    );
  }
  return config;
}

type Env = Record<string, string | undefined>;

const ENV_KEYS: readonly (readonly [keyof EngineConfig, string])[] = [
  ['width', 'GAME_WIDTH'],
  ['height', 'GAME_HEIGHT'],
  ['lockDelay', 'GAME_LOCK_DELAY'],
  ['dropInterval', 'GAME_DROP_INTERVAL'],
  ['previewCount', 'GAME_PREVIEW'],
];

/**
 * Reads engine overrides from the environment. Values that are not numbers
 * are reported and left at their defaults; range checks happen later in
 * {@link resolveConfig}.
 */
export function configFromEnv(env: Env = process.env): Partial<EngineConfig> {
  const overrides: Partial<EngineConfig> = {};
  for (const [field, key] of ENV_KEYS) {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
      // eslint-disable-next-line no-console
      console.warn(`Ignoring ${key}=${raw}: not a number`);
      continue;
    }
    overrides[field] = value;
  }
  return overrides;
}

export function seedFromEnv(env: Env = process.env): number | undefined {
  const raw = env.GAME_SEED;
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    // eslint-disable-next-line no-console
    console.warn(`Ignoring GAME_SEED=${raw}: not an integer`);
    return undefined;
  }
  return value;
}
