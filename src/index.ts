export { BagRandomizer, PieceQueue } from './core/bag';
export type { BagOptions, SpawnPoint } from './core/bag';
export { MatrixBoard, STANDARD_BOARD } from './core/board';
export { applyCommand, CommandParseError, parseCommandScript } from './core/commands';
export type { GameCommand } from './core/commands';
export {
  configFromEnv,
  DEFAULT_CONFIG,
  EngineConfigError,
  resolveConfig,
  seedFromEnv,
} from './core/config';
export type { EngineConfig } from './core/config';
export { GameEngine } from './core/game';
export type { GameOptions } from './core/game';
export { Piece } from './core/piece';
export {
  getAbsoluteCells,
  PIECE_COLORS,
  ROTATION_TABLE,
  rotations,
  SHAPE_KINDS,
} from './core/pieces';
export { renderBoard, renderStatus } from './core/render';
export * from './core/types';
