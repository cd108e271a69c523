import { BagRandomizer, PieceQueue } from './bag';
import { MatrixBoard } from './board';
import { EngineConfig, EngineConfigError, resolveConfig } from './config';
import { Piece } from './piece';
import {
  ActivePieceView,
  GamePhase,
  GameSnapshot,
  GameStats,
  Point,
  RotationDirection,
  ShapeKind,
} from './types';

export interface GameOptions extends Partial<EngineConfig> {
  seed?: number;
  random?: () => number;
  /** Pre-filled board; its size must match `width` and `height`. */
  board?: MatrixBoard;
}

function isUnitStep(value: number): value is RotationDirection {
  return value === 1 || value === -1;
}

/**
 * Single-player engine. Commands that would leave the active piece out of
 * bounds or overlapping the stack are undone and report `false`; nothing is
 * thrown for them. Time only advances through {@link GameEngine.tick}.
 */
export class GameEngine {
  public readonly config: EngineConfig;
  private readonly board: MatrixBoard;
  private readonly queue: PieceQueue;
  private active: Piece;
  private held: Piece | null = null;
  private holdUsed = false;
  private dropTimer = 0;
  private lockTimer = 0;
  private phase: GamePhase = 'active';
  private readonly statsValue: GameStats = { lines: 0, piecesLocked: 0, elapsed: 0 };

  constructor(options: GameOptions = {}) {
    const { seed, random, board, ...overrides } = options;
    this.config = resolveConfig(overrides);
    if (board && (board.width !== this.config.width || board.height !== this.config.height)) {
      throw new EngineConfigError(
        'board',
        `board is ${board.width}x${board.height}, config expects ${this.config.width}x${this.config.height}`,
      );
    }
    this.board = board ? board.clone() : new MatrixBoard(this.config);
    this.queue = new PieceQueue(new BagRandomizer({ seed, random }), {
      column: this.config.spawnColumn,
      row: this.config.spawnRow,
    });
    this.queue.refill();
    this.queue.refill();
    this.active = this.queue.draw();
    this.afterSpawn();
  }

  isGameOver(): boolean {
    return this.phase === 'gameOver';
  }

  getPhase(): GamePhase {
    return this.phase;
  }

  getBoard(): MatrixBoard {
    return this.board.clone();
  }

  getActivePiece(): ActivePieceView {
    return this.active.view();
  }

  getHoldPiece(): ShapeKind | null {
    return this.held?.kind ?? null;
  }

  getNextQueue(): ShapeKind[] {
    return this.queue.peek(this.config.previewCount);
  }

  getStats(): GameStats {
    return { ...this.statsValue };
  }

  snapshot(): GameSnapshot {
    return {
      board: this.board.rows(),
      active: this.getActivePiece(),
      hold: this.getHoldPiece(),
      holdUsed: this.holdUsed,
      next: this.getNextQueue(),
      stats: this.getStats(),
      phase: this.phase,
      terminated: this.isGameOver(),
      lockTimer: this.lockTimer,
      dropTimer: this.dropTimer,
    };
  }

  isGrounded(): boolean {
    const below = this.active.occupiedCells().map(({ x, y }) => ({ x, y: y + 1 }));
    return !this.board.fits(below);
  }

  /** Cells the active piece would occupy after a hard drop. */
  ghostCells(): Point[] {
    const ghost = this.active.clone();
    while (this.board.fits(ghost.occupiedCells())) {
      ghost.moveBy(0, 1);
    }
    ghost.moveBy(0, -1);
    return ghost.occupiedCells();
  }

  move(dx: number): boolean {
    if (this.isGameOver() || !isUnitStep(dx)) {
      return false;
    }
    return this.tryChange(() => this.active.moveBy(dx, 0));
  }

  rotate(direction: number): boolean {
    if (this.isGameOver() || !isUnitStep(direction)) {
      return false;
    }
    return this.tryChange(() => this.active.rotate(direction));
  }

  /** One row down. A blocked drop is ignored; lock delay decides when to lock. */
  softDrop(): boolean {
    if (this.isGameOver()) {
      return false;
    }
    return this.tryChange(() => this.active.moveBy(0, 1));
  }

  hardDrop(): boolean {
    if (this.isGameOver()) {
      return false;
    }
    while (this.board.fits(this.active.occupiedCells())) {
      this.active.moveBy(0, 1);
    }
    this.active.moveBy(0, -1);
    this.lockActive();
    this.spawnNext();
    return true;
  }

  hold(): boolean {
    if (this.isGameOver() || this.holdUsed) {
      return false;
    }
    const current = this.active;
    if (this.held === null) {
      this.held = current;
      this.spawnNext();
    } else {
      this.active = this.held;
      this.held = current;
      this.active.resetToSpawn(this.config.spawnColumn, this.config.spawnRow);
      if (!this.board.fits(this.active.occupiedCells())) {
        this.phase = 'gameOver';
      }
    }
    this.holdUsed = true;
    this.lockTimer = 0;
    return true;
  }

  /**
   * Advances the lock and gravity timers by `dt` seconds. Returns whether a
   * piece locked during this frame.
   */
  tick(dt: number): boolean {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`tick expects a finite, non-negative delta, got ${dt}`);
    }
    if (this.isGameOver()) {
      return false;
    }
    this.statsValue.elapsed += dt;

    let locked = false;
    if (this.isGrounded()) {
      this.lockTimer += dt;
      if (this.lockTimer >= this.config.lockDelay) {
        this.lockActive();
        this.spawnNext();
        locked = true;
        if (this.isGameOver()) {
          return locked;
        }
      }
    } else {
      this.lockTimer = 0;
    }

    this.dropTimer += dt;
    if (this.dropTimer >= this.config.dropInterval) {
      this.dropTimer = 0;
      this.softDrop();
    }
    return locked;
  }

  // Applies `change` to the active piece and keeps it only if it fits.
  private tryChange(change: () => void): boolean {
    const previous = this.active.snapshot();
    change();
    if (!this.board.fits(this.active.occupiedCells())) {
      this.active.restore(previous);
      return false;
    }
    if (this.isGrounded()) {
      this.lockTimer = 0;
    }
    return true;
  }

  private lockActive(): void {
    this.board.commit(this.active.occupiedCells(), this.active.color);
    const { count } = this.board.clearFullRows();
    this.statsValue.lines += count;
    this.statsValue.piecesLocked += 1;
  }

  private spawnNext(): void {
    this.active = this.queue.draw();
    this.afterSpawn();
  }

  private afterSpawn(): void {
    this.holdUsed = false;
    this.lockTimer = 0;
    if (!this.board.fits(this.active.occupiedCells())) {
      this.phase = 'gameOver';
    }
  }
}
