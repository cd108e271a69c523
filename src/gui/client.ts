/* eslint-disable no-console */
import { EngineConfig, resolveConfig } from '../core/config';
import { GameEngine } from '../core/game';
import { PIECE_COLORS, rotations } from '../core/pieces';
import { Cell, Color, GameSnapshot, Point, ShapeKind } from '../core/types';

const GHOST_COLOR = 'rgba(255, 255, 255, 0.18)';
const GRID_COLOR = 'rgba(255, 255, 255, 0.08)';
const BACKGROUND = 'rgba(12, 15, 24, 0.9)';
const PANEL_BACKGROUND = 'rgba(10, 12, 20, 0.85)';
const CELL_BORDER = '#ffffff';
const PREVIEW_CELL = 15;
const PREVIEW_SPACING = 80;

function getCanvas(id: string): HTMLCanvasElement {
  const element = document.getElementById(id);
  if (!(element instanceof HTMLCanvasElement)) {
    throw new Error(`Missing canvas element #${id}`);
  }
  return element;
}

function getContext(canvas: HTMLCanvasElement): CanvasRenderingContext2D {
  const context = canvas.getContext('2d');
  if (!context) {
    throw new Error('Unable to initialise canvas contexts');
  }
  return context;
}

class GameRenderer {
  private readonly boardCtx: CanvasRenderingContext2D;

  private readonly holdCtx: CanvasRenderingContext2D;

  private readonly queueCtx: CanvasRenderingContext2D;

  private readonly cellSize: number;

  constructor(
    private readonly boardCanvas: HTMLCanvasElement,
    private readonly holdCanvas: HTMLCanvasElement,
    private readonly queueCanvas: HTMLCanvasElement,
    private readonly columns: number,
    private readonly rows: number,
  ) {
    this.boardCtx = getContext(boardCanvas);
    this.holdCtx = getContext(holdCanvas);
    this.queueCtx = getContext(queueCanvas);
    this.cellSize = Math.floor(
      Math.min(boardCanvas.width / columns, boardCanvas.height / rows),
    );
  }

  render(snapshot: GameSnapshot, ghost: readonly Point[]): void {
    this.drawBoard(snapshot, ghost);
    this.drawHold(snapshot.hold);
    this.drawQueue(snapshot.next);
  }

  private drawBoard(snapshot: GameSnapshot, ghost: readonly Point[]): void {
    const ctx = this.boardCtx;
    const cellSize = this.cellSize;
    ctx.clearRect(0, 0, this.boardCanvas.width, this.boardCanvas.height);
    ctx.fillStyle = BACKGROUND;
    ctx.fillRect(0, 0, this.boardCanvas.width, this.boardCanvas.height);

    ctx.fillStyle = GHOST_COLOR;
    for (const cell of ghost) {
      ctx.fillRect(cell.x * cellSize, cell.y * cellSize, cellSize, cellSize);
    }

    snapshot.board.forEach((row: Cell[], y) => {
      row.forEach((cell, x) => {
        if (cell !== null) {
          this.drawCell(ctx, x, y, cell);
        }
      });
    });

    if (!snapshot.terminated) {
      for (const cell of snapshot.active.cells) {
        if (cell.y >= 0) {
          this.drawCell(ctx, cell.x, cell.y, snapshot.active.color);
        }
      }
    }

    ctx.strokeStyle = GRID_COLOR;
    ctx.lineWidth = 1;
    for (let x = 0; x <= this.columns; x += 1) {
      ctx.beginPath();
      ctx.moveTo(x * cellSize + 0.5, 0);
      ctx.lineTo(x * cellSize + 0.5, this.rows * cellSize);
      ctx.stroke();
    }
    for (let y = 0; y <= this.rows; y += 1) {
      ctx.beginPath();
      ctx.moveTo(0, y * cellSize + 0.5);
      ctx.lineTo(this.columns * cellSize, y * cellSize + 0.5);
      ctx.stroke();
    }

    if (snapshot.terminated) {
      this.drawGameOverOverlay();
    }
  }

  private drawCell(
    ctx: CanvasRenderingContext2D,
    gridX: number,
    gridY: number,
    color: Color,
  ): void {
    const cellSize = this.cellSize;
    const x = gridX * cellSize;
    const y = gridY * cellSize;
    ctx.fillStyle = color;
    ctx.fillRect(x, y, cellSize, cellSize);
    ctx.strokeStyle = CELL_BORDER;
    ctx.lineWidth = 1;
    ctx.strokeRect(x + 0.5, y + 0.5, cellSize - 1, cellSize - 1);
  }

  private drawHold(hold: ShapeKind | null): void {
    const ctx = this.holdCtx;
    const canvas = this.holdCanvas;
    ctx.clearRect(0, 0, canvas.width, canvas.height);
    ctx.fillStyle = PANEL_BACKGROUND;
    ctx.fillRect(0, 0, canvas.width, canvas.height);
    if (hold) {
      ctx.save();
      ctx.translate(canvas.width / 2, canvas.height / 2);
      this.drawPreviewPieceCentered(ctx, hold);
      ctx.restore();
    }
  }

  private drawQueue(next: readonly ShapeKind[]): void {
    const ctx = this.queueCtx;
    const canvas = this.queueCanvas;
    ctx.clearRect(0, 0, canvas.width, canvas.height);
    ctx.fillStyle = PANEL_BACKGROUND;
    ctx.fillRect(0, 0, canvas.width, canvas.height);
    next.forEach((piece, index) => {
      ctx.save();
      ctx.translate(canvas.width / 2, PREVIEW_SPACING / 2 + index * PREVIEW_SPACING);
      this.drawPreviewPieceCentered(ctx, piece);
      ctx.restore();
    });
  }

  // Previews always show rotation 0, centred on the current origin.
  private drawPreviewPieceCentered(ctx: CanvasRenderingContext2D, piece: ShapeKind): void {
    const shape = rotations(piece, 0);
    const cell = PREVIEW_CELL;
    const xs = shape.map(([dx]) => dx);
    const ys = shape.map(([, dy]) => dy);
    const minX = Math.min(...xs);
    const minY = Math.min(...ys);
    const width = Math.max(...xs) - minX + 1;
    const height = Math.max(...ys) - minY + 1;
    const offsetX = -((width * cell) / 2);
    const offsetY = -((height * cell) / 2);

    for (const [dx, dy] of shape) {
      const x = offsetX + (dx - minX) * cell;
      const y = offsetY + (dy - minY) * cell;
      ctx.fillStyle = PIECE_COLORS[piece];
      ctx.fillRect(x, y, cell, cell);
      ctx.strokeStyle = CELL_BORDER;
      ctx.lineWidth = 1;
      ctx.strokeRect(x + 0.5, y + 0.5, cell - 1, cell - 1);
    }
  }

  private drawGameOverOverlay(): void {
    const ctx = this.boardCtx;
    ctx.save();
    ctx.fillStyle = 'rgba(8, 10, 18, 0.85)';
    ctx.fillRect(0, 0, this.boardCanvas.width, this.boardCanvas.height);
    ctx.fillStyle = '#f4f6ff';
    ctx.font = '20px monospace';
    ctx.textAlign = 'center';
    ctx.fillText('GAME OVER', this.boardCanvas.width / 2, this.boardCanvas.height / 2);
    ctx.font = '14px monospace';
    ctx.fillStyle = '#5fd9ff';
    ctx.fillText(
      'Press R to restart',
      this.boardCanvas.width / 2,
      this.boardCanvas.height / 2 + 28,
    );
    ctx.restore();
  }
}

class StatDisplay {
  private readonly linesEl = document.getElementById('stat-lines');

  private readonly timeEl = document.getElementById('stat-time');

  private readonly stateEl = document.getElementById('stat-state');

  update(snapshot: GameSnapshot): void {
    if (this.linesEl) {
      this.linesEl.textContent = String(snapshot.stats.lines);
    }
    if (this.timeEl) {
      this.timeEl.textContent = `${snapshot.stats.elapsed.toFixed(1)}s`;
    }
    if (this.stateEl) {
      this.stateEl.textContent = snapshot.terminated ? 'Game over' : 'Playing';
    }
  }
}

class GameController {
  private game: GameEngine;

  private readonly renderer: GameRenderer;

  private readonly statDisplay = new StatDisplay();

  private lastFrame = 0;

  constructor(private readonly config: EngineConfig) {
    this.game = new GameEngine(config);
    this.renderer = new GameRenderer(
      getCanvas('board-canvas'),
      getCanvas('hold-canvas'),
      getCanvas('queue-canvas'),
      config.width,
      config.height,
    );
    this.bindInput();
    this.draw();
    requestAnimationFrame(this.tick);
  }

  private bindInput(): void {
    window.addEventListener('keydown', (event) => {
      switch (event.code) {
        case 'ArrowLeft':
          this.game.move(-1);
          break;
        case 'ArrowRight':
          this.game.move(1);
          break;
        case 'ArrowDown':
          this.game.softDrop();
          break;
        case 'ArrowUp':
          this.game.hardDrop();
          break;
        case 'KeyX':
          this.game.rotate(1);
          break;
        case 'KeyZ':
          this.game.rotate(-1);
          break;
        case 'Space':
          this.game.hold();
          break;
        case 'KeyR':
          this.game = new GameEngine(this.config);
          break;
        default:
          return;
      }
      event.preventDefault();
      this.draw();
    });
  }

  private tick = (timestamp: number): void => {
    if (this.lastFrame === 0) {
      this.lastFrame = timestamp;
    }
    const delta = timestamp - this.lastFrame;
    this.lastFrame = timestamp;
    this.game.tick(delta / 1000);
    this.draw();
    requestAnimationFrame(this.tick);
  };

  private draw(): void {
    const snapshot = this.game.snapshot();
    const ghost = snapshot.terminated ? [] : this.game.ghostCells();
    this.renderer.render(snapshot, ghost);
    this.statDisplay.update(snapshot);
  }
}

async function bootstrap(): Promise<void> {
  const response = await fetch('/api/config');
  if (!response.ok) {
    throw new Error(`Failed to load config: ${response.status}`);
  }
  const config = resolveConfig(await response.json());
  new GameController(config);
}

bootstrap().catch((error: unknown) => {
  console.error(error);
});
