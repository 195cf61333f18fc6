import { Board } from './board';
import { COLS, GAME_OVER_POLL_MS, ROWS, SPAWN_Y } from './constants';
import type { PieceGenerator } from './generator';
import { invariant } from './invariant';
import {
  DEFAULT_RULES,
  LineClearEngine,
  type LineClearListener,
  type ProgressionRules,
} from './lineClear';
import {
  dropDistance,
  fits,
  merge,
  spawnColumn,
  spawnPiece,
  tryMove,
  tryRotate,
} from './piece';
import { RandomGenerator } from './randomGenerator';
import type {
  ActivePiece,
  Command,
  GameEvent,
  GameState,
  PaintMode,
} from './types';

/** What the engine asks of the screen. */
export interface GameRenderer extends LineClearListener {
  clearScreen(): void;
  paintActive(piece: ActivePiece, mode: PaintMode): void;
  /** Repaints the first `rowCount` visible rows, all of them by default. */
  paintBoard(board: Board, rowCount?: number): void;
  paintScore(state: GameState): void;
  paintGameOver(): void;
  redraw(board: Board, state: GameState, piece: ActivePiece): void;
}

export interface GameConfig {
  seed: number;
  renderer: GameRenderer;
  rows?: number;
  cols?: number;
  spawnX?: number;
  spawnY?: number;
  rules?: Partial<ProgressionRules>;
  generatorFactory?: (seed: number) => PieceGenerator;
}

/**
 * One game session: the board, the falling piece and the counters, changed
 * only through `handle`, one event at a time. Every change is painted as it
 * happens, so the screen is current when `handle` returns.
 */
export class GameEngine {
  readonly board: Board;
  readonly state: GameState;

  private piece: ActivePiece | null = null;
  private readonly rules: ProgressionRules;
  private readonly lineClear: LineClearEngine;
  private readonly generator: PieceGenerator;
  private readonly renderer: GameRenderer;
  private readonly spawnX: number;
  private readonly spawnY: number;

  constructor(cfg: GameConfig) {
    this.board = new Board(cfg.rows ?? ROWS, cfg.cols ?? COLS);
    this.rules = { ...DEFAULT_RULES, ...cfg.rules };
    this.lineClear = new LineClearEngine(this.rules);
    this.renderer = cfg.renderer;
    this.spawnX = cfg.spawnX ?? spawnColumn(this.board.colCount);
    this.spawnY = cfg.spawnY ?? SPAWN_Y;

    const makeGenerator =
      cfg.generatorFactory ?? ((seed) => new RandomGenerator(seed));
    this.generator = makeGenerator(cfg.seed);

    this.state = {
      score: 0,
      lines: 0,
      totalLines: 0,
      level: 1,
      stepMs: this.rules.initialStepMs,
      status: 'idle',
    };
  }

  get active(): ActivePiece | null {
    return this.piece;
  }

  /** How long the loop waits for input before the next tick. */
  get pollIntervalMs(): number {
    return this.state.status === 'running'
      ? this.state.stepMs
      : GAME_OVER_POLL_MS;
  }

  start(): void {
    this.renderer.clearScreen();
    this.board.clear();
    Object.assign(this.state, {
      score: this.rules.scorePerPiece,
      lines: 0,
      totalLines: 0,
      level: 1,
      stepMs: this.rules.initialStepMs,
      status: 'running',
    } satisfies GameState);
    this.renderer.paintBoard(this.board);
    this.renderer.paintScore(this.state);

    const piece = this.spawn();
    if (!fits(this.board, piece)) {
      this.endGame();
      return;
    }
    this.renderer.paintActive(piece, 'active');
  }

  handle(event: GameEvent): void {
    if (event.type === 'tick') {
      if (this.state.status === 'running') this.fall();
      return;
    }
    this.command(event.command);
  }

  command(command: Command): void {
    if (command === 'start') {
      this.start();
      return;
    }
    if (this.state.status !== 'running') return;

    switch (command) {
      case 'left':
        this.shift(-1);
        break;
      case 'right':
        this.shift(1);
        break;
      case 'rotateCCW':
        this.rotate(1);
        break;
      case 'rotateCW':
        this.rotate(-1);
        break;
      case 'drop':
        this.drop();
        break;
      case 'redraw':
        this.renderer.redraw(this.board, this.state, this.current());
        break;
      case 'none':
      case 'quit':
        // quit belongs to the loop driving the engine
        break;
    }
  }

  private current(): ActivePiece {
    const piece = this.piece;
    invariant(piece != null, 'No active piece while running');
    return piece;
  }

  private shift(dx: -1 | 1): void {
    const piece = this.current();
    this.renderer.paintActive(piece, 'erase');
    tryMove(this.board, piece, dx, 0);
    this.renderer.paintActive(piece, 'active');
  }

  private rotate(dir: -1 | 1): void {
    const piece = this.current();
    this.renderer.paintActive(piece, 'erase');
    tryRotate(this.board, piece, dir);
    this.renderer.paintActive(piece, 'active');
  }

  private fall(): void {
    const piece = this.current();
    this.renderer.paintActive(piece, 'erase');
    if (tryMove(this.board, piece, 0, 1)) {
      this.renderer.paintActive(piece, 'active');
      return;
    }
    this.lockPiece(piece);
  }

  private drop(): void {
    const piece = this.current();
    this.renderer.paintActive(piece, 'erase');
    piece.y += dropDistance(this.board, piece);
    this.lockPiece(piece);
  }

  private lockPiece(piece: ActivePiece): void {
    this.renderer.paintActive(piece, 'fixed');
    const stuckOnTop = piece.y <= this.spawnY + 1;
    const inside = merge(this.board, piece);
    this.lineClear.run(this.board, this.state, this.renderer);

    const next = this.spawn();
    if (stuckOnTop || !inside || !fits(this.board, next)) {
      this.endGame();
      return;
    }
    this.state.score += this.rules.scorePerPiece;
    this.renderer.paintActive(next, 'active');
  }

  private spawn(): ActivePiece {
    this.piece = spawnPiece(this.generator.next(), this.spawnY, this.spawnX);
    return this.piece;
  }

  private endGame(): void {
    this.state.status = 'gameOver';
    this.renderer.paintGameOver();
  }
}
