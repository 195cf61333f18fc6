import type { Board } from '../core/board';
import {
  BOARD_X,
  GLYPH_ACTIVE,
  GLYPH_EMPTY,
  GLYPH_FIXED,
  GLYPH_FLOOR,
  GLYPH_WALL,
  HIDDEN_ROWS,
  KEY_BINDINGS,
  SCORE_GAP,
} from '../core/constants';
import type { GameRenderer } from '../core/game';
import { cellsOf } from '../core/piece';
import type {
  ActivePiece,
  GameState,
  LineClearStrategy,
  PaintMode,
} from '../core/types';
import type { TerminalSink } from './terminalSink';

export interface RenderOptions {
  rows: number;
  cols: number;
  /** 1, or 2 for terminals whose cells are twice as tall as wide. */
  glyphWidth: number;
  hiddenRows?: number;
  lineClear: LineClearStrategy;
}

const GLYPHS: Record<PaintMode, string> = {
  erase: GLYPH_EMPTY,
  active: GLYPH_ACTIVE,
  fixed: GLYPH_FIXED,
};

export const GAME_OVER_TEXT = `Game over - press '${KEY_BINDINGS.start}'`;

/**
 * Turns engine transitions into the few cursor moves and glyph writes that
 * change on screen. A falling piece costs one erase and one paint; the board
 * is only repainted on start, on redraw and after a line clear.
 */
export class RenderDiffer implements GameRenderer {
  readonly visibleRows: number;
  readonly scoreRow: number;
  readonly scoreCol: number;

  private readonly hiddenRows: number;
  private readonly width: number;

  constructor(
    private sink: TerminalSink,
    private options: RenderOptions,
  ) {
    this.hiddenRows = options.hiddenRows ?? HIDDEN_ROWS;
    this.width = Math.max(1, Math.trunc(options.glyphWidth));
    this.visibleRows = options.rows - this.hiddenRows;
    this.scoreRow = Math.max(0, this.visibleRows - 3);
    this.scoreCol = (BOARD_X + options.cols + 1) * this.width + SCORE_GAP;
  }

  clearScreen(): void {
    this.sink.setPieceColor(null);
    this.sink.clearScreen();
  }

  paintActive(piece: ActivePiece, mode: PaintMode): void {
    this.sink.setPieceColor(mode === 'erase' ? null : piece.k);
    for (const [row, col] of cellsOf(piece)) {
      if (row < this.hiddenRows || row >= this.options.rows) continue;
      if (col < 0 || col >= this.options.cols) continue;
      this.sink.moveCursor(row - this.hiddenRows, this.cellCol(col));
      this.sink.writeGlyph(GLYPHS[mode], this.width);
    }
  }

  paintBoard(board: Board, rowCount: number = this.visibleRows): void {
    const count = Math.min(rowCount, this.visibleRows);
    const wallCol = this.cellCol(-1);

    this.sink.setPieceColor(null);
    for (let r = 0; r < count; r++) {
      this.sink.moveCursor(r, wallCol);
      this.sink.writeGlyph(GLYPH_WALL, this.width);
      for (let c = 0; c < this.options.cols; c++) {
        const fixed = board.get(r + this.hiddenRows, c);
        this.sink.writeGlyph(fixed ? GLYPH_FIXED : GLYPH_EMPTY, this.width);
      }
      this.sink.writeGlyph(GLYPH_WALL, this.width);
    }

    if (count === this.visibleRows) {
      this.sink.moveCursor(this.visibleRows, wallCol);
      this.sink.writeGlyph(GLYPH_FLOOR, this.width * (this.options.cols + 2));
    }
  }

  paintScore(state: GameState): void {
    this.sink.setPieceColor(null);
    this.writeLine(this.scoreRow, `Level: ${pad(state.level, 2)}`);
    this.writeLine(this.scoreRow + 1, `Score: ${pad(state.score, 4)}`);
  }

  eraseScore(): void {
    for (const row of [this.scoreRow, this.scoreRow + 1]) {
      this.sink.moveCursor(row, this.scoreCol);
      this.sink.clearToEndOfLine();
    }
  }

  paintGameOver(): void {
    this.sink.setPieceColor(null);
    this.writeLine(this.scoreRow + 2, GAME_OVER_TEXT);
  }

  redraw(board: Board, state: GameState, piece: ActivePiece): void {
    this.clearScreen();
    this.paintBoard(board);
    this.paintScore(state);
    this.paintActive(piece, 'active');
  }

  beginLineClear(): void {
    if (this.options.lineClear !== 'scroll') return;
    // the score block sits inside the scrolled region
    this.sink.setPieceColor(null);
    this.eraseScore();
  }

  rowCollapsed(row: number): void {
    if (this.options.lineClear !== 'scroll') return;
    if (row < this.hiddenRows) return;
    this.sink.scrollRegionDown(row - this.hiddenRows);
  }

  endLineClear(board: Board, cleared: number, state: GameState): void {
    this.sink.beep();
    // scrolling already moved the fixed cells; only the blanked top rows
    // lost their walls
    this.paintBoard(
      board,
      this.options.lineClear === 'scroll' ? cleared : this.visibleRows,
    );
    this.paintScore(state);
  }

  private cellCol(col: number): number {
    return (BOARD_X + col) * this.width;
  }

  private writeLine(row: number, text: string): void {
    this.sink.moveCursor(row, this.scoreCol);
    this.sink.writeText(text);
    this.sink.clearToEndOfLine();
  }
}

function pad(value: number, digits: number): string {
  return String(value).padStart(digits, '0');
}
