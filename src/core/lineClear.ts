import type { Board } from './board';
import {
  DEFAULT_LINES_PER_LEVEL,
  DEFAULT_MAX_LEVEL,
  DEFAULT_MIN_STEP_MS,
  DEFAULT_SCORE_PER_PIECE,
  DEFAULT_SCORE_PER_ROW,
  DEFAULT_SPEED_FACTOR,
  DEFAULT_STEP_MS,
} from './constants';
import type { GameState } from './types';

export interface ProgressionRules {
  scorePerPiece: number;
  /** Bonus per cleared row; 0 keeps the spawn-only scoring. */
  scorePerRow: number;
  linesPerLevel: number;
  maxLevel: number;
  initialStepMs: number;
  speedFactor: number;
  minStepMs: number;
}

export const DEFAULT_RULES: ProgressionRules = {
  scorePerPiece: DEFAULT_SCORE_PER_PIECE,
  scorePerRow: DEFAULT_SCORE_PER_ROW,
  linesPerLevel: DEFAULT_LINES_PER_LEVEL,
  maxLevel: DEFAULT_MAX_LEVEL,
  initialStepMs: DEFAULT_STEP_MS,
  speedFactor: DEFAULT_SPEED_FACTOR,
  minStepMs: DEFAULT_MIN_STEP_MS,
};

/** Receives the visual side of a clear while it happens. */
export interface LineClearListener {
  beginLineClear(): void;
  rowCollapsed(row: number): void;
  endLineClear(board: Board, cleared: number, state: GameState): void;
}

export class LineClearEngine {
  constructor(private rules: ProgressionRules = DEFAULT_RULES) {}

  /**
   * Removes every complete row and returns how many went. Indices are taken
   * top to bottom up front: collapsing row r only rewrites rows <= r, so the
   * lower indices still point at complete rows.
   */
  run(board: Board, state: GameState, listener: LineClearListener): number {
    const rows = board.completeRows();
    if (rows.length === 0) return 0;

    listener.beginLineClear();
    for (const row of rows) {
      board.collapseRow(row);
      listener.rowCollapsed(row);
      this.registerClear(state);
    }
    listener.endLineClear(board, rows.length, state);
    return rows.length;
  }

  registerClear(state: GameState): void {
    const { scorePerRow, linesPerLevel, maxLevel, speedFactor, minStepMs } =
      this.rules;

    state.lines++;
    state.totalLines++;
    state.score += scorePerRow;

    if (state.lines < linesPerLevel) return;
    state.lines = 0;
    if (state.level >= maxLevel) return;
    state.level++;
    state.stepMs = Math.max(minStepMs, Math.floor(state.stepMs * speedFactor));
  }
}
