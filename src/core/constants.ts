export const COLS = 10;
export const ROWS = 24;
/** Rows at the top of the board that are never drawn. */
export const HIDDEN_ROWS = 1;

export const SPAWN_Y = 0;

// Layout, in glyph cells
export const BOARD_X = 3;
export const SCORE_GAP = 12;

export const GLYPH_EMPTY = ' ';
export const GLYPH_ACTIVE = 'H';
export const GLYPH_FIXED = 'X';
export const GLYPH_WALL = '|';
export const GLYPH_FLOOR = '|';

export const DEFAULT_SCORE_PER_PIECE = 1;
export const DEFAULT_SCORE_PER_ROW = 0;
export const DEFAULT_LINES_PER_LEVEL = 1;
export const DEFAULT_MAX_LEVEL = 9;
export const EXTREME_MAX_LEVEL = 10;
export const DEFAULT_STEP_MS = 1000;
export const DEFAULT_SPEED_FACTOR = 0.75;
export const DEFAULT_MIN_STEP_MS = 10;
export const DEFAULT_SEED = 1;

export const GAME_OVER_POLL_MS = 1000;
export const MAX_TICK_LAG_MS = 1500;

export const KEY_BINDINGS = {
  left: 'j',
  right: 'l',
  rotateCCW: 'k',
  rotateCW: 'i',
  drop: ' ',
  redraw: 'r',
  start: 's',
  quit: 'q',
} as const;

export const CTRL_C = 0x03;
