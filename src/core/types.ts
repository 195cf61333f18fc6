export const PIECES = ['O', 'T', 'I', 'S', 'Z', 'L', 'J'] as const;
export type PieceKind = (typeof PIECES)[number];

export type Rotation = 0 | 1 | 2 | 3;
export type Vec2 = readonly [number, number];

/** 4x4 occupancy, indexed `[row][col]`, row 0 on top. */
export type Shape = readonly (readonly boolean[])[];

export interface ActivePiece {
  k: PieceKind;
  r: Rotation;
  x: number;
  y: number; // can be negative while spawning
}

export type GameStatus = 'idle' | 'running' | 'gameOver';

export interface GameState {
  score: number;
  /** Lines cleared since the last level-up. */
  lines: number;
  totalLines: number;
  level: number;
  stepMs: number;
  status: GameStatus;
}

export const COMMANDS = [
  'none',
  'left',
  'right',
  'rotateCW',
  'rotateCCW',
  'drop',
  'redraw',
  'start',
  'quit',
] as const;
export type Command = (typeof COMMANDS)[number];

export type GameEvent =
  | { type: 'tick' }
  | { type: 'command'; command: Command };

export type PaintMode = 'erase' | 'active' | 'fixed';

/** How the screen follows a line clear: scroll regions or a full repaint. */
export type LineClearStrategy = 'scroll' | 'redraw';
