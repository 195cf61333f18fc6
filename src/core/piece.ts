import type { Board } from './board';
import { rotAdd, shapeCells } from './tetromino';
import type { ActivePiece, PieceKind, Vec2 } from './types';

/** Absolute `[row, col]` of every occupied cell of the piece. */
export function cellsOf(piece: ActivePiece): Vec2[] {
  return shapeCells(piece.k, piece.r).map(([i, j]): Vec2 => [
    piece.y + i,
    piece.x + j,
  ]);
}

/**
 * True when every occupied cell is inside the side walls, above the floor and
 * on an empty board cell. Cells above row 0 are allowed.
 */
export function fits(board: Board, piece: ActivePiece): boolean {
  for (const [row, col] of cellsOf(piece)) {
    if (col < 0 || col >= board.colCount || row >= board.rowCount) return false;
    if (row >= 0 && board.get(row, col)) return false;
  }
  return true;
}

export function tryMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): boolean {
  piece.x += dx;
  piece.y += dy;
  if (fits(board, piece)) return true;
  piece.x -= dx;
  piece.y -= dy;
  return false;
}

export function tryRotate(
  board: Board,
  piece: ActivePiece,
  dir: -1 | 1,
): boolean {
  piece.r = rotAdd(piece.r, dir);
  if (fits(board, piece)) return true;
  piece.r = rotAdd(piece.r, -dir);
  return false;
}

export function dropDistance(board: Board, piece: ActivePiece): number {
  const probe: ActivePiece = { ...piece };
  let d = 0;
  while (tryMove(board, probe, 0, 1)) d++;
  return d;
}

/**
 * Copies the piece into the board. Returns false if any cell was above row 0;
 * those cells are dropped.
 */
export function merge(board: Board, piece: ActivePiece): boolean {
  let inside = true;
  for (const [row, col] of cellsOf(piece)) {
    if (row < 0) {
      inside = false;
      continue;
    }
    board.set(row, col, true);
  }
  return inside;
}

/**
 * Left edge of the 4x4 mask for new pieces: near the middle, and never so far
 * right that a rotation-0 cell lands past the last column.
 */
export function spawnColumn(cols: number): number {
  return Math.max(0, Math.min(Math.floor(cols / 2) - 1, cols - 4));
}

export function spawnPiece(k: PieceKind, y: number, x: number): ActivePiece {
  return { k, r: 0, x, y };
}
