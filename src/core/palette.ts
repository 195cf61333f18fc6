import type { PieceKind } from './types';

/** SGR background codes (ANSI 4x and aixterm 10x) per kind. */
export type PiecePalette = Record<PieceKind, number>;

export const PIECE_COLORS: PiecePalette = {
  O: 103,
  T: 45,
  I: 46,
  S: 42,
  Z: 41,
  L: 43,
  J: 44,
};

export const DEFAULT_BACKGROUND = 49;
