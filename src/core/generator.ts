import type { PieceKind } from './types';

/** Where the engine gets each new piece from. */
export interface PieceGenerator {
  next(): PieceKind;
}
