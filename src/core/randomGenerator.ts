import type { PieceGenerator } from './generator';
import { pickIndex, xorshift32, type RandomSource } from './rng';
import { PIECES, type PieceKind } from './types';

/** Uniform pick among the seven kinds; one seed, one sequence. */
export class RandomGenerator implements PieceGenerator {
  private readonly draw: RandomSource;

  constructor(seed: number) {
    this.draw = xorshift32(seed);
  }

  next(): PieceKind {
    return PIECES[pickIndex(this.draw, PIECES.length)];
  }
}
