import { invariant } from './invariant';

/** Uniformly distributed unsigned 32-bit integers, one per call. */
export type RandomSource = () => number;

const ZERO_STATE_FALLBACK = 0x12345678;
const U32_RANGE = 0x100000000;

/**
 * xorshift32 with shifts 13, 17, 5. Seed 0 would never leave zero, so it is
 * swapped for a fixed constant.
 */
export function xorshift32(seed: number): RandomSource {
  let state = seed | 0 || ZERO_STATE_FALLBACK;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return state >>> 0;
  };
}

/**
 * Index in `0..count - 1`. Draws from the uneven tail of the 32-bit range are
 * thrown away, so every index is equally likely.
 */
export function pickIndex(source: RandomSource, count: number): number {
  invariant(
    Number.isInteger(count) && count > 0 && count <= U32_RANGE,
    () => `Cannot pick from ${count} items`,
  );
  const limit = U32_RANGE - (U32_RANGE % count);
  let draw = source();
  while (draw >= limit) draw = source();
  return draw % count;
}

/** Seed for a fresh sequence on every run. */
export function clockSeed(now: number = Date.now()): number {
  return (now ^ (now / U32_RANGE)) | 0;
}
