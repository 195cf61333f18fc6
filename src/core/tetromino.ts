import { invariant } from './invariant';
import type { PieceKind, Rotation, Shape, Vec2 } from './types';

/*
 * Each rotation is packed as two bytes: (row0 << 4 | row1), (row2 << 4 | row3).
 * Inside a row nibble, bit j is column j. Bit 0 is the low bit, so the shapes
 * read mirrored against the hex literals below; display and collision both use
 * column j as-is, which keeps what the player sees consistent.
 *
 * Rotation indices advance counter-clockwise on screen.
 */
const PACKED: Record<PieceKind, readonly (readonly [number, number])[]> = {
  O: [
    [0x06, 0x60],
    [0x06, 0x60],
    [0x06, 0x60],
    [0x06, 0x60],
  ],
  T: [
    [0x0e, 0x40],
    [0x4c, 0x40],
    [0x4e, 0x00],
    [0x46, 0x40],
  ],
  I: [
    [0x44, 0x44],
    [0x0f, 0x00],
    [0x44, 0x44],
    [0x0f, 0x00],
  ],
  S: [
    [0x0c, 0x60],
    [0x02, 0x64],
    [0x0c, 0x60],
    [0x02, 0x64],
  ],
  Z: [
    [0x06, 0xc0],
    [0x04, 0x62],
    [0x06, 0xc0],
    [0x04, 0x62],
  ],
  L: [
    [0x0e, 0x20],
    [0x02, 0x26],
    [0x00, 0x8e],
    [0x0c, 0x88],
  ],
  J: [
    [0x0e, 0x80],
    [0x06, 0x22],
    [0x00, 0x2e],
    [0x08, 0x8c],
  ],
};

function unpack([hi, lo]: readonly [number, number]): Shape {
  const nibbles = [hi >> 4, hi & 0xf, lo >> 4, lo & 0xf];
  return Object.freeze(
    nibbles.map((row) =>
      Object.freeze(
        Array.from({ length: 4 }, (_, j) => (row & (1 << j)) !== 0),
      ),
    ),
  );
}

function offsets(shape: Shape): readonly Vec2[] {
  const out: Vec2[] = [];
  shape.forEach((row, i) =>
    row.forEach((filled, j) => {
      if (filled) out.push([i, j]);
    }),
  );
  return Object.freeze(out);
}

function byKind<T>(make: (k: PieceKind) => T): Record<PieceKind, T> {
  return {
    O: make('O'),
    T: make('T'),
    I: make('I'),
    S: make('S'),
    Z: make('Z'),
    L: make('L'),
    J: make('J'),
  };
}

const SHAPES = byKind((k) => Object.freeze(PACKED[k].map(unpack)));
const CELLS = byKind((k) => Object.freeze(SHAPES[k].map(offsets)));

export function rotAdd(r: number, delta: number): Rotation {
  invariant(
    Number.isInteger(r) && Number.isInteger(delta),
    () => `Invalid rotation: ${r} + ${delta}`,
  );
  const n = (((r + delta) % 4) + 4) % 4;
  return n === 0 ? 0 : n === 1 ? 1 : n === 2 ? 2 : 3;
}

export function shapeOf(kind: PieceKind, rotation: number): Shape {
  return SHAPES[kind][rotAdd(rotation, 0)];
}

/** Occupied `[row, col]` offsets inside the 4x4 mask, row-major. */
export function shapeCells(kind: PieceKind, rotation: number): readonly Vec2[] {
  return CELLS[kind][rotAdd(rotation, 0)];
}
