import { COLS, ROWS } from './constants';
import { invariant } from './invariant';

const MAX_COLS = 31;

/**
 * Placed cells, one bitmask per row (bit `c` set = column `c` occupied).
 * Every access is bounds-checked; an out-of-range cell is a bug, not input.
 */
export class Board {
  readonly rowCount: number;
  readonly colCount: number;

  private readonly cells: Uint32Array;
  private readonly fullRow: number;

  constructor(rows = ROWS, cols = COLS) {
    invariant(
      Number.isInteger(rows) && rows >= 1,
      () => `Board needs at least one row, got ${rows}`,
    );
    invariant(
      Number.isInteger(cols) && cols >= 1 && cols <= MAX_COLS,
      () => `Board columns must be within 1..${MAX_COLS}, got ${cols}`,
    );
    this.rowCount = rows;
    this.colCount = cols;
    this.cells = new Uint32Array(rows);
    this.fullRow = 2 ** cols - 1;
  }

  get(row: number, col: number): boolean {
    this.checkCell(row, col);
    return (this.cells[row] & (1 << col)) !== 0;
  }

  set(row: number, col: number, occupied: boolean): void {
    this.checkCell(row, col);
    if (occupied) this.cells[row] |= 1 << col;
    else this.cells[row] &= ~(1 << col);
  }

  clear(): void {
    this.cells.fill(0);
  }

  isRowComplete(row: number): boolean {
    this.checkRow(row);
    return this.cells[row] === this.fullRow;
  }

  /** Complete row indices, top to bottom. */
  completeRows(): number[] {
    const out: number[] = [];
    for (let r = 0; r < this.rowCount; r++) {
      if (this.cells[r] === this.fullRow) out.push(r);
    }
    return out;
  }

  /** Drops every row above `row` by one; row 0 comes in empty. */
  collapseRow(row: number): void {
    this.checkRow(row);
    this.cells.copyWithin(1, 0, row);
    this.cells[0] = 0;
  }

  private checkRow(row: number): void {
    invariant(
      Number.isInteger(row) && row >= 0 && row < this.rowCount,
      () => `Row ${row} outside board (0..${this.rowCount - 1})`,
    );
  }

  private checkCell(row: number, col: number): void {
    this.checkRow(row);
    invariant(
      Number.isInteger(col) && col >= 0 && col < this.colCount,
      () => `Column ${col} outside board (0..${this.colCount - 1})`,
    );
  }
}
