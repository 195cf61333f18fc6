import type { Board } from '../core/board';
import type { PieceGenerator } from '../core/generator';
import type { TimedInputSource } from '../core/runner';
import type { Command, PieceKind } from '../core/types';
import type { TerminalSink } from '../render/terminalSink';

/**
 * Records every draw call and keeps a character grid of what a terminal
 * would show.
 */
export class ScreenSink implements TerminalSink {
  readonly ops: string[] = [];
  private cells = new Map<string, string>();
  private row = 0;
  private col = 0;

  moveCursor(row: number, col: number): void {
    this.ops.push(`move ${row},${col}`);
    this.row = row;
    this.col = col;
  }

  writeGlyph(ch: string, repeatCount = 1): void {
    this.ops.push(`glyph ${ch}*${repeatCount}`);
    this.put(ch.repeat(repeatCount));
  }

  writeText(text: string): void {
    this.ops.push(`text ${text}`);
    this.put(text);
  }

  setPieceColor(kind: PieceKind | null): void {
    this.ops.push(`color ${kind ?? '-'}`);
  }

  clearToEndOfLine(): void {
    this.ops.push('eol');
    for (const key of [...this.cells.keys()]) {
      const [r, c] = key.split(',').map(Number);
      if (r === this.row && c >= this.col) this.cells.delete(key);
    }
  }

  clearScreen(): void {
    this.ops.push('clear');
    this.cells.clear();
    this.row = 0;
    this.col = 0;
  }

  scrollRegionDown(atRow: number): void {
    this.ops.push(`scroll ${atRow}`);
    const next = new Map<string, string>();
    for (const [key, ch] of this.cells) {
      const [r, c] = key.split(',').map(Number);
      if (r > atRow) next.set(key, ch);
      else if (r < atRow) next.set(`${r + 1},${c}`, ch);
    }
    this.cells = next;
  }

  beep(): void {
    this.ops.push('beep');
  }

  /** `length` characters of a screen row, blanks for untouched cells. */
  text(row: number, col: number, length: number): string {
    let out = '';
    for (let c = col; c < col + length; c++) {
      out += this.cells.get(`${row},${c}`) ?? ' ';
    }
    return out;
  }

  snapshot(): Map<string, string> {
    return new Map(this.cells);
  }

  reset(): void {
    this.ops.length = 0;
  }

  private put(text: string): void {
    for (const ch of text) {
      this.cells.set(`${this.row},${this.col}`, ch);
      this.col++;
    }
  }
}

/** Hands out the given kinds in order, then starts over. */
export class FixedGenerator implements PieceGenerator {
  private i = 0;

  constructor(private kinds: PieceKind[]) {}

  next(): PieceKind {
    const k = this.kinds[this.i % this.kinds.length];
    this.i++;
    return k;
  }
}

export class FakeClock {
  constructor(public t = 0) {}

  now = (): number => this.t;
}

/** Answers polls from a script; an exhausted script quits. */
export class ScriptedInput implements TimedInputSource {
  readonly timeouts: number[] = [];

  constructor(private script: (Command | null)[]) {}

  poll(timeoutMs: number): Promise<Command | null> {
    this.timeouts.push(timeoutMs);
    const next = this.script.shift();
    return Promise.resolve(next === undefined ? 'quit' : next);
  }
}

export class CountingOutput {
  flushes = 0;

  flush(): void {
    this.flushes++;
  }
}

/** One string per board row, `X` for occupied cells. */
export function boardRows(board: Board): string[] {
  return Array.from({ length: board.rowCount }, (_, r) => {
    let out = '';
    for (let c = 0; c < board.colCount; c++) {
      out += board.get(r, c) ? 'X' : '.';
    }
    return out;
  });
}
