import { DEFAULT_BACKGROUND, PIECE_COLORS } from '../core/palette';
import { InvariantError } from '../core/invariant';
import type { PieceKind } from '../core/types';

const ESC = '\x1b';
const BEL = '\x07';

/**
 * Draw protocol the renderer talks to. Coordinates are 0-based screen
 * cells; each implementation applies its own wire offsets.
 */
export interface TerminalSink {
  moveCursor(row: number, col: number): void;
  writeGlyph(ch: string, repeatCount?: number): void;
  writeText(text: string): void;
  /** Background for the next glyphs; `null` restores the default. */
  setPieceColor(kind: PieceKind | null): void;
  clearToEndOfLine(): void;
  clearScreen(): void;
  /** Shifts screen rows 0..atRow down by one, blanking row 0. */
  scrollRegionDown(atRow: number): void;
  beep(): void;
}

export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Collects escape sequences and hands them to the stream in one write per
 * flush, so a frame never reaches the terminal half drawn.
 */
export abstract class BufferedSink implements TerminalSink {
  private chunks: string[] = [];

  constructor(private out: OutputStream) {}

  abstract moveCursor(row: number, col: number): void;
  abstract setPieceColor(kind: PieceKind | null): void;
  abstract clearToEndOfLine(): void;
  abstract clearScreen(): void;
  abstract scrollRegionDown(atRow: number): void;
  /** Switches the terminal into game mode. */
  abstract enter(): void;
  /** Puts the terminal back the way the shell expects it. */
  abstract leave(): void;

  writeGlyph(ch: string, repeatCount = 1): void {
    this.emit(ch.repeat(Math.max(0, repeatCount)));
  }

  writeText(text: string): void {
    this.emit(text);
  }

  beep(): void {
    this.emit(BEL);
  }

  flush(): void {
    if (this.chunks.length === 0) return;
    const data = this.chunks.join('');
    this.chunks = [];
    this.out.write(data);
  }

  protected emit(data: string): void {
    if (data.length > 0) this.chunks.push(data);
  }
}

export interface Vt100Options {
  color: boolean;
  /** Height of the scroll region restored after each scroll. */
  screenRows: number;
}

export class Vt100Sink extends BufferedSink {
  constructor(
    out: OutputStream,
    private options: Vt100Options,
  ) {
    super(out);
  }

  moveCursor(row: number, col: number): void {
    this.emit(`${ESC}[${row + 1};${col + 1}H`);
  }

  setPieceColor(kind: PieceKind | null): void {
    if (!this.options.color) return;
    if (kind == null) {
      this.emit(`${ESC}[${DEFAULT_BACKGROUND}m${ESC}[m`);
    } else {
      this.emit(`${ESC}[0m${ESC}[${PIECE_COLORS[kind]}m`);
    }
  }

  clearToEndOfLine(): void {
    this.emit(`${ESC}[K`);
  }

  clearScreen(): void {
    this.emit(`${ESC}[H${ESC}[J`);
  }

  scrollRegionDown(atRow: number): void {
    // DECSTBM homes the cursor; reverse index at the top margin scrolls down.
    this.emit(`${ESC}[1;${atRow + 1}r${ESC}[H${ESC}M`);
    this.emit(`${ESC}[1;${this.options.screenRows}r`);
  }

  enter(): void {
    this.emit(`${ESC}[?25l`);
    this.setPieceColor(null);
  }

  leave(): void {
    this.setPieceColor(null);
    const rows = this.options.screenRows;
    this.emit(`${ESC}[1;${rows}r${ESC}[${rows};1H${ESC}[?25h\r\n`);
  }
}

/** Monochrome VT52: `ESC Y` addressing with +32 offsets, no scroll regions. */
export class Vt52Sink extends BufferedSink {
  moveCursor(row: number, col: number): void {
    this.emit(`${ESC}Y${String.fromCharCode(row + 32, col + 32)}`);
  }

  setPieceColor(): void {
    // no colors on a VT52
  }

  clearToEndOfLine(): void {
    this.emit(`${ESC}K`);
  }

  clearScreen(): void {
    this.emit(`${ESC}H${ESC}J`);
  }

  scrollRegionDown(atRow: number): never {
    throw new InvariantError(`VT52 cannot scroll a region (row ${atRow})`);
  }

  enter(): void {
    // VT100 into VT52 mode, then cursor off
    this.emit(`${ESC}[?2l${ESC}f`);
  }

  leave(): void {
    this.emit(`${ESC}<`);
  }
}
