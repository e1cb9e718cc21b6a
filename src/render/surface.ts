import {
  clearScreen,
  colors,
  enterAltScreen,
  hideCursor,
  leaveAltScreen,
  moveTo,
  showCursor,
  stripAnsi,
} from '../ansi.js';
import { DisplaySurfaceError } from '../core/errors.js';
import type { TerminalSize } from '../types.js';

/**
 * Direct-addressing text display. Rows and columns are zero-based.
 * Writes may be buffered until `flush`.
 */
export interface DisplaySurface {
  clear: () => void;
  write: (row: number, col: number, text: string) => void;
  size: () => TerminalSize;
  flush: () => void;
}

/** The slice of a TTY write stream the terminal surface relies on. */
export interface TerminalStream {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  write: (chunk: string) => boolean;
}

/**
 * DisplaySurface over a TTY. Collects one frame of cursor moves and writes,
 * then emits them as a single chunk so the terminal never shows half a frame.
 */
export class TerminalSurface implements DisplaySurface {
  private readonly stream: TerminalStream;
  private pending: string[] = [];
  private opened = false;

  constructor(stream: TerminalStream) {
    if (!stream.isTTY) {
      throw new DisplaySurfaceError('output is not a terminal; use `gpuwatch snapshot` for non-interactive output');
    }
    if (!stream.columns || !stream.rows) {
      throw new DisplaySurfaceError('terminal does not report its dimensions');
    }
    this.stream = stream;
  }

  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.stream.write(enterAltScreen + hideCursor);
  }

  /** Restore the terminal's normal display mode. Safe to call more than once. */
  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.pending = [];
    this.stream.write(colors.reset + showCursor + leaveAltScreen);
  }

  clear(): void {
    this.pending.push(clearScreen);
  }

  write(row: number, col: number, text: string): void {
    const { columns, rows } = this.size();
    if (row < 0 || col < 0 || row >= rows || col >= columns) return;
    this.pending.push(moveTo(row + 1, col + 1), text, colors.reset);
  }

  size(): TerminalSize {
    return { columns: this.stream.columns ?? 80, rows: this.stream.rows ?? 24 };
  }

  flush(): void {
    if (!this.opened || this.pending.length === 0) {
      this.pending = [];
      return;
    }
    const frame = this.pending.join('');
    this.pending = [];
    this.stream.write(frame);
  }
}

export interface RecordedWrite {
  row: number;
  col: number;
  text: string;
}

/**
 * In-memory surface that keeps a character grid and a log of every write.
 */
export class MemorySurface implements DisplaySurface {
  readonly writes: RecordedWrite[] = [];
  clears = 0;
  flushes = 0;
  private readonly dims: TerminalSize;
  private grid: string[][];

  constructor(columns = 100, rows = 60) {
    this.dims = { columns, rows };
    this.grid = this.blank();
  }

  clear(): void {
    this.clears += 1;
    this.grid = this.blank();
  }

  write(row: number, col: number, text: string): void {
    this.writes.push({ row, col, text });
    const line = this.grid[row];
    if (!line) return;
    [...stripAnsi(text)].forEach((ch, offset) => {
      const x = col + offset;
      if (x >= 0 && x < this.dims.columns) line[x] = ch;
    });
  }

  size(): TerminalSize {
    return { ...this.dims };
  }

  flush(): void {
    this.flushes += 1;
  }

  /** Visible text of a row without trailing blanks. */
  lineAt(row: number): string {
    return (this.grid[row] ?? []).join('').trimEnd();
  }

  /** Visible text of every row, trailing blank rows dropped. */
  screen(): string[] {
    const lines = this.grid.map((_, row) => this.lineAt(row));
    while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
    return lines;
  }

  resetLog(): void {
    this.writes.length = 0;
  }

  private blank(): string[][] {
    return Array.from({ length: this.dims.rows }, () => Array<string>(this.dims.columns).fill(' '));
  }
}
