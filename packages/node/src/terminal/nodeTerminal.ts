/**
 * packages/node/src/terminal/nodeTerminal.ts: ANSI TerminalIO over a Node stream.
 *
 * Output is buffered and handed to the stream once per flush(), so one
 * repaint reaches the terminal as a single write.
 *
 * The cursor row cannot be read back without a terminal round trip, so it is
 * tracked: it starts at `startRow` (a probed row, or the bottom of the
 * screen) and follows every newline and cursor-up written here.
 */

import type { TerminalIO } from "@ls-live/core";
import terminalSize from "terminal-size";

const DEFAULT_ROWS = 24;
const DEFAULT_COLUMNS = 80;
const CLEAR_LINE = "\u001b[2K\r";

/** The parts of a tty.WriteStream the terminal needs. */
export type TerminalStream = {
  write(chunk: string): boolean;
  readonly rows?: number;
  readonly columns?: number;
};

export type NodeTerminalOptions = Readonly<{
  /** 1-based screen row of the cursor when the terminal is created. */
  startRow?: number;
  /** Fixed screen height; otherwise read from the stream on every call. */
  rows?: number;
  /**
   * false: write text only. Cursor movement becomes a no-op that reports
   * zero lines moved; used when the output is not a terminal.
   */
  controlSequences?: boolean;
}>;

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

/** Stream height, then the controlling terminal's, then 24. */
export function resolveScreenRows(stream: TerminalStream): number {
  const rows = toPositiveIntOr(stream.rows, 0);
  if (rows > 0) return rows;
  try {
    return toPositiveIntOr(terminalSize().rows, DEFAULT_ROWS);
  } catch {
    return DEFAULT_ROWS;
  }
}

/** Stream width, then the controlling terminal's, then 80. */
export function resolveScreenColumns(stream: TerminalStream): number {
  const columns = toPositiveIntOr(stream.columns, 0);
  if (columns > 0) return columns;
  try {
    return toPositiveIntOr(terminalSize().columns, DEFAULT_COLUMNS);
  } catch {
    return DEFAULT_COLUMNS;
  }
}

export class NodeTerminal implements TerminalIO {
  private readonly stream: TerminalStream;
  private readonly fixedRows: number | null;
  private readonly controls: boolean;
  private pending = "";
  private row: number;

  constructor(stream: TerminalStream, opts: NodeTerminalOptions = {}) {
    this.stream = stream;
    this.fixedRows = opts.rows === undefined ? null : toPositiveIntOr(opts.rows, DEFAULT_ROWS);
    this.controls = opts.controlSequences !== false;
    const rows = this.screenRows();
    this.row = Math.min(rows, toPositiveIntOr(opts.startRow, rows));
  }

  moveCursorUp(lines: number): number {
    if (!this.controls) return 0;
    const moved = Math.max(0, Math.min(Math.floor(lines), this.row - 1));
    if (moved > 0) {
      this.pending += `\u001b[${String(moved)}A`;
      this.row -= moved;
    }
    return moved;
  }

  clearCurrentLine(): void {
    if (this.controls) this.pending += CLEAR_LINE;
  }

  cursorRow(): number {
    return this.row;
  }

  screenRows(): number {
    return this.fixedRows ?? resolveScreenRows(this.stream);
  }

  write(text: string): void {
    this.pending += text;
    let newlines = 0;
    for (let i = text.indexOf("\n"); i >= 0; i = text.indexOf("\n", i + 1)) newlines++;
    // Past the bottom row the screen scrolls and the cursor stays put.
    this.row = Math.min(this.screenRows(), this.row + newlines);
  }

  flush(): void {
    if (this.pending.length === 0) return;
    const out = this.pending;
    this.pending = "";
    this.stream.write(out);
  }
}
