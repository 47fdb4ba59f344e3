/**
 * In-process terminal stand-in.
 *
 * Keeps the whole transcript (scrollback included) as an array of lines and
 * a cursor into it. The visible screen is the last `rows` lines. Cursor-up
 * movement stops at the top of the screen, like CSI A does.
 *
 * Writes overwrite from the cursor column; callers that repaint clear the
 * line first, which resets the column.
 */

export type FakeTerminalOp =
  | Readonly<{ kind: "up"; requested: number; moved: number }>
  | Readonly<{ kind: "clear" }>
  | Readonly<{ kind: "write"; text: string }>
  | Readonly<{ kind: "flush" }>;

export type FakeTerminalOptions = Readonly<{
  /** Screen height. Defaults to 24. */
  rows?: number;
  /** 1-based screen row the cursor starts on. Defaults to 1. */
  startRow?: number;
}>;

const CSI_PATTERN = /\u001b\[[0-9;?]*[A-Za-z]/gu;

export function stripAnsiCodes(text: string): string {
  return text.replace(CSI_PATTERN, "");
}

export class FakeTerminal {
  readonly ops: FakeTerminalOp[] = [];
  private readonly rows: number;
  private readonly lines: string[];
  private cursor: number;
  private col = 0;

  constructor(opts: FakeTerminalOptions = {}) {
    this.rows = Math.max(1, opts.rows ?? 24);
    const startRow = Math.min(this.rows, Math.max(1, opts.startRow ?? 1));
    this.lines = new Array<string>(startRow).fill("");
    this.cursor = startRow - 1;
  }

  moveCursorUp(lines: number): number {
    const moved = Math.max(0, Math.min(lines, this.cursor - this.top()));
    this.cursor -= moved;
    this.ops.push({ kind: "up", requested: lines, moved });
    return moved;
  }

  clearCurrentLine(): void {
    this.lines[this.cursor] = "";
    this.col = 0;
    this.ops.push({ kind: "clear" });
  }

  cursorRow(): number {
    return this.cursor - this.top() + 1;
  }

  screenRows(): number {
    return this.rows;
  }

  write(text: string): void {
    this.ops.push({ kind: "write", text });
    const segments = text.split("\n");
    segments.forEach((segment, index) => {
      if (index > 0) {
        this.cursor++;
        this.col = 0;
        if (this.cursor === this.lines.length) this.lines.push("");
      }
      const line = this.lines[this.cursor] ?? "";
      this.lines[this.cursor] =
        line.slice(0, this.col) + segment + line.slice(this.col + segment.length);
      this.col += segment.length;
    });
  }

  flush(): void {
    this.ops.push({ kind: "flush" });
  }

  /** Every line ever written, scrollback included, without the cursor's empty line. */
  transcript(): string[] {
    const out = this.lines.slice();
    if (out.length > 0 && out[out.length - 1] === "" && this.cursor === out.length - 1) {
      out.pop();
    }
    return out;
  }

  /** transcript() with escape sequences removed. */
  plainTranscript(): string[] {
    return this.transcript().map(stripAnsiCodes);
  }

  /** Lines currently visible on the screen. */
  screen(): string[] {
    return this.lines.slice(this.top());
  }

  count(kind: FakeTerminalOp["kind"]): number {
    let n = 0;
    for (const op of this.ops) if (op.kind === kind) n++;
    return n;
  }

  private top(): number {
    return Math.max(0, this.lines.length - this.rows);
  }
}
