/**
 * packages/core/src/live/terminal.ts: Terminal primitives consumed by the renderer.
 *
 * Hosts provide the implementation (see NodeTerminal in @ls-live/node). The
 * renderer owns the terminal exclusively for the lifetime of a session.
 */
export interface TerminalIO {
  /** Best effort; returns how many lines the cursor actually moved. */
  moveCursorUp(lines: number): number;
  /** Erase the line under the cursor and return to column 1. */
  clearCurrentLine(): void;
  /** 1-based cursor row within the visible screen. */
  cursorRow(): number;
  /** Height of the visible screen in lines. */
  screenRows(): number;
  write(text: string): void;
  flush(): void;
}

/** Optional diagnostics hook; must never throw into the caller. */
export type AuditSink = Readonly<{
  enabled: boolean;
  emit: (stage: string, fields?: Readonly<Record<string, unknown>>) => void;
}>;
