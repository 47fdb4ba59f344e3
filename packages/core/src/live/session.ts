/**
 * packages/core/src/live/session.ts: Incremental sorted live rendering.
 *
 * A session keeps a sorted list of (item, rendered text) pairs and repaints
 * the terminal region it occupies as items arrive:
 *
 *   active ──insert──▶ accumulating ──finish/abandon──▶ closed
 *
 * Text is rendered eagerly on insert, before the binary search and before any
 * screen update, because rendering may block (directory aggregation). A
 * repaint therefore only ever writes strings that already exist.
 *
 * Every repaint recomputes the whole layout. A single insertion can drop the
 * column count and add several lines at once, so line counts are never
 * assumed to grow by one.
 */

import { LsLiveError } from "../errors.js";
import { type LayoutConfig, resolveLayoutConfig } from "../layout/config.js";
import { layoutLines } from "../layout/columns.js";
import { type SortKey, insertionIndex } from "../ordering/sortKey.js";
import type { AuditSink, TerminalIO } from "./terminal.js";

export type RenderedItem<T> = Readonly<{ item: T; text: string }>;

export type SessionState = "active" | "accumulating" | "closed";

export const DEFAULT_MIN_REPAINT_INTERVAL_MS = 100;

export type LiveSessionOptions<T> = Readonly<{
  sortKey: SortKey<T>;
  render: (item: T) => string;
  terminal: TerminalIO;
  layout?: Partial<LayoutConfig>;
  /** Skip live repaints; paint once when the session finishes. */
  finalOnly?: boolean;
  /** Repaints closer together than this are skipped. */
  minRepaintIntervalMs?: number;
  /** Milliseconds, monotonic. */
  clock?: () => number;
  audit?: AuditSink;
}>;

export interface LiveSession<T> {
  readonly state: SessionState;
  insert(item: T): void;
  /** Snapshot of the sorted list. */
  items(): readonly RenderedItem<T>[];
  /** Lines occupied by the most recent paint. */
  lineCount(): number;
  /** Live repaints performed so far (the final paint excluded). */
  repaintCount(): number;
  /** Paint the full sorted layout once and close. */
  finish(): void;
  /** Close without repainting; the last live paint stays on screen. */
  abandon(): void;
}

const defaultClock = (): number => performance.now();

function requireInterval(value: number | undefined): number {
  if (value === undefined) return DEFAULT_MIN_REPAINT_INTERVAL_MS;
  if (!Number.isFinite(value) || value < 0) {
    throw new LsLiveError(
      "LSL_INVALID_CONFIG",
      `minRepaintIntervalMs must be a finite number >= 0, got ${String(value)}`,
    );
  }
  return value;
}

class LiveRenderer<T> implements LiveSession<T> {
  private readonly sortKey: SortKey<T>;
  private readonly render: (item: T) => string;
  private readonly terminal: TerminalIO;
  private readonly layout: LayoutConfig;
  private readonly finalOnly: boolean;
  private readonly minInterval: number;
  private readonly clock: () => number;
  private readonly audit: AuditSink | null;

  private readonly list: RenderedItem<T>[] = [];
  private prevLines = 0;
  private lastPaintAt: number | null = null;
  private repaints = 0;
  private current: SessionState = "active";

  constructor(options: LiveSessionOptions<T>) {
    this.sortKey = options.sortKey;
    this.render = options.render;
    this.terminal = options.terminal;
    this.layout = resolveLayoutConfig(options.layout);
    this.finalOnly = options.finalOnly === true;
    this.minInterval = requireInterval(options.minRepaintIntervalMs);
    this.clock = options.clock ?? defaultClock;
    this.audit = options.audit?.enabled === true ? options.audit : null;
  }

  get state(): SessionState {
    return this.current;
  }

  insert(item: T): void {
    this.assertOpen("insert");
    const text = this.render(item);
    const at = insertionIndex(this.list, item, this.sortKey, (r) => r.item);
    this.list.splice(at, 0, Object.freeze({ item, text }));
    this.current = "accumulating";

    if (this.finalOnly) return;
    const now = this.clock();
    if (this.lastPaintAt !== null && now - this.lastPaintAt < this.minInterval) return;
    this.lastPaintAt = now;

    const stats = this.paint(this.currentLines(), true);
    this.repaints++;
    this.audit?.emit("repaint", { items: this.list.length, ...stats });
  }

  items(): readonly RenderedItem<T>[] {
    return this.list.slice();
  }

  lineCount(): number {
    return this.prevLines;
  }

  repaintCount(): number {
    return this.repaints;
  }

  finish(): void {
    this.assertOpen("finish");
    const stats = this.paint(this.currentLines(), false);
    this.current = "closed";
    this.audit?.emit("finish", { items: this.list.length, repaints: this.repaints, ...stats });
  }

  abandon(): void {
    if (this.current === "closed") return;
    this.current = "closed";
    this.audit?.emit("abandon", { items: this.list.length, lines: this.prevLines });
  }

  private assertOpen(op: string): void {
    if (this.current === "closed") {
      throw new LsLiveError("LSL_SESSION_CLOSED", `${op}() called on a closed render session`);
    }
  }

  private currentLines(): string[] {
    return layoutLines(
      this.list.map((r) => r.text),
      this.layout,
    );
  }

  /**
   * Overwrite the previous paint with `lines`.
   *
   * Live paints keep to the bottom `screenRows - 1` lines so nothing is
   * written where the next paint cannot move back to. Leftover lines of a
   * taller previous paint are cleared and the cursor returned above them.
   */
  private paint(
    lines: readonly string[],
    capToScreen: boolean,
  ): Readonly<{ lines: number; written: number; moved: number }> {
    const term = this.terminal;
    const reachable = Math.max(0, term.cursorRow() - 1);
    const wanted = Math.min(this.prevLines, reachable);
    const moved = wanted > 0 ? term.moveCursorUp(wanted) : 0;

    let visible: readonly string[] = lines;
    if (capToScreen) {
      const space = term.screenRows() - 1;
      visible = space > 0 ? lines.slice(Math.max(0, lines.length - space)) : [];
    }

    for (const line of visible) {
      term.clearCurrentLine();
      term.write(`${line}\n`);
    }

    const stale = moved - visible.length;
    if (stale > 0) {
      for (let i = 0; i < stale; i++) {
        term.clearCurrentLine();
        term.write("\n");
      }
      term.moveCursorUp(stale);
    }

    term.flush();
    this.prevLines = visible.length;
    return Object.freeze({ lines: lines.length, written: visible.length, moved });
  }
}

export function beginSession<T>(options: LiveSessionOptions<T>): LiveSession<T> {
  return new LiveRenderer(options);
}

/**
 * Scoped render session: the full sorted layout is painted when `body`
 * returns; when it throws, the session is abandoned (partial output stays)
 * and the error propagates.
 */
export function withSession<T, R>(
  options: LiveSessionOptions<T>,
  body: (session: LiveSession<T>) => R,
): R {
  const session = beginSession(options);
  let result: R;
  try {
    result = body(session);
  } catch (err) {
    session.abandon();
    throw err;
  }
  session.finish();
  return result;
}
