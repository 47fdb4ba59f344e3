/**
 * packages/node/src/terminal/cursorProbe.ts: Cursor position report (CPR) probe.
 *
 * Writes `ESC[6n` and waits for the terminal's `ESC[<row>;<col>R` reply on
 * stdin. Opt-in (LS_LIVE_CURSOR_PROBE=1): the probe switches stdin to raw
 * mode and consumes whatever the user types while it waits.
 */

export const CURSOR_PROBE_TIMEOUT_MS = 80;

export type CursorPosition = Readonly<{ row: number; col: number }>;

/** The parts of process.stdin the probe drives. */
export type ProbeInput = {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: (chunk: string | Buffer) => void): unknown;
  off(event: "data", listener: (chunk: string | Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
};

/** The parts of process.stdout the probe writes to. */
export type ProbeOutput = {
  readonly isTTY?: boolean;
  write(chunk: string, callback: (err?: Error | null) => void): boolean;
};

/**
 * Append every complete report found in `buffer` to `out` and return the
 * unconsumed tail. Bytes before an escape are dropped.
 */
export function parseCursorReports(buffer: string, out: CursorPosition[]): string {
  let pending = buffer;
  while (pending.length > 0) {
    const esc = pending.indexOf("\u001b[");
    if (esc < 0) {
      if (pending.length > 128) pending = pending.slice(-128);
      break;
    }
    if (esc > 0) pending = pending.slice(esc);

    const end = pending.indexOf("R", 2);
    if (end < 0) break;
    const body = pending.slice(2, end);
    pending = pending.slice(end + 1);

    const match = /^(\d+);(\d+)$/u.exec(body);
    if (match === null) continue;
    const row = Number.parseInt(match[1] ?? "", 10);
    const col = Number.parseInt(match[2] ?? "", 10);
    if (Number.isFinite(row) && Number.isFinite(col) && row > 0) {
      out.push({ row, col });
    }
  }
  return pending;
}

/**
 * Ask the terminal where the cursor is. Resolves to the 1-based row, or null
 * when either stream is not a TTY, raw mode is unavailable, or no report
 * arrives within `timeoutMs`.
 */
export async function probeCursorRow(
  stdin: ProbeInput,
  stdout: ProbeOutput,
  timeoutMs: number = CURSOR_PROBE_TIMEOUT_MS,
): Promise<number | null> {
  if (stdin.isTTY !== true || stdout.isTTY !== true) return null;
  const setRawMode = stdin.setRawMode?.bind(stdin);
  if (setRawMode === undefined) return null;

  const wasRaw = stdin.isRaw === true;
  const reports: CursorPosition[] = [];
  let pending = "";
  let timeout: NodeJS.Timeout | null = null;
  let wake: (() => void) | null = null;

  const onData = (chunk: string | Buffer): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    pending = parseCursorReports(pending + text, reports);
    if (reports.length > 0) wake?.();
  };

  try {
    stdin.on("data", onData);
    stdin.resume();
    if (!wasRaw) setRawMode(true);

    await new Promise<void>((resolve, reject) => {
      stdout.write("\u001b[6n", (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });

    await new Promise<void>((resolve) => {
      wake = resolve;
      timeout = setTimeout(resolve, timeoutMs);
      if (reports.length > 0) resolve();
    });
  } catch {
    return null;
  } finally {
    if (timeout !== null) clearTimeout(timeout);
    stdin.off("data", onData);
    stdin.pause();
    if (!wasRaw) {
      try {
        setRawMode(false);
      } catch {
        // The terminal may already be gone; nothing left to restore.
      }
    }
  }

  return reports[0]?.row ?? null;
}
