/**
 * packages/core/src/format/time.ts: Fixed-width timestamps.
 *
 *   short: "xxxU ago"  how long before `nowMs`, or " yyyy-mm" once too old
 *   long:  "yyyy-mm-dd HH:MM:SS.ffffff" local time, microseconds
 *
 * `nowMs` comes from the caller's render context so every row of one listing
 * is relative to the same instant.
 */

import { fixedLength } from "./fixedLength.js";

type RelativeUnit = Readonly<{ suffix: string; scaleMs: number; cutoff: number }>;

const RELATIVE_UNITS: readonly RelativeUnit[] = Object.freeze([
  { suffix: "s ago", scaleMs: 1000, cutoff: 120 },
  { suffix: "m ago", scaleMs: 60 * 1000, cutoff: 120 },
  { suffix: "h ago", scaleMs: 60 * 60 * 1000, cutoff: 48 },
  { suffix: "d ago", scaleMs: 24 * 60 * 60 * 1000, cutoff: 100 },
]);

const RELATIVE_DIGITS = 3;

export const SHORT_TIME_WIDTH = RELATIVE_DIGITS + "s ago".length;
export const LONG_TIME_WIDTH = "yyyy-mm-dd HH:MM:SS.ffffff".length;

export type TimeFormatOptions = Readonly<{
  long?: boolean;
  nowMs: number;
}>;

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function formatTimestamp(timeMs: number): string {
  const secondsMs = Math.floor(timeMs / 1000) * 1000;
  const micros = Math.min(999_999, Math.floor((timeMs - secondsMs) * 1000));
  const d = new Date(secondsMs);
  const date = `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1, 2)}-${pad(d.getDate(), 2)}`;
  const time = `${pad(d.getHours(), 2)}:${pad(d.getMinutes(), 2)}:${pad(d.getSeconds(), 2)}`;
  return `${date} ${time}.${pad(micros, 6)}`;
}

function formatYearMonth(timeMs: number): string {
  const d = new Date(timeMs);
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1, 2)}`;
}

export function formatTime(timeMs: number, opts: TimeFormatOptions): string {
  const long = opts.long === true;
  if (!Number.isFinite(timeMs)) {
    return "???".padStart(long ? LONG_TIME_WIDTH : SHORT_TIME_WIDTH, " ");
  }
  if (long) return formatTimestamp(timeMs);

  const ago = opts.nowMs - timeMs;
  for (const unit of RELATIVE_UNITS) {
    const count = ago / unit.scaleMs;
    if (count >= unit.cutoff) continue;
    const numeral = fixedLength(count, RELATIVE_DIGITS);
    if (numeral === null) continue;
    return `${numeral}${unit.suffix}`;
  }

  return formatYearMonth(timeMs).padStart(SHORT_TIME_WIDTH, " ");
}
