/**
 * packages/core/src/format/number.ts: Fixed-width byte and item counts.
 *
 * Layouts:
 *   short: "xxxP"      3 numeral cells + 1 prefix cell
 *   long:  "xxxxx PU"  5 numeral cells + " " + prefix + unit (padded)
 *
 * Magnitudes are 1024-based. Short form never shows four digits with a
 * prefix; when there is no prefix the prefix cell is reused for a fourth
 * digit (no unit) or for a single-character unit.
 */

import { fixedLength } from "./fixedLength.js";

export const MAGNITUDE_PREFIXES = Object.freeze([
  "",
  "k",
  "M",
  "G",
  "T",
  "P",
  "E",
  "Z",
  "Y",
  "R",
  "Q",
] as const);

const SHORT_LIMIT = 1000;
const LONG_LIMIT = 1024;
const SHORT_DIGITS = 3;
const LONG_DIGITS = 5;

export type NumberFormatOptions = Readonly<{
  long?: boolean;
  unit?: string;
}>;

/** Cell width of every string formatNumber() returns for these options. */
export function numberWidth(opts: NumberFormatOptions = {}): number {
  const unit = opts.unit ?? "";
  return opts.long === true ? LONG_DIGITS + 2 + unit.length : SHORT_DIGITS + 1;
}

function unknownPlaceholder(long: boolean, unit: string): string {
  if (!long) return " ???";
  return ` ???? ${"?".padEnd(unit.length, " ").slice(0, unit.length)} `;
}

function overflowPlaceholder(long: boolean, unit: string): string {
  return long ? ` lots ${unit} ` : "lots";
}

function renderScaled(value: number, prefix: number, long: boolean, unit: string): string | null {
  const prefixText = MAGNITUDE_PREFIXES[prefix] ?? "";
  let digits = long ? LONG_DIGITS : SHORT_DIGITS;
  let suffix = long
    ? ` ${(prefixText + unit).padEnd(1 + unit.length, " ")}`
    : prefixText.padEnd(1, " ");

  if (!long && prefixText === "") {
    if (unit.length === 0) {
      digits += 1;
      suffix = "";
    } else if (unit.length === 1) {
      suffix = unit;
    }
  }

  const numeral = fixedLength(value, digits);
  return numeral === null ? null : `${numeral}${suffix}`;
}

/**
 * Render `num` in a fixed number of cells (see numberWidth()).
 *
 * Negative (failed) values render as "???" placeholders; values beyond the
 * largest prefix render as "lots".
 */
export function formatNumber(num: number, opts: NumberFormatOptions = {}): string {
  const long = opts.long === true;
  const unit = opts.unit ?? "";

  if (Number.isNaN(num) || num < 0) return unknownPlaceholder(long, unit);

  const limit = long ? LONG_LIMIT : SHORT_LIMIT;
  const lastPrefix = MAGNITUDE_PREFIXES.length - 1;
  let value = num;
  let prefix = 0;
  while (value >= limit && prefix < lastPrefix) {
    value /= 1024;
    prefix++;
  }

  for (;;) {
    if (value >= limit) return overflowPlaceholder(long, unit);
    const rendered = renderScaled(value, prefix, long, unit);
    if (rendered !== null) return rendered;
    // Rounding carried into a new integer digit: step up one magnitude.
    if (prefix >= lastPrefix) return overflowPlaceholder(long, unit);
    value /= 1024;
    prefix++;
  }
}
