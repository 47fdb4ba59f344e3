/** toFixed() switches to exponent notation at this magnitude. */
const MAX_FIXED_MAGNITUDE = 1e21;

/**
 * Most accurate rendering of `num` in exactly `length` cells, right-aligned.
 *
 * Rounds to the decimals left after the integer part, re-formats, then
 * hard-truncates: rounding alone can carry into a new integer digit. Trailing
 * zeros and a trailing "." are dropped before padding.
 *
 * Returns null when the integer part does not fit, before or after rounding.
 */
export function fixedLength(num: number, length: number): string | null {
  if (!Number.isFinite(num) || Math.abs(num) >= MAX_FIXED_MAGNITUDE) return null;
  if (!Number.isInteger(length) || length < 1) return null;

  const integerWidth = num.toFixed(length).indexOf(".");
  if (integerWidth > length) return null;
  const decimals = integerWidth < length ? length - 1 - integerWidth : 0;

  const formatted = Number(num.toFixed(decimals)).toFixed(length);
  if (formatted.indexOf(".") > length) return null;

  let out = formatted.slice(0, length);
  if (out.includes(".")) {
    out = out.replace(/0+$/u, "").replace(/\.$/u, "");
  }
  return out.padStart(length, " ");
}
