/**
 * packages/core/src/text/measure.ts: Visible width of rendered strings.
 *
 * Rendered items carry SGR colour codes; column widths must be computed from
 * what the terminal actually shows. Widths are per code point:
 *   - ASCII printable: 1 cell
 *   - control characters, combining marks, format characters: 0 cells
 *   - East Asian wide/fullwidth and emoji-presentation characters: 2 cells
 *   - everything else: 1 cell
 */

/** CSI sequences: ESC [ params final-byte. */
const CSI_PATTERN = /\u001b\[[0-9;?]*[A-Za-z]/gu;

const ZERO_WIDTH_PATTERN = /^[\p{Mn}\p{Me}\p{Cf}]$/u;
const EMOJI_PRESENTATION_PATTERN = /^\p{Emoji_Presentation}$/u;

/** [start, end] inclusive code point ranges with East Asian Width W or F. */
const WIDE_RANGES: readonly (readonly [number, number])[] = Object.freeze([
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
]);

const TEXT_CACHE_MAX_SIZE = 4096;
const TEXT_CACHE_MAX_KEY_LENGTH = 256;
const textWidthCache = new Map<string, number>();

export function stripAnsi(text: string): string {
  return text.includes("\u001b") ? text.replace(CSI_PATTERN, "") : text;
}

function isWide(scalar: number): boolean {
  for (const [start, end] of WIDE_RANGES) {
    if (scalar < start) return false;
    if (scalar <= end) return true;
  }
  return false;
}

function widthCodepoint(ch: string): 0 | 1 | 2 {
  const scalar = ch.codePointAt(0) ?? 0;
  if (scalar < 0x20 || (scalar >= 0x7f && scalar <= 0x9f)) return 0;
  if (scalar < 0x7f) return 1;
  if (ZERO_WIDTH_PATTERN.test(ch)) return 0;
  if (isWide(scalar) || EMOJI_PRESENTATION_PATTERN.test(ch)) return 2;
  return 1;
}

function measureAsciiOnly(text: string): number | null {
  let total = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0x80) return null;
    if (code < 0x20 || code === 0x7f) continue;
    total++;
  }
  return total;
}

function measureUncached(text: string): number {
  let total = 0;
  for (const ch of text) total += widthCodepoint(ch);
  return total;
}

/** Terminal cells `text` occupies once its escape sequences are interpreted. */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;

  const cacheable = text.length <= TEXT_CACHE_MAX_KEY_LENGTH;
  if (cacheable) {
    const cached = textWidthCache.get(text);
    if (cached !== undefined) return cached;
  }

  const visible = stripAnsi(text);
  const width = measureAsciiOnly(visible) ?? measureUncached(visible);

  if (cacheable) {
    if (textWidthCache.size >= TEXT_CACHE_MAX_SIZE) {
      const oldest = textWidthCache.keys().next();
      if (oldest.done !== true) textWidthCache.delete(oldest.value);
    }
    textWidthCache.set(text, width);
  }
  return width;
}

export function clearTextMeasureCache(): void {
  textWidthCache.clear();
}
