import { LsLiveError } from "../errors.js";

export type LayoutConfig = Readonly<{
  /** Budget for the summed column widths (indent excluded). */
  maxTotalWidth: number;
  minColumnWidth: number;
  /** Cells added after the longest item of a column. */
  padding: number;
  maxColumns: number;
  /** Fill rows first instead of columns first. */
  rowWise: boolean;
  /** Give every column but the last the widest of their widths. */
  uniformWidth: boolean;
}>;

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = Object.freeze({
  maxTotalWidth: 100,
  minColumnWidth: 16,
  padding: 5,
  maxColumns: 4,
  rowWise: false,
  uniformWidth: false,
});

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new LsLiveError(
      "LSL_INVALID_CONFIG",
      `layout.${name} must be an integer >= ${String(min)}, got ${String(value)}`,
    );
  }
  return value;
}

/** Fill defaults and validate. Throws LSL_INVALID_CONFIG on bad values. */
export function resolveLayoutConfig(partial: Partial<LayoutConfig> = {}): LayoutConfig {
  const merged = { ...DEFAULT_LAYOUT_CONFIG, ...partial };
  return Object.freeze({
    maxTotalWidth: requireInteger("maxTotalWidth", merged.maxTotalWidth, 1),
    minColumnWidth: requireInteger("minColumnWidth", merged.minColumnWidth, 0),
    padding: requireInteger("padding", merged.padding, 0),
    maxColumns: requireInteger("maxColumns", merged.maxColumns, 1),
    rowWise: merged.rowWise === true,
    uniformWidth: merged.uniformWidth === true,
  });
}
