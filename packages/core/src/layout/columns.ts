/**
 * packages/core/src/layout/columns.ts: Multi-column layout solver.
 *
 * Picks the largest column count (up to `maxColumns`, and never more columns
 * than items) whose summed column widths fit `maxTotalWidth`. One column is
 * always accepted.
 *
 * Column-major grids can leave trailing columns empty (e.g. 5 items in 4
 * columns of 2 rows). Filler cells are then pushed into the bottom of the
 * next-to-last columns so every column holds at least one item.
 */

import { measureTextCells } from "../text/measure.js";
import type { LayoutConfig } from "./config.js";

export type ColumnLayout = Readonly<{
  columns: number;
  rows: number;
  /** Width per column, padding included. */
  widths: readonly number[];
  /** Row-major cells; "" marks a filler cell. */
  cellRows: readonly (readonly string[])[];
}>;

function columnWidth(cells: readonly string[], config: LayoutConfig): number {
  let longest = 0;
  for (const cell of cells) {
    longest = Math.max(longest, measureTextCells(cell));
  }
  return Math.max(config.minColumnWidth, longest + config.padding);
}

function singleColumn(strings: readonly string[], config: LayoutConfig): ColumnLayout {
  return Object.freeze({
    columns: 1,
    rows: strings.length,
    widths: Object.freeze([columnWidth(strings, config)]),
    cellRows: Object.freeze(strings.map((s) => Object.freeze([s]))),
  });
}

function buildGrid(strings: readonly string[], columns: number, rows: number, rowWise: boolean) {
  const grid = strings.slice();
  if (!rowWise) {
    const filledColumns = Math.ceil(strings.length / rows);
    if (columns - filledColumns > 0) {
      const missing = rows * columns - 1 - strings.length;
      for (let i = 0; i < missing; i++) {
        const col = columns - 1 - missing + i;
        grid.splice(rows * col + rows - 1, 0, "");
      }
    }
  }
  while (grid.length < rows * columns) grid.push("");
  return grid;
}

/** Layout with exactly `columns` columns, or null when it exceeds the width budget. */
export function tryColumns(
  strings: readonly string[],
  columns: number,
  config: LayoutConfig,
): ColumnLayout | null {
  if (columns <= 1) return singleColumn(strings, config);

  const rows = Math.ceil(strings.length / columns);
  const grid = buildGrid(strings, columns, rows, config.rowWise);
  const cellAt = (row: number, col: number): string =>
    (config.rowWise ? grid[row * columns + col] : grid[col * rows + row]) ?? "";

  const widths: number[] = [];
  for (let col = 0; col < columns; col++) {
    const cells: string[] = [];
    for (let row = 0; row < rows; row++) cells.push(cellAt(row, col));
    widths.push(columnWidth(cells, config));
  }

  if (config.uniformWidth) {
    const uniform = Math.max(...widths.slice(0, -1));
    for (let col = 0; col < columns - 1; col++) widths[col] = uniform;
  }

  let total = 0;
  for (const w of widths) total += w;
  if (total > config.maxTotalWidth) return null;

  const cellRows: (readonly string[])[] = [];
  for (let row = 0; row < rows; row++) {
    const cells: string[] = [];
    for (let col = 0; col < columns; col++) cells.push(cellAt(row, col));
    cellRows.push(Object.freeze(cells));
  }

  return Object.freeze({
    columns,
    rows,
    widths: Object.freeze(widths),
    cellRows: Object.freeze(cellRows),
  });
}

export function solveColumns(strings: readonly string[], config: LayoutConfig): ColumnLayout {
  const maxColumns = Math.max(1, Math.min(config.maxColumns, strings.length));
  for (let columns = maxColumns; columns > 1; columns--) {
    const layout = tryColumns(strings, columns, config);
    if (layout !== null) return layout;
  }
  return singleColumn(strings, config);
}

/**
 * Turn a solved layout into terminal lines. Multi-column lines get a
 * one-space indent; every cell but the last is padded to its column width.
 */
export function renderLayoutLines(layout: ColumnLayout): string[] {
  const lines: string[] = [];
  for (const row of layout.cellRows) {
    let line = row.length > 1 ? " " : "";
    const last = row.length - 1;
    for (let col = 0; col < last; col++) {
      const cell = row[col] ?? "";
      const width = layout.widths[col] ?? 0;
      line += cell + " ".repeat(Math.max(0, width - measureTextCells(cell)));
    }
    line += row[last] ?? "";
    lines.push(line);
  }
  return lines;
}

export function layoutLines(strings: readonly string[], config: LayoutConfig): string[] {
  if (strings.length === 0) return [];
  return renderLayoutLines(solveColumns(strings, config));
}
