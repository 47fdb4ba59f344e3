/**
 * packages/core/src/render/columns.ts: Display columns as render strategies.
 *
 * Each column is a stateless `{ id, render(entry) }` object configured once,
 * outside the renderer. The displayed order is fixed: creation time,
 * modification time, sub-file count, sub-directory count, size, name.
 */

import type { Entry } from "../entry/entry.js";
import { formatNumber, numberWidth } from "../format/number.js";
import { quotePath } from "../format/path.js";
import { formatTime } from "../format/time.js";
import { type RenderContext, paint } from "./palette.js";

export interface RenderColumn<T> {
  readonly id: string;
  render(item: T): string;
}

export type ColumnMode = "off" | "short" | "long";

export type ColumnSelection = Readonly<{
  ctime?: ColumnMode;
  mtime?: ColumnMode;
  subCounts?: ColumnMode;
  size?: ColumnMode;
  highlightExtensions?: boolean;
}>;

const SIZE_UNIT = "B";

export function creationTimeColumn(context: RenderContext, long: boolean): RenderColumn<Entry> {
  return Object.freeze({
    id: "ctime",
    render: (e: Entry) =>
      paint(context, "ctime", formatTime(e.creationTimeMs, { long, nowMs: context.nowMs })),
  });
}

export function modificationTimeColumn(
  context: RenderContext,
  long: boolean,
): RenderColumn<Entry> {
  return Object.freeze({
    id: "mtime",
    render: (e: Entry) =>
      paint(context, "mtime", formatTime(e.modificationTimeMs, { long, nowMs: context.nowMs })),
  });
}

/** Files get a blank of the same width: the counts only describe directories. */
function subCountColumn(
  id: string,
  context: RenderContext,
  long: boolean,
  read: (e: Entry) => number,
): RenderColumn<Entry> {
  const blank = " ".repeat(numberWidth({ long }));
  return Object.freeze({
    id,
    render: (e: Entry) =>
      e.isDirectory ? paint(context, "subCounts", formatNumber(read(e), { long })) : blank,
  });
}

export function subfileCountColumn(context: RenderContext, long: boolean): RenderColumn<Entry> {
  return subCountColumn("subfiles", context, long, (e) => e.subfileCount);
}

export function subdirCountColumn(context: RenderContext, long: boolean): RenderColumn<Entry> {
  return subCountColumn("subdirs", context, long, (e) => e.subdirCount);
}

export function sizeColumn(context: RenderContext, long: boolean): RenderColumn<Entry> {
  return Object.freeze({
    id: "size",
    render: (e: Entry) =>
      paint(context, "size", formatNumber(e.sizeBytes, { long, unit: SIZE_UNIT })),
  });
}

export function nameColumn(
  context: RenderContext,
  highlightExtensions: boolean,
): RenderColumn<Entry> {
  return Object.freeze({
    id: "name",
    render: (e: Entry) => {
      const path = quotePath(e.displayPath);
      if (e.isDirectory) return paint(context, "directory", path);
      const dot = path.lastIndexOf(".");
      if (!highlightExtensions || dot < 0) return paint(context, "file", path);

      const stem = path.slice(0, dot);
      const first = path[0];
      if (first === "'" || first === '"') {
        // Keep the closing quote out of the highlight.
        return (
          paint(context, "file", stem) +
          paint(context, "extension", path.slice(dot, -1)) +
          paint(context, "file", path.slice(-1))
        );
      }
      return paint(context, "file", stem) + paint(context, "extension", path.slice(dot));
    },
  });
}

export function buildColumns(
  selection: ColumnSelection,
  context: RenderContext,
): RenderColumn<Entry>[] {
  const columns: RenderColumn<Entry>[] = [];
  const on = (mode: ColumnMode | undefined) => mode === "short" || mode === "long";

  if (on(selection.ctime)) {
    columns.push(creationTimeColumn(context, selection.ctime === "long"));
  }
  if (on(selection.mtime)) {
    columns.push(modificationTimeColumn(context, selection.mtime === "long"));
  }
  if (on(selection.subCounts)) {
    const long = selection.subCounts === "long";
    columns.push(subfileCountColumn(context, long), subdirCountColumn(context, long));
  }
  if (on(selection.size)) {
    columns.push(sizeColumn(context, selection.size === "long"));
  }
  columns.push(nameColumn(context, selection.highlightExtensions === true));
  return columns;
}

/**
 * Join columns with two spaces. Rows with more than one column start with
 * a space so attributes do not touch the left edge.
 */
export function composeRenderer<T>(columns: readonly RenderColumn<T>[]): (item: T) => string {
  const indent = columns.length > 1 ? " " : "";
  return (item: T) => indent + columns.map((c) => c.render(item)).join("  ");
}
