/**
 * @ls-live/core
 *
 * Runtime-agnostic engine for incremental sorted directory listings.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports);
 * filesystem and terminal access come in through DirectoryReader and
 * TerminalIO.
 */

// =============================================================================
// Errors
// =============================================================================

export { LsLiveError, isLsLiveError, type LsLiveErrorCode } from "./errors.js";

// =============================================================================
// Entry model
// =============================================================================

export { Entry, aggregateDirectory, createEntry } from "./entry/entry.js";
export {
  AGGREGATE_FAILED,
  NOT_A_DIRECTORY,
  type DirectoryAggregate,
  type DirectoryChild,
  type DirectoryReader,
  type RawDirEntry,
} from "./entry/types.js";
export { directoriesOnly, everything, filesOnly, type EntryFilter } from "./entry/filters.js";

// =============================================================================
// Ordering
// =============================================================================

export {
  SORT_KEY_CODES,
  byCreationTime,
  byExtension,
  byModificationTime,
  byName,
  bySize,
  bySubdirCount,
  bySubfileCount,
  compareTuples,
  insertionIndex,
  isSortKeyCode,
  nameTuple,
  reverseKey,
  sortKeyForCode,
  tupleKey,
  type SortKey,
  type SortKeyCode,
  type SortTuple,
  type SortTupleValue,
} from "./ordering/sortKey.js";

// =============================================================================
// Formatting
// =============================================================================

export { fixedLength } from "./format/fixedLength.js";
export {
  MAGNITUDE_PREFIXES,
  formatNumber,
  numberWidth,
  type NumberFormatOptions,
} from "./format/number.js";
export {
  LONG_TIME_WIDTH,
  SHORT_TIME_WIDTH,
  formatTime,
  type TimeFormatOptions,
} from "./format/time.js";
export { isQuotedPath, quotePath } from "./format/path.js";
export { clearTextMeasureCache, measureTextCells, stripAnsi } from "./text/measure.js";

// =============================================================================
// Layout
// =============================================================================

export {
  DEFAULT_LAYOUT_CONFIG,
  resolveLayoutConfig,
  type LayoutConfig,
} from "./layout/config.js";
export {
  layoutLines,
  renderLayoutLines,
  solveColumns,
  tryColumns,
  type ColumnLayout,
} from "./layout/columns.js";

// =============================================================================
// Render strategies
// =============================================================================

export {
  DEFAULT_PALETTE,
  createRenderContext,
  paint,
  type Palette,
  type PaletteRole,
  type RenderContext,
} from "./render/palette.js";
export {
  buildColumns,
  composeRenderer,
  creationTimeColumn,
  modificationTimeColumn,
  nameColumn,
  sizeColumn,
  subdirCountColumn,
  subfileCountColumn,
  type ColumnMode,
  type ColumnSelection,
  type RenderColumn,
} from "./render/columns.js";

// =============================================================================
// Live rendering
// =============================================================================

export type { AuditSink, TerminalIO } from "./live/terminal.js";
export {
  DEFAULT_MIN_REPAINT_INTERVAL_MS,
  beginSession,
  withSession,
  type LiveSession,
  type LiveSessionOptions,
  type RenderedItem,
  type SessionState,
} from "./live/session.js";
