/**
 * packages/cli/src/args.ts: Command-line parsing and sort-key inference.
 *
 * Short flags may be bundled (`-cs`). Flags in one exclusive group (such as
 * `-c` and `-C`) may not be combined. `-x`/`-X` take an optional key: the
 * next argument is consumed only when it is a valid key code, so
 * `ls-live -x some/dir` sorts by the inferred key and lists `some/dir`.
 */

import {
  type ColumnMode,
  type ColumnSelection,
  type Entry,
  type EntryFilter,
  LsLiveError,
  type SortKey,
  type SortKeyCode,
  SORT_KEY_CODES,
  byName,
  directoriesOnly,
  everything,
  filesOnly,
  isSortKeyCode,
  sortKeyForCode,
} from "@ls-live/core";

export type SortRequest = Readonly<{
  /** null: infer from the single included attribute. */
  code: SortKeyCode | null;
  reverse: boolean;
  /** The flag that asked for sorting, for error messages. */
  flag: string;
}>;

export type CliOptions = Readonly<{
  path: string;
  show: "all" | "files" | "directories";
  ctime: ColumnMode;
  mtime: ColumnMode;
  subCounts: ColumnMode;
  size: ColumnMode;
  extensions: boolean;
  sort: SortRequest | null;
  singleColumn: boolean;
  columns: number | null;
  noColour: boolean;
  noRunning: boolean;
  rowWise: boolean;
  uniformWidth: boolean;
  help: boolean;
}>;

type Draft = { -readonly [K in keyof CliOptions]: CliOptions[K] };

type FlagSpec = Readonly<{
  short: string | null;
  long: string;
  /** Flags sharing a group are mutually exclusive. */
  group: string | null;
  apply: (draft: Draft) => void;
}>;

function set<K extends keyof Draft>(key: K, value: Draft[K]): (draft: Draft) => void {
  return (draft) => {
    draft[key] = value;
  };
}

const FLAGS: readonly FlagSpec[] = Object.freeze([
  { short: "f", long: "files", group: "show", apply: set("show", "files") },
  { short: "d", long: "directories", group: "show", apply: set("show", "directories") },
  { short: "c", long: "ctime", group: "ctime", apply: set("ctime", "short") },
  { short: "C", long: "long-ctime", group: "ctime", apply: set("ctime", "long") },
  { short: "m", long: "mtime", group: "mtime", apply: set("mtime", "short") },
  { short: "M", long: "long-mtime", group: "mtime", apply: set("mtime", "long") },
  { short: "n", long: "sub-counts", group: "counts", apply: set("subCounts", "short") },
  { short: "N", long: "long-sub-counts", group: "counts", apply: set("subCounts", "long") },
  { short: "s", long: "size", group: "size", apply: set("size", "short") },
  { short: "S", long: "long-size", group: "size", apply: set("size", "long") },
  { short: "e", long: "extensions", group: null, apply: set("extensions", true) },
  { short: "1", long: "single-column", group: "columns", apply: set("singleColumn", true) },
  { short: null, long: "no-colour", group: null, apply: set("noColour", true) },
  { short: null, long: "no-color", group: null, apply: set("noColour", true) },
  { short: null, long: "no-running", group: null, apply: set("noRunning", true) },
  { short: null, long: "row-wise", group: null, apply: set("rowWise", true) },
  { short: null, long: "uniform-width", group: null, apply: set("uniformWidth", true) },
  { short: "h", long: "help", group: null, apply: set("help", true) },
]);

function usageError(message: string): LsLiveError {
  return new LsLiveError("LSL_INVALID_ARGUMENT", message);
}

function flagName(spec: Readonly<{ short: string | null; long: string }>): string {
  return spec.short === null ? `--${spec.long}` : `-${spec.short}/--${spec.long}`;
}

const SORT_FLAGS = Object.freeze({
  sort: { short: "x", long: "sort", reverse: false },
  reverse: { short: "X", long: "reverse-sort", reverse: true },
});

const COLUMNS_FLAG = Object.freeze({ short: null, long: "columns" });

function parseColumnCount(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/u.test(raw)) {
    throw usageError(`argument --columns: expected a positive integer, got '${raw ?? ""}'`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < 1) {
    throw usageError(`argument --columns: expected a positive integer, got '${raw}'`);
  }
  return value;
}

function parseSortCode(flag: string, raw: string): SortKeyCode {
  if (!isSortKeyCode(raw)) {
    throw usageError(
      `argument ${flag}: invalid choice: '${raw}' (choose from ${SORT_KEY_CODES.join(", ")})`,
    );
  }
  return raw;
}

/** Expand bundled short flags: `-cs` becomes `-c -s`. */
function expandArgs(argv: readonly string[]): string[] {
  const out: string[] = [];
  let literal = false;
  for (const arg of argv) {
    const bundled = !literal && arg.startsWith("-") && !arg.startsWith("--") && arg.length > 2;
    if (!bundled) {
      if (arg === "--") literal = true;
      out.push(arg);
      continue;
    }
    for (const ch of arg.slice(1)) out.push(`-${ch}`);
  }
  return out;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const draft: Draft = {
    path: ".",
    show: "all",
    ctime: "off",
    mtime: "off",
    subCounts: "off",
    size: "off",
    extensions: false,
    sort: null,
    singleColumn: false,
    columns: null,
    noColour: false,
    noRunning: false,
    rowWise: false,
    uniformWidth: false,
    help: false,
  };
  const groupOwners = new Map<string, string>();
  let sawPath = false;
  let literal = false;

  const claim = (group: string, name: string): void => {
    const owner = groupOwners.get(group);
    if (owner !== undefined && owner !== name) {
      throw usageError(`argument ${name}: not allowed with argument ${owner}`);
    }
    groupOwners.set(group, name);
  };

  const setPath = (arg: string): void => {
    if (sawPath) throw usageError(`unrecognized arguments: ${arg}`);
    draft.path = arg;
    sawPath = true;
  };

  const args = expandArgs(argv);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (literal || !arg.startsWith("-") || arg === "-") {
      setPath(arg);
      continue;
    }
    if (arg === "--") {
      literal = true;
      continue;
    }

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const head = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    const sortFlag =
      head === "-x" || head === "--sort"
        ? SORT_FLAGS.sort
        : head === "-X" || head === "--reverse-sort"
          ? SORT_FLAGS.reverse
          : null;
    if (sortFlag !== null) {
      const name = flagName(sortFlag);
      claim("sort", name);
      let code: SortKeyCode | null = null;
      if (inline !== undefined) {
        code = parseSortCode(name, inline);
      } else {
        const next = args[i + 1];
        if (next !== undefined && isSortKeyCode(next)) {
          code = next;
          i++;
        }
      }
      draft.sort = Object.freeze({ code, reverse: sortFlag.reverse, flag: name });
      continue;
    }

    if (head === "--columns") {
      claim("columns", flagName(COLUMNS_FLAG));
      if (inline !== undefined) {
        draft.columns = parseColumnCount(inline);
      } else {
        draft.columns = parseColumnCount(args[i + 1]);
        i++;
      }
      continue;
    }

    const spec = FLAGS.find((f) =>
      head.startsWith("--") ? `--${f.long}` === head : f.short !== null && `-${f.short}` === head,
    );
    if (spec === undefined || inline !== undefined) {
      throw usageError(`unrecognized arguments: ${arg}`);
    }
    if (spec.group !== null) claim(spec.group, flagName(spec));
    spec.apply(draft);
  }

  return Object.freeze(draft);
}

/** Attributes shown besides the name, in display order. */
export function columnSelection(options: CliOptions): ColumnSelection {
  return Object.freeze({
    ctime: options.ctime,
    mtime: options.mtime,
    subCounts: options.subCounts,
    size: options.size,
    highlightExtensions: options.extensions,
  });
}

function hasExtraAttributes(options: CliOptions): boolean {
  return [options.ctime, options.mtime, options.subCounts, options.size].some((m) => m !== "off");
}

/**
 * The single included attribute decides the key. Sub-counts add two
 * candidate keys at once, so they always make inference ambiguous.
 */
export function inferSortCode(options: CliOptions, flag: string): SortKeyCode {
  const candidates: SortKeyCode[] = [];
  if (options.ctime !== "off") candidates.push("c");
  if (options.mtime !== "off") candidates.push("m");
  if (options.subCounts !== "off") candidates.push("nf", "nd");
  if (options.size !== "off") candidates.push("s");
  if (options.extensions) candidates.push("e");
  if (candidates.length > 1) {
    throw usageError(`argument ${flag}: cannot infer sort key: too many included attributes`);
  }
  return candidates[0] ?? "n";
}

export function resolveSortKey(options: CliOptions): SortKey<Entry> {
  const request = options.sort;
  if (request === null) return byName;
  const code = request.code ?? inferSortCode(options, request.flag);
  return sortKeyForCode(code, request.reverse);
}

export function resolveFilter(options: CliOptions): EntryFilter {
  if (options.show === "files") return filesOnly;
  if (options.show === "directories") return directoriesOnly;
  return everything;
}

/** One column when anything besides plain names is shown, otherwise four. */
export function resolveMaxColumns(options: CliOptions): number {
  if (options.columns !== null) return options.columns;
  if (options.singleColumn) return 1;
  return hasExtraAttributes(options) || options.extensions ? 1 : 4;
}
