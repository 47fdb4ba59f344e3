import {
  AGGREGATE_FAILED,
  type DirectoryAggregate,
  type DirectoryReader,
  NOT_A_DIRECTORY,
  type RawDirEntry,
} from "./types.js";

const FAILED_AGGREGATE: DirectoryAggregate = Object.freeze({
  sizeBytes: AGGREGATE_FAILED,
  subfileCount: AGGREGATE_FAILED,
  subdirCount: AGGREGATE_FAILED,
});

/**
 * Walk a directory subtree depth-first with an explicit stack.
 *
 * Any enumeration failure abandons the walk; the caller never sees partial
 * totals.
 */
export function aggregateDirectory(root: string, reader: DirectoryReader): DirectoryAggregate {
  let sizeBytes = 0;
  let subfileCount = 0;
  let subdirCount = 0;
  const stack: string[] = [root];

  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined) break;
    let children: ReturnType<DirectoryReader["readDirectory"]>;
    try {
      children = reader.readDirectory(next);
    } catch {
      return FAILED_AGGREGATE;
    }
    for (const child of children) {
      if (child.isDirectory) {
        subdirCount++;
        stack.push(child.path);
      } else {
        subfileCount++;
        sizeBytes += child.sizeBytes;
      }
    }
  }

  return Object.freeze({ sizeBytes, subfileCount, subdirCount });
}

/**
 * One filesystem object.
 *
 * Identity and timestamps are fixed at construction. For directories the
 * three aggregate fields are computed together on first access to any of
 * them, exactly once.
 */
export class Entry {
  readonly name: string;
  readonly path: string;
  readonly isDirectory: boolean;
  readonly creationTimeMs: number;
  readonly modificationTimeMs: number;

  private readonly reader: DirectoryReader;
  private aggregate: DirectoryAggregate | null;
  private aggregationPasses = 0;

  constructor(raw: RawDirEntry, reader: DirectoryReader) {
    this.name = raw.name;
    this.path = raw.path;
    this.isDirectory = raw.isDirectory;
    this.creationTimeMs = raw.creationTimeMs;
    this.modificationTimeMs = raw.modificationTimeMs;
    this.reader = reader;
    this.aggregate = raw.isDirectory
      ? null
      : Object.freeze({
          sizeBytes: raw.sizeBytes,
          subfileCount: NOT_A_DIRECTORY,
          subdirCount: NOT_A_DIRECTORY,
        });
  }

  /** Bytes in this file, or in the whole subtree of this directory. -1 on failure. */
  get sizeBytes(): number {
    return this.resolveAggregate().sizeBytes;
  }

  /** Files anywhere below this directory. -1 on failure, -2 for files. */
  get subfileCount(): number {
    return this.resolveAggregate().subfileCount;
  }

  /** Directories anywhere below this directory. -1 on failure, -2 for files. */
  get subdirCount(): number {
    return this.resolveAggregate().subdirCount;
  }

  /** True once the aggregate fields are available without blocking. */
  get isResolved(): boolean {
    return this.aggregate !== null;
  }

  /** Number of aggregation walks run for this entry (0 or 1). */
  get aggregationCount(): number {
    return this.aggregationPasses;
  }

  /** Name with a trailing "/" for directories. */
  get displayPath(): string {
    return this.isDirectory ? `${this.name}/` : this.name;
  }

  /** Suffix from the last "." of a file name; "" for directories and bare names. */
  get extension(): string {
    if (this.isDirectory) return "";
    const dot = this.name.lastIndexOf(".");
    return dot < 0 ? "" : this.name.slice(dot);
  }

  private resolveAggregate(): DirectoryAggregate {
    if (this.aggregate !== null) return this.aggregate;
    this.aggregationPasses++;
    const aggregate = aggregateDirectory(this.path, this.reader);
    this.aggregate = aggregate;
    return aggregate;
  }
}

export function createEntry(raw: RawDirEntry, reader: DirectoryReader): Entry {
  return new Entry(raw, reader);
}
