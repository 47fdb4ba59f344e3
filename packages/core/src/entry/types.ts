/**
 * packages/core/src/entry/types.ts: Entry model contracts.
 *
 * The core never touches a filesystem directly. Discovery hands it a
 * RawDirEntry; recursive aggregation goes through a DirectoryReader supplied
 * by the host (see @ls-live/node for the filesystem-backed one).
 */

/** Aggregate value meaning "could not be determined". */
export const AGGREGATE_FAILED = -1 as const;

/**
 * Value files report for the directory-only counts.
 * Lower than AGGREGATE_FAILED so files sort before failed directories.
 */
export const NOT_A_DIRECTORY = -2 as const;

/** Metadata already known once an entry has been discovered. */
export type RawDirEntry = Readonly<{
  /** Display name (not a full path). */
  name: string;
  /** Location handed to the DirectoryReader when aggregating. */
  path: string;
  isDirectory: boolean;
  /** Epoch milliseconds, fractional part allowed. */
  creationTimeMs: number;
  /** Epoch milliseconds, fractional part allowed. */
  modificationTimeMs: number;
  /** Byte size. Only meaningful for files; ignored for directories. */
  sizeBytes: number;
}>;

/** One child reported while enumerating a directory during aggregation. */
export type DirectoryChild = Readonly<{
  path: string;
  /** True only for real directories; links are never followed. */
  isDirectory: boolean;
  sizeBytes: number;
}>;

/**
 * Synchronous directory enumeration port.
 *
 * Implementations throw on any failure (permissions, races, vanished paths).
 * A single throw anywhere in a subtree invalidates the whole aggregation.
 */
export interface DirectoryReader {
  readDirectory(path: string): readonly DirectoryChild[];
}

/** Recursive totals of a directory subtree. */
export type DirectoryAggregate = Readonly<{
  sizeBytes: number;
  subfileCount: number;
  subdirCount: number;
}>;
