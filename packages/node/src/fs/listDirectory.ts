/**
 * packages/node/src/fs/listDirectory.ts: Top-level enumeration driver.
 *
 * Streams a directory's entries one at a time into a live render session.
 * Each entry is handed over as soon as it is read, so aggregation and repaint
 * interleave with enumeration instead of waiting for the whole listing.
 */

import { type Dir, opendirSync } from "node:fs";
import {
  type AuditSink,
  type DirectoryReader,
  type Entry,
  type EntryFilter,
  type LiveSessionOptions,
  LsLiveError,
  type RenderedItem,
  everything,
  withSession,
} from "@ls-live/core";
import { createNodeEntry, nodeDirectoryReader } from "./reader.js";

export type ListDirectoryOptions = Readonly<{
  path: string;
  filter?: EntryFilter;
  session: LiveSessionOptions<Entry>;
  reader?: DirectoryReader;
  /** Receives a "skip" record for entries that vanish mid-listing. */
  audit?: AuditSink;
}>;

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function openDirectory(path: string): Dir {
  try {
    return opendirSync(path);
  } catch (err) {
    throw new LsLiveError(
      "LSL_ENUMERATION_FAILED",
      `cannot open directory '${path}': ${describeError(err)}`,
      { cause: err },
    );
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * List `path` through a render session and return the sorted items.
 *
 * Throws LSL_ENUMERATION_FAILED when the directory cannot be opened (before
 * any output) or read. Errors raised inside the session leave the partial
 * listing on screen.
 */
export function listDirectory(options: ListDirectoryOptions): readonly RenderedItem<Entry>[] {
  const filter = options.filter ?? everything;
  const reader = options.reader ?? nodeDirectoryReader;
  const dir = openDirectory(options.path);

  try {
    return withSession(options.session, (session) => {
      for (;;) {
        let dirent: ReturnType<Dir["readSync"]>;
        try {
          dirent = dir.readSync();
        } catch (err) {
          throw new LsLiveError(
            "LSL_ENUMERATION_FAILED",
            `cannot read directory '${options.path}': ${describeError(err)}`,
            { cause: err },
          );
        }
        if (dirent === null) break;

        let entry: Entry;
        try {
          entry = createNodeEntry(options.path, dirent, reader);
        } catch (err) {
          if (!isMissing(err)) throw err;
          options.audit?.emit("skip", { name: dirent.name, reason: describeError(err) });
          continue;
        }
        if (filter(entry)) session.insert(entry);
      }
      return session.items();
    });
  } finally {
    dir.closeSync();
  }
}
