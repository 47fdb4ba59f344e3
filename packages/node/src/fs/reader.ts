/**
 * packages/node/src/fs/reader.ts: Filesystem access for entries.
 *
 * Listed entries follow symbolic links: a link to a directory is shown and
 * aggregated as that directory. Inside the aggregation walk, directory
 * detection uses the Dirent type, which never follows links, so a cycle of
 * links cannot loop.
 */

import { type Dirent, type Stats, lstatSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import {
  type DirectoryChild,
  type DirectoryReader,
  type Entry,
  createEntry,
} from "@ls-live/core";

export const nodeDirectoryReader: DirectoryReader = Object.freeze({
  readDirectory(path: string): readonly DirectoryChild[] {
    const children: DirectoryChild[] = [];
    for (const dirent of readdirSync(path, { withFileTypes: true })) {
      const childPath = join(path, dirent.name);
      if (dirent.isDirectory()) {
        children.push({ path: childPath, isDirectory: true, sizeBytes: 0 });
      } else {
        children.push({ path: childPath, isDirectory: false, sizeBytes: lstatSync(childPath).size });
      }
    }
    return children;
  },
});

/** Follows links for metadata; a dangling link reports its own metadata. */
function statEntry(path: string): Stats {
  try {
    return statSync(path);
  } catch {
    return lstatSync(path);
  }
}

/** Filesystems without birth times report 0. */
function creationTimeMs(stats: Stats): number {
  return stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
}

export function createNodeEntry(
  parent: string,
  dirent: Dirent,
  reader: DirectoryReader = nodeDirectoryReader,
): Entry {
  const path = join(parent, dirent.name);
  const stats = statEntry(path);
  return createEntry(
    {
      name: dirent.name,
      path,
      isDirectory: stats.isDirectory(),
      creationTimeMs: creationTimeMs(stats),
      modificationTimeMs: stats.mtimeMs,
      sizeBytes: stats.size,
    },
    reader,
  );
}
