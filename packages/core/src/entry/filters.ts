import type { Entry } from "./entry.js";

/** Returns true for entries that should be listed. */
export type EntryFilter = (entry: Entry) => boolean;

export const everything: EntryFilter = () => true;
export const filesOnly: EntryFilter = (entry) => !entry.isDirectory;
export const directoriesOnly: EntryFilter = (entry) => entry.isDirectory;
