/**
 * packages/core/src/ordering/sortKey.ts: Total orders over entries.
 *
 * Every entry key ends with the name tiebreak (directories first, lower-cased
 * name, exact name), so two distinct entries of one directory never tie.
 *
 * Reversal inverts the relational result of `less`. Negating a numeric
 * component instead would leave the string tiebreak ascending.
 */

import type { Entry } from "../entry/entry.js";
import { LsLiveError } from "../errors.js";

export type SortTupleValue = number | string | boolean;
export type SortTuple = readonly SortTupleValue[];

/** Strict ordering: `less(a, b)` is true when `a` sorts before `b`. */
export type SortKey<T> = Readonly<{
  id: string;
  less: (a: T, b: T) => boolean;
}>;

function compareValues(a: SortTupleValue, b: SortTupleValue): number {
  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Lexicographic comparison; a strict prefix sorts first. */
export function compareTuples(a: SortTuple, b: SortTuple): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const av = a[i];
    const bv = b[i];
    if (av === undefined || bv === undefined) break;
    const c = compareValues(av, bv);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

export function tupleKey<T>(id: string, toTuple: (value: T) => SortTuple): SortKey<T> {
  return Object.freeze({
    id,
    less: (a: T, b: T) => compareTuples(toTuple(a), toTuple(b)) < 0,
  });
}

export function reverseKey<T>(key: SortKey<T>): SortKey<T> {
  return Object.freeze({
    id: `-${key.id}`,
    less: (a: T, b: T) => !key.less(a, b),
  });
}

/** Full case folding: the round trip through upper case expands ß to ss. */
function caseFold(text: string): string {
  return text.toUpperCase().toLowerCase();
}

export function nameTuple(entry: Entry): SortTuple {
  return [entry.isDirectory ? 0 : 1, caseFold(entry.name), entry.name];
}

export const byName: SortKey<Entry> = tupleKey("name", nameTuple);

export const byExtension: SortKey<Entry> = tupleKey("extension", (e) => [
  caseFold(e.extension),
  e.extension,
  ...nameTuple(e),
]);

export const byCreationTime: SortKey<Entry> = tupleKey("ctime", (e) => [
  e.creationTimeMs,
  ...nameTuple(e),
]);

export const byModificationTime: SortKey<Entry> = tupleKey("mtime", (e) => [
  e.modificationTimeMs,
  ...nameTuple(e),
]);

export const bySize: SortKey<Entry> = tupleKey("size", (e) => [e.sizeBytes, ...nameTuple(e)]);

export const bySubfileCount: SortKey<Entry> = tupleKey("subfiles", (e) => [
  e.subfileCount,
  ...nameTuple(e),
]);

export const bySubdirCount: SortKey<Entry> = tupleKey("subdirs", (e) => [
  e.subdirCount,
  ...nameTuple(e),
]);

export const SORT_KEY_CODES = Object.freeze(["n", "c", "m", "nf", "nd", "s", "e"] as const);
export type SortKeyCode = (typeof SORT_KEY_CODES)[number];

const KEYS_BY_CODE: Readonly<Record<SortKeyCode, SortKey<Entry>>> = Object.freeze({
  n: byName,
  c: byCreationTime,
  m: byModificationTime,
  nf: bySubfileCount,
  nd: bySubdirCount,
  s: bySize,
  e: byExtension,
});

export function isSortKeyCode(value: string): value is SortKeyCode {
  return SORT_KEY_CODES.some((code) => code === value);
}

export function sortKeyForCode(code: string, reverse = false): SortKey<Entry> {
  if (!isSortKeyCode(code)) {
    throw new LsLiveError(
      "LSL_INVALID_ARGUMENT",
      `unknown sort key "${code}" (expected one of ${SORT_KEY_CODES.join(", ")})`,
    );
  }
  const key = KEYS_BY_CODE[code];
  return reverse ? reverseKey(key) : key;
}

/**
 * First index whose element does not sort before `value`.
 * O(log n) calls to `key.less`.
 */
export function insertionIndex<T, U>(
  items: readonly U[],
  value: T,
  key: SortKey<T>,
  select: (item: U) => T,
): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const item = items[mid];
    if (item !== undefined && key.less(select(item), value)) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
