import {
  MemoryDirectoryReader,
  assert,
  createRng,
  describe,
  memoryDir,
  memoryFile,
  test,
} from "@ls-live/testkit";
import { type Entry, createEntry } from "../../entry/entry.js";
import { isLsLiveError } from "../../errors.js";
import {
  type SortKey,
  byCreationTime,
  byExtension,
  byName,
  bySize,
  bySubfileCount,
  compareTuples,
  insertionIndex,
  reverseKey,
  sortKeyForCode,
} from "../sortKey.js";

const reader = new MemoryDirectoryReader(
  "/r",
  memoryDir({
    A: memoryDir({ "one.txt": memoryFile(3) }),
    a: memoryDir({ "x.bin": memoryFile(100), "y.bin": memoryFile(100) }),
    locked: memoryDir({}, { unreadable: true }),
  }),
);

function file(name: string, sizeBytes: number, ctime = 0): Entry {
  return createEntry(
    {
      name,
      path: `/r/${name}`,
      isDirectory: false,
      creationTimeMs: ctime,
      modificationTimeMs: ctime,
      sizeBytes,
    },
    reader,
  );
}

function dir(name: string, ctime = 0): Entry {
  return createEntry(
    {
      name,
      path: `/r/${name}`,
      isDirectory: true,
      creationTimeMs: ctime,
      modificationTimeMs: ctime,
      sizeBytes: 0,
    },
    reader,
  );
}

function sortByInsertion(entries: readonly Entry[], key: SortKey<Entry>): string[] {
  const out: Entry[] = [];
  for (const entry of entries) {
    out.splice(insertionIndex(out, entry, key, (e) => e), 0, entry);
  }
  return out.map((e) => e.displayPath);
}

function sample(): Entry[] {
  return [
    file("b.txt", 10, 5),
    dir("A", 9),
    file("a.txt", 5, 5),
    dir("a", 1),
    file("B.txt", 7, 2),
    dir("locked", 3),
  ];
}

describe("compareTuples", () => {
  test("compares element-wise, numbers numerically", () => {
    assert.equal(compareTuples([2, "a"], [10, "a"]) < 0, true);
    assert.equal(compareTuples([1, "b"], [1, "a"]) > 0, true);
    assert.equal(compareTuples([1, "a"], [1, "a"]), 0);
  });

  test("a strict prefix sorts first; false sorts before true", () => {
    assert.equal(compareTuples([1], [1, 0]) < 0, true);
    assert.equal(compareTuples([false], [true]) < 0, true);
  });
});

describe("entry sort keys", () => {
  test("name: directories first, then case-folded name, then exact name", () => {
    assert.deepEqual(sortByInsertion(sample(), byName), [
      "A/",
      "a/",
      "locked/",
      "a.txt",
      "B.txt",
      "b.txt",
    ]);
  });

  test("name folding expands sharp s", () => {
    assert.deepEqual(sortByInsertion([file("ssb", 1), file("ßa", 1)], byName), ["ßa", "ssb"]);
    assert.deepEqual(sortByInsertion([file("ßa", 1), file("ssb", 1)], byName), ["ßa", "ssb"]);
  });

  test("arrival order does not change the result", () => {
    const rng = createRng(7);
    const expected = sortByInsertion(sample(), byName);
    for (let round = 0; round < 25; round++) {
      assert.deepEqual(sortByInsertion(rng.shuffle(sample()), byName), expected);
    }
  });

  test("size: failed aggregation sorts as the smallest size", () => {
    assert.deepEqual(sortByInsertion(sample(), bySize), [
      "locked/",
      "A/",
      "a.txt",
      "B.txt",
      "b.txt",
      "a/",
    ]);
  });

  test("sub-file count: files before failed directories before real counts", () => {
    assert.deepEqual(sortByInsertion(sample(), bySubfileCount), [
      "a.txt",
      "B.txt",
      "b.txt",
      "locked/",
      "A/",
      "a/",
    ]);
  });

  test("creation time ties fall back to the name order", () => {
    assert.deepEqual(sortByInsertion(sample(), byCreationTime), [
      "a/",
      "B.txt",
      "locked/",
      "a.txt",
      "b.txt",
      "A/",
    ]);
  });

  test("extension: directories have none and sort first", () => {
    const entries = [file("z.md", 1), file("y.TS", 1), file("x.ts", 1), dir("A")];
    assert.deepEqual(sortByInsertion(entries, byExtension), ["A/", "z.md", "y.TS", "x.ts"]);
  });
});

describe("reverseKey", () => {
  test("yields the exact reversal of the forward order", () => {
    const keys = [byName, bySize, bySubfileCount, byCreationTime];
    for (const key of keys) {
      const forward = sortByInsertion(sample(), key);
      const reversed = sortByInsertion(sample(), reverseKey(key));
      assert.deepEqual(reversed, forward.slice().reverse(), key.id);
    }
  });

  test("inverts the comparison result rather than the values", () => {
    const a = file("a.txt", 1);
    const b = file("b.txt", 1);
    const reversed = reverseKey(bySize);
    assert.equal(bySize.less(a, b), true);
    assert.equal(reversed.less(a, b), false);
    assert.equal(reversed.less(b, a), true);
  });

  test("reversing twice restores the forward order", () => {
    const twice = reverseKey(reverseKey(byName));
    assert.deepEqual(sortByInsertion(sample(), twice), sortByInsertion(sample(), byName));
  });
});

describe("sortKeyForCode", () => {
  test("maps codes to keys and applies reversal", () => {
    assert.equal(sortKeyForCode("n").id, "name");
    assert.equal(sortKeyForCode("nf").id, "subfiles");
    assert.equal(sortKeyForCode("s", true).id, "-size");
  });

  test("rejects unknown codes", () => {
    assert.throws(
      () => sortKeyForCode("q"),
      (err: unknown) => isLsLiveError(err, "LSL_INVALID_ARGUMENT"),
    );
  });
});
