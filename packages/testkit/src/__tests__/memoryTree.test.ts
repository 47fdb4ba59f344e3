import { MemoryDirectoryReader, memoryDir, memoryFile } from "../memoryTree.js";
import { assert, describe, test } from "../nodeTest.js";
import { createRng } from "../rng.js";

describe("MemoryDirectoryReader", () => {
  const reader = () =>
    new MemoryDirectoryReader(
      "/t",
      memoryDir({
        "a.txt": memoryFile(4),
        sub: memoryDir({ "b.bin": memoryFile(9) }),
        locked: memoryDir({}, { unreadable: true }),
      }),
    );

  test("lists children with sizes", () => {
    const r = reader();
    assert.deepEqual(r.readDirectory("/t/sub"), [
      { path: "/t/sub/b.bin", isDirectory: false, sizeBytes: 9 },
    ]);
    assert.deepEqual(r.reads, ["/t/sub"]);
  });

  test("fails like a filesystem would", () => {
    const r = reader();
    assert.throws(() => r.readDirectory("/t/nope"), /ENOENT/u);
    assert.throws(() => r.readDirectory("/t/a.txt"), /ENOTDIR/u);
    assert.throws(() => r.readDirectory("/t/locked"), /EACCES/u);
  });
});

describe("createRng", () => {
  test("is deterministic per seed", () => {
    const a = createRng(3);
    const b = createRng(3);
    assert.deepEqual([a.next(), a.next()], [b.next(), b.next()]);
  });

  test("shuffle keeps every element", () => {
    const items = [1, 2, 3, 4, 5, 6];
    const shuffled = createRng(9).shuffle(items);
    assert.deepEqual(shuffled.slice().sort(), items);
    assert.deepEqual(items, [1, 2, 3, 4, 5, 6]);
  });
});
