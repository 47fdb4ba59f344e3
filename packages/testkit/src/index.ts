export { createRng, type Rng } from "./rng.js";
export { assert, describe, test } from "./nodeTest.js";
export {
  FakeTerminal,
  stripAnsiCodes,
  type FakeTerminalOp,
  type FakeTerminalOptions,
} from "./fakeTerminal.js";
export {
  MemoryDirectoryReader,
  memoryDir,
  memoryFile,
  type MemoryChild,
  type MemoryDir,
  type MemoryFile,
  type MemoryNode,
} from "./memoryTree.js";
export { type TreeSpec, withTempDir, writeTree } from "./tempDir.js";
