/**
 * In-memory directory tree for aggregation tests.
 *
 * `MemoryDirectoryReader` is shaped like the core DirectoryReader port:
 * `readDirectory(path)` returns the children of a directory node or throws,
 * and every call is recorded in `reads`.
 */

export type MemoryFile = Readonly<{ kind: "file"; size: number }>;
export type MemoryDir = Readonly<{
  kind: "dir";
  children: Readonly<Record<string, MemoryNode>>;
  /** Reading this directory throws, as a permission error would. */
  unreadable: boolean;
}>;
export type MemoryNode = MemoryFile | MemoryDir;

export type MemoryChild = Readonly<{ path: string; isDirectory: boolean; sizeBytes: number }>;

export function memoryFile(size: number): MemoryFile {
  return Object.freeze({ kind: "file", size });
}

export function memoryDir(
  children: Readonly<Record<string, MemoryNode>> = {},
  opts: Readonly<{ unreadable?: boolean }> = {},
): MemoryDir {
  return Object.freeze({ kind: "dir", children, unreadable: opts.unreadable === true });
}

export class MemoryDirectoryReader {
  readonly reads: string[] = [];
  private readonly index = new Map<string, MemoryNode>();

  /** Index `root` so that its children live under `rootPath/<name>`. */
  constructor(rootPath: string, root: MemoryDir) {
    const stack: Array<readonly [string, MemoryNode]> = [[rootPath, root]];
    while (stack.length > 0) {
      const next = stack.pop();
      if (!next) break;
      const [path, node] = next;
      this.index.set(path, node);
      if (node.kind === "dir") {
        for (const [name, child] of Object.entries(node.children)) {
          stack.push([`${path}/${name}`, child]);
        }
      }
    }
  }

  readDirectory(path: string): readonly MemoryChild[] {
    this.reads.push(path);
    const node = this.index.get(path);
    if (node === undefined) throw new Error(`ENOENT: no such directory '${path}'`);
    if (node.kind !== "dir") throw new Error(`ENOTDIR: not a directory '${path}'`);
    if (node.unreadable) throw new Error(`EACCES: permission denied '${path}'`);
    return Object.entries(node.children).map(([name, child]) =>
      Object.freeze({
        path: `${path}/${name}`,
        isDirectory: child.kind === "dir",
        sizeBytes: child.kind === "file" ? child.size : 0,
      }),
    );
  }

  /** Node stored at `path`, if any. */
  lookup(path: string): MemoryNode | undefined {
    return this.index.get(path);
  }
}
