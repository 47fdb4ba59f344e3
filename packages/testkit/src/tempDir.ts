import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Files to create below a temp root: a string value is file content, `null`
 * an empty directory.
 */
export type TreeSpec = Readonly<Record<string, string | null>>;

export function writeTree(root: string, spec: TreeSpec): void {
  for (const [relative, content] of Object.entries(spec)) {
    const target = join(root, relative);
    if (content === null) {
      mkdirSync(target, { recursive: true });
      continue;
    }
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, "utf8");
  }
}

export async function withTempDir<T>(run: (dir: string) => Promise<T> | T): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), "ls-live-test-"));
  try {
    return await run(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
