import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { tmpdir } from "os";

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "repotrack-test-"));
}

/**
 * Creates each path under `root`. A path ending in "/" is a directory;
 * anything else is an empty file. `a/.git/` makes `a` a repository,
 * `a/.git` makes it a linked worktree.
 */
export function makeTree(root: string, paths: string[]): void {
  for (const path of paths) {
    const full = join(root, path);
    if (path.endsWith("/")) {
      mkdirSync(full, { recursive: true });
    } else {
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, "");
    }
  }
}
