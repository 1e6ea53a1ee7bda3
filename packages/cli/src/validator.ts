import { opendirSync, type Dir } from "fs";
import { GIT_MARKER } from "@repotrack/shared";
import type { RepoHealth, RepositoryRecord } from "@repotrack/shared";
import { DirectoryReadError, NotARepositoryError } from "./errors.js";

/**
 * Checks that `path` has a direct child named `.git`. Only the name is
 * compared, so the `.git` file of a linked worktree counts.
 *
 * @throws NotARepositoryError when the directory has no `.git` entry
 * @throws DirectoryReadError when the directory cannot be listed
 */
export function validateRepo(path: string): void {
  let dir: Dir;
  try {
    dir = opendirSync(path);
  } catch (err) {
    throw new DirectoryReadError(path, err);
  }

  try {
    for (let entry = dir.readSync(); entry !== null; entry = dir.readSync()) {
      if (entry.name === GIT_MARKER) return;
    }
  } catch (err) {
    throw new DirectoryReadError(path, err);
  } finally {
    dir.closeSync();
  }

  throw new NotARepositoryError(path);
}

export function isRepo(path: string): boolean {
  try {
    validateRepo(path);
    return true;
  } catch (err) {
    if (err instanceof NotARepositoryError) return false;
    throw err;
  }
}

export function checkRecord(record: Readonly<RepositoryRecord>): RepoHealth {
  try {
    return isRepo(record.path) ? "ok" : "not-a-repository";
  } catch (err) {
    if (err instanceof DirectoryReadError) return "unreachable";
    throw err;
  }
}
