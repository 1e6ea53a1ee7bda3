import { readdirSync, type Dirent } from "fs";
import { join } from "path";
import { GIT_MARKER } from "@repotrack/shared";
import type { RepositoryRecord } from "@repotrack/shared";
import { DirectoryReadError, RepoError } from "./errors.js";
import { log } from "./logger.js";
import { deriveRepoName } from "./utils.js";
import { isRepo } from "./validator.js";

export interface ScanFailure {
  path: string;
  error: RepoError;
}

export interface ScanResult {
  repos: RepositoryRecord[];
  failures: ScanFailure[];
}

export interface ScanOptions {
  /** Keep walking below a directory that is itself a repository. Defaults to true. */
  descendIntoRepos?: boolean;
  onFailure?: (failure: ScanFailure) => void;
}

/**
 * Walks every directory under `root` (root included) and returns a record for
 * each one holding a `.git` entry, named after the directory itself.
 *
 * Uses an explicit stack, so visiting order across siblings is not defined.
 * Unreadable directories and unnameable paths are collected in `failures`
 * and the walk goes on.
 */
export function scanDirectory(root: string, options: ScanOptions = {}): ScanResult {
  const descendIntoRepos = options.descendIntoRepos ?? true;
  const result: ScanResult = { repos: [], failures: [] };

  const fail = (path: string, error: RepoError) => {
    const failure = { path, error };
    result.failures.push(failure);
    options.onFailure?.(failure);
  };

  const pending: string[] = [root];
  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    log.debug(`scanning ${dir}`);

    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      fail(dir, new DirectoryReadError(dir, err));
      continue;
    }

    const children: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory() && entry.name !== GIT_MARKER) {
        children.push(join(dir, entry.name));
      }
    }

    let repo = false;
    try {
      repo = isRepo(dir);
    } catch (err) {
      if (!(err instanceof RepoError)) throw err;
      fail(dir, err);
    }

    if (repo) {
      try {
        result.repos.push({ name: deriveRepoName(dir), path: dir });
      } catch (err) {
        if (!(err instanceof RepoError)) throw err;
        fail(dir, err);
      }
      if (!descendIntoRepos) continue;
    }

    pending.push(...children);
  }

  return result;
}
