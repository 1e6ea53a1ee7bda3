import { resolve } from "path";
import type { RepositoryRecord } from "@repotrack/shared";
import type { Registry, SkippedRecord } from "./registry.js";
import { deriveRepoName } from "./utils.js";
import { validateRepo } from "./validator.js";
import { scanDirectory, type ScanFailure, type ScanOptions } from "./walker.js";

export function trackRepository(registry: Registry, path: string, alias?: string): RepositoryRecord {
  const fullPath = resolve(path);
  validateRepo(fullPath);
  const record = { name: alias || deriveRepoName(fullPath), path: fullPath };
  registry.add(record);
  return record;
}

export interface TrackDirectoryResult {
  added: RepositoryRecord[];
  skipped: SkippedRecord[];
  failures: ScanFailure[];
}

export function trackDirectory(
  registry: Registry,
  root: string,
  options: ScanOptions = {},
): TrackDirectoryResult {
  const { repos, failures } = scanDirectory(resolve(root), options);
  const { added, skipped } = registry.addAll(repos);
  return { added, skipped, failures };
}
