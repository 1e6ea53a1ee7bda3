import { basename, dirname, join, resolve } from "path";
import { existsSync } from "fs";
import { homedir } from "os";
import { CONFIG_FILE, CONFIG_NAME } from "@repotrack/shared";
import { NameExtractionError } from "./errors.js";
import { loadSettings } from "./settings.js";

export interface ConfigLookup {
  /** Path given on the command line. */
  explicit?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Flag, then REPOTRACK_CONFIG, then the nearest repotrack.json above the
 * working directory, then the per-user config directory.
 */
export function findConfigPath(lookup: ConfigLookup = {}): string {
  const cwd = lookup.cwd ?? process.cwd();
  const env = lookup.env ?? process.env;

  if (lookup.explicit) return resolve(cwd, lookup.explicit);

  const fromEnv = loadSettings(env).configPath;
  if (fromEnv) return resolve(cwd, fromEnv);

  let dir = resolve(cwd);
  while (dir) {
    const candidate = resolve(dir, CONFIG_FILE);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return join(userConfigDir(env), CONFIG_NAME, CONFIG_FILE);
}

function userConfigDir(env: NodeJS.ProcessEnv): string {
  return env.XDG_CONFIG_HOME || join(homedir(), ".config");
}

/** The directory's own name; throws when the path has no final component. */
export function deriveRepoName(path: string): string {
  const name = basename(path);
  if (name === "" || name === "." || name === "..") {
    throw new NameExtractionError(path);
  }
  return name;
}
