/** Logical name of the tool; names the config file and its directory. */
export const CONFIG_NAME = "repotrack";

export const CONFIG_FILE = `${CONFIG_NAME}.json`;

/** Entry whose presence marks a directory as a git repository. */
export const GIT_MARKER = ".git";

/** Aliases that cannot survive a round trip through a JSON object key. */
export const RESERVED_ALIASES: readonly string[] = ["__proto__"];

export const ENV_CONFIG_PATH = "REPOTRACK_CONFIG";
export const ENV_DEBUG = "REPOTRACK_DEBUG";
