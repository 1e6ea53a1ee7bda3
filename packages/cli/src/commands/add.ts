import { Command } from "commander";
import chalk from "chalk";
import { UsageError } from "../errors.js";
import { log } from "../logger.js";
import { withRegistry } from "../store.js";
import { trackDirectory, trackRepository } from "../tracker.js";
import { configPathFor } from "./options.js";

interface AddOptions {
  path?: string;
  alias?: string;
  dir?: string;
  nested: boolean;
}

export function addCommand(): Command {
  return new Command("add")
    .description("Track a git repository, or every repository under a directory")
    .option("-p, --path <path>", "Repository to track")
    .option("-a, --alias <alias>", "Name to track it under (defaults to the directory name)")
    .option("-d, --dir <dir>", "Scan a directory tree and track every repository in it")
    .option("--no-nested", "With --dir, do not look for repositories inside repositories")
    .action((opts: AddOptions, command: Command) => {
      checkAddOptions(opts);
      const configPath = configPathFor(command);

      withRegistry(configPath, (registry) => {
        if (opts.path !== undefined) {
          const record = trackRepository(registry, opts.path, opts.alias);
          log.success(`+ Added repo "${record.name}" (${record.path})`);
          return;
        }
        if (opts.dir === undefined) return;

        const { added, skipped, failures } = trackDirectory(registry, opts.dir, {
          descendIntoRepos: opts.nested,
          onFailure: ({ error }) => log.warn(error.message),
        });
        for (const record of added) {
          log.success(`+ Discovered: ${record.name} (${record.path})`);
        }
        for (const { record, error } of skipped) {
          log.warn(`${error.message} Skipped ${record.path}`);
        }
        const summary = `\nScan complete. ${added.length} added, ${skipped.length} skipped, ${failures.length} failed.`;
        log.info(chalk.bold(summary));
      });
    });
}

function checkAddOptions(opts: AddOptions): void {
  if ((opts.path === undefined) === (opts.dir === undefined)) {
    throw new UsageError("add: give exactly one of --path or --dir");
  }
  if (opts.dir !== undefined && opts.alias !== undefined) {
    throw new UsageError("add: --alias only applies to --path");
  }
}
