import { Command } from "commander";
import { formatEntry, formatHealth } from "../format.js";
import { log } from "../logger.js";
import { withRegistry } from "../store.js";
import { checkRecord } from "../validator.js";
import { configPathFor } from "./options.js";

export function showCommand(): Command {
  return new Command("show")
    .description("Show one tracked repository")
    .requiredOption("-n, --name <alias>", "Name of the tracked repository")
    .option("-v, --verbose", "Check that the path still holds a repository")
    .action((opts: { name: string; verbose?: boolean }, command: Command) => {
      withRegistry(configPathFor(command), (registry) => {
        const record = registry.get(opts.name);
        if (!record) {
          log.warn(`No repo named "${opts.name}".`);
          return;
        }
        log.info(formatEntry(opts.name, record));
        if (opts.verbose) log.info(formatHealth(checkRecord(record)));
      });
    });
}
