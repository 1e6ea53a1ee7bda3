import { Command } from "commander";
import { formatEntry, formatHealth } from "../format.js";
import { log } from "../logger.js";
import { withRegistry } from "../store.js";
import { checkRecord } from "../validator.js";
import { configPathFor } from "./options.js";

export function listCommand(): Command {
  return new Command("list")
    .description("List tracked repositories")
    .option("-v, --verbose", "Check that each path still holds a repository")
    .action((opts: { verbose?: boolean }, command: Command) => {
      withRegistry(configPathFor(command), (registry) => {
        if (registry.isEmpty()) {
          log.info("No repos to show!");
          return;
        }
        for (const [alias, record] of registry.entries()) {
          log.info(formatEntry(alias, record));
          if (opts.verbose) log.info(formatHealth(checkRecord(record)));
        }
      });
    });
}
