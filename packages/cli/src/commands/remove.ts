import { Command } from "commander";
import { log } from "../logger.js";
import { withRegistry } from "../store.js";
import { configPathFor } from "./options.js";

export function removeCommand(): Command {
  return new Command("remove")
    .description("Stop tracking a repository")
    .requiredOption("-n, --name <alias>", "Name of the tracked repository")
    .action((opts: { name: string }, command: Command) => {
      withRegistry(configPathFor(command), (registry) => {
        registry.remove(opts.name);
        log.success(`- Removed repo "${opts.name}"`);
      });
    });
}
