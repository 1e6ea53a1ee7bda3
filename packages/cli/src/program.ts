import { Command } from "commander";
import { addCommand } from "./commands/add.js";
import { removeCommand } from "./commands/remove.js";
import { listCommand } from "./commands/list.js";
import { showCommand } from "./commands/show.js";

export function createProgram(): Command {
  const program = new Command()
    .name("repotrack")
    .description("Keep track of the git repositories on this machine")
    .version("0.1.0")
    .option("-c, --config <file>", "Config file to use");

  program.addCommand(addCommand());
  program.addCommand(removeCommand());
  program.addCommand(listCommand());
  program.addCommand(showCommand());

  return program;
}
