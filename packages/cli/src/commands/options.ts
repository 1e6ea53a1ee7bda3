import type { Command } from "commander";
import { findConfigPath } from "../utils.js";

export interface GlobalOptions {
  config?: string;
}

export function configPathFor(command: Command): string {
  return findConfigPath({ explicit: command.optsWithGlobals<GlobalOptions>().config });
}
