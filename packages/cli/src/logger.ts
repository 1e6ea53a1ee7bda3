import chalk from "chalk";
import { loadSettings } from "./settings.js";

const debugEnabled = loadSettings().debug;

export const log = {
  success: (message: string) => {
    console.log(chalk.green(message));
  },
  info: (message: string) => {
    console.log(message);
  },
  warn: (message: string) => {
    console.warn(chalk.yellow(message));
  },
  error: (message: string) => {
    console.error(chalk.red(message));
  },
  debug: (message: string) => {
    if (debugEnabled) console.error(chalk.gray(`[debug] ${message}`));
  },
};
