import chalk from "chalk";
import type { RepoHealth, RepositoryRecord } from "@repotrack/shared";

export function formatRecord(record: Readonly<RepositoryRecord>): string {
  return `${record.name} (${record.path})`;
}

export function formatEntry(alias: string, record: Readonly<RepositoryRecord>): string {
  return `${chalk.bold(alias)} : ${formatRecord(record)}`;
}

export function formatHealth(health: RepoHealth): string {
  switch (health) {
    case "ok":
      return `  status: ${chalk.green("ok")}`;
    case "not-a-repository":
      return `  status: ${chalk.yellow("no .git entry")}`;
    case "unreachable":
      return `  status: ${chalk.red("path unreadable")}`;
  }
}
