import { RESERVED_ALIASES } from "@repotrack/shared";
import type { RegistryFile, RepositoryRecord } from "@repotrack/shared";
import { InvalidAliasError, RepoAlreadyExistsError, RepoDoesNotExistError } from "./errors.js";

export interface SkippedRecord {
  record: RepositoryRecord;
  error: RepoAlreadyExistsError | InvalidAliasError;
}

export interface BatchAddResult {
  added: RepositoryRecord[];
  skipped: SkippedRecord[];
}

/** Tracked repositories keyed by alias. Every key equals its record's name. */
export class Registry {
  private readonly repos = new Map<string, Readonly<RepositoryRecord>>();

  static fromFile(data: RegistryFile): Registry {
    const registry = new Registry();
    for (const record of Object.values(data.repos)) {
      registry.add(record);
    }
    return registry;
  }

  add(record: RepositoryRecord): void {
    if (RESERVED_ALIASES.includes(record.name)) {
      throw new InvalidAliasError(record.name);
    }
    if (this.repos.has(record.name)) {
      throw new RepoAlreadyExistsError(record.name);
    }
    this.repos.set(record.name, { name: record.name, path: record.path });
  }

  /**
   * Adds each record in turn. A name collision or reserved name skips that
   * record only; the rest of the batch is still added.
   */
  addAll(records: Iterable<RepositoryRecord>): BatchAddResult {
    const result: BatchAddResult = { added: [], skipped: [] };
    for (const record of records) {
      try {
        this.add(record);
        result.added.push(record);
      } catch (err) {
        if (!(err instanceof RepoAlreadyExistsError || err instanceof InvalidAliasError)) throw err;
        result.skipped.push({ record, error: err });
      }
    }
    return result;
  }

  remove(name: string): void {
    if (!this.repos.delete(name)) {
      throw new RepoDoesNotExistError(name);
    }
  }

  get(name: string): Readonly<RepositoryRecord> | undefined {
    return this.repos.get(name);
  }

  isEmpty(): boolean {
    return this.repos.size === 0;
  }

  get size(): number {
    return this.repos.size;
  }

  entries(): IterableIterator<[string, Readonly<RepositoryRecord>]> {
    return this.repos.entries();
  }

  list(): Readonly<RepositoryRecord>[] {
    return [...this.repos.values()];
  }

  toJSON(): RegistryFile {
    return { repos: Object.fromEntries(this.repos) };
  }
}
