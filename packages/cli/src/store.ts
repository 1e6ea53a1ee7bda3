import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { RegistryFileSchema } from "@repotrack/shared";
import { ConfigStoreError, RepoError, describeError } from "./errors.js";
import { log } from "./logger.js";
import { Registry } from "./registry.js";

/** Whole-file JSON persistence of a Registry. */
export class RegistryStore {
  constructor(readonly configPath: string) {}

  load(): Registry {
    if (!existsSync(this.configPath)) {
      log.debug(`no config at ${this.configPath}, starting empty`);
      return new Registry();
    }

    let raw: string;
    try {
      raw = readFileSync(this.configPath, "utf-8");
    } catch (err) {
      throw new ConfigStoreError(
        `Cannot read config ${this.configPath}: ${describeError(err)}`,
        this.configPath,
        err,
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigStoreError(
        `Config ${this.configPath} is not valid JSON: ${describeError(err)}`,
        this.configPath,
        err,
      );
    }

    const parsed = RegistryFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigStoreError(
        `Config ${this.configPath} is invalid at ${issue.path.join(".") || "<root>"}: ${issue.message}`,
        this.configPath,
        parsed.error,
      );
    }
    return Registry.fromFile(parsed.data);
  }

  save(registry: Registry): void {
    try {
      mkdirSync(dirname(this.configPath), { recursive: true });
      writeFileSync(this.configPath, JSON.stringify(registry.toJSON(), null, 2) + "\n");
    } catch (err) {
      throw new ConfigStoreError(
        `Cannot write config ${this.configPath}: ${describeError(err)}`,
        this.configPath,
        err,
      );
    }
    log.debug(`saved ${registry.size} repos to ${this.configPath}`);
  }
}

/**
 * Loads the registry, runs `action` on it and writes it back. Non-fatal
 * errors thrown by the action are reported on stderr; the registry is saved
 * either way.
 */
export function withRegistry(configPath: string, action: (registry: Registry) => void): void {
  const store = new RegistryStore(configPath);
  const registry = store.load();
  try {
    action(registry);
  } catch (err) {
    if (!(err instanceof RepoError) || err.fatal) throw err;
    log.error(err.message);
  } finally {
    store.save(registry);
  }
}
