import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { RegistryStore, withRegistry } from "../store.js";
import { Registry } from "../registry.js";
import { ConfigStoreError, UsageError } from "../errors.js";
import { makeTempDir } from "./helpers.js";

describe("RegistryStore", () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = makeTempDir();
    configPath = join(testDir, "repotrack.json");
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("loads an empty registry when the file is missing", () => {
    const registry = new RegistryStore(configPath).load();
    expect(registry.isEmpty()).toBe(true);
    expect(existsSync(configPath)).toBe(false);
  });

  it("round-trips aliases, names and paths", () => {
    const store = new RegistryStore(configPath);
    const registry = new Registry();
    registry.add({ name: "api", path: "/src/api" });
    registry.add({ name: "web app", path: "/src/with space/web" });
    store.save(registry);

    expect(store.load().toJSON()).toEqual(registry.toJSON());
  });

  it("writes pretty JSON with a trailing newline", () => {
    const store = new RegistryStore(configPath);
    const registry = new Registry();
    registry.add({ name: "api", path: "/src/api" });
    store.save(registry);

    expect(readFileSync(configPath, "utf-8")).toBe(
      '{\n  "repos": {\n    "api": {\n      "name": "api",\n      "path": "/src/api"\n    }\n  }\n}\n',
    );
  });

  it("creates the parent directory on save", () => {
    const nested = join(testDir, "config", "repotrack", "repotrack.json");
    new RegistryStore(nested).save(new Registry());
    expect(JSON.parse(readFileSync(nested, "utf-8"))).toEqual({ repos: {} });
  });

  it("rejects a file that is not JSON", () => {
    writeFileSync(configPath, "repos = {}");
    expect(() => new RegistryStore(configPath).load()).toThrow(ConfigStoreError);
  });

  it("rejects an entry whose name differs from its alias", () => {
    writeFileSync(
      configPath,
      JSON.stringify({ repos: { api: { name: "web", path: "/src/web" } } }),
    );
    expect(() => new RegistryStore(configPath).load()).toThrow(
      `Config ${configPath} is invalid at repos.api.name: Entry "api" is named "web"`,
    );
  });

  it("refuses a reserved alias instead of dropping it on load", () => {
    writeFileSync(
      configPath,
      '{"repos":{"__proto__":{"name":"__proto__","path":"/src/proto"},"api":{"name":"api","path":"/src/api"}}}',
    );
    const store = new RegistryStore(configPath);
    expect(() => store.load()).toThrow(ConfigStoreError);
    expect(() => store.load()).toThrow("Reserved name cannot be used as a repo alias");
  });

  it("keeps every saved alias across a save and load", () => {
    const store = new RegistryStore(configPath);
    const registry = new Registry();
    registry.addAll([
      { name: "__proto__", path: "/src/proto" },
      { name: "api", path: "/src/api" },
      { name: "web", path: "/src/web" },
    ]);
    store.save(registry);

    const reloaded = store.load();
    expect(reloaded.size).toBe(registry.size);
    expect(reloaded.toJSON()).toEqual(registry.toJSON());
  });

  it("reports a config path that cannot be written", () => {
    writeFileSync(join(testDir, "blocker"), "");
    const store = new RegistryStore(join(testDir, "blocker", "repotrack.json"));
    expect(() => store.save(new Registry())).toThrow(ConfigStoreError);
  });
});

describe("withRegistry", () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = makeTempDir();
    configPath = join(testDir, "repotrack.json");
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it("saves what the action changed", () => {
    withRegistry(configPath, (registry) => {
      registry.add({ name: "api", path: "/src/api" });
    });
    expect(new RegistryStore(configPath).load().get("api")).toEqual({ name: "api", path: "/src/api" });
  });

  it("reports a per-command error and still saves", () => {
    withRegistry(configPath, (registry) => {
      registry.add({ name: "api", path: "/src/api" });
      registry.remove("missing");
    });

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0][0]).toContain('No repo named "missing".');
    expect(new RegistryStore(configPath).load().size).toBe(1);
  });

  it("rethrows fatal errors", () => {
    expect(() =>
      withRegistry(configPath, () => {
        throw new UsageError("bad flags");
      }),
    ).toThrow(UsageError);
  });

  it("does not touch the config when it cannot be loaded", () => {
    writeFileSync(configPath, "{");
    const action = vi.fn();
    expect(() => withRegistry(configPath, action)).toThrow(ConfigStoreError);
    expect(action).not.toHaveBeenCalled();
    expect(readFileSync(configPath, "utf-8")).toBe("{");
  });
});
