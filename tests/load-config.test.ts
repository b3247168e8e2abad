import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FeedAlreadyExistsError } from "../src/lib/errors";
import {
  addFeed,
  defaultDatabaseName,
  getFeeds,
  isPreviewMode,
  loadRuntime,
  parseConfig,
  resolveDatabasePath
} from "../src/lib/load-config";

describe("parseConfig", () => {
  it("applies defaults to an empty file", () => {
    expect(parseConfig("")).toEqual({
      database: "feedkeeper.db",
      ordering: "asc",
      showread: false,
      showfavourites: false,
      autoread: false,
      readicon: "✓",
      feeds: []
    });
  });

  it("reads every key", () => {
    const config = parseConfig(
      [
        "database: /var/lib/feedkeeper/items.db",
        "ordering: desc",
        "showread: true",
        "showfavourites: true",
        "autoread: true",
        "readicon: R",
        "feeds:",
        "  - url: https://example.com/feed1.xml",
        "    name: One",
        "  - url: https://example.com/feed2.xml"
      ].join("\n")
    );

    expect(config).toEqual({
      database: "/var/lib/feedkeeper/items.db",
      ordering: "desc",
      showread: true,
      showfavourites: true,
      autoread: true,
      readicon: "R",
      feeds: [{ url: "https://example.com/feed1.xml", name: "One" }, { url: "https://example.com/feed2.xml" }]
    });
  });

  it("lists every invalid field", () => {
    expect(() => parseConfig("feeds:\n  - url: not-a-url\nshowread: maybe")).toThrow(
      "Configuration is invalid:\n- showread: Expected boolean, received string\n- feeds.0.url: Invalid url"
    );
  });

  it("rejects an unknown ordering", () => {
    expect(() => parseConfig("ordering: sideways")).toThrow(/^Configuration is invalid:\n- ordering: /);
  });

  it("reports YAML syntax errors", () => {
    expect(() => parseConfig("feeds: [")).toThrow(/^Configuration is not valid YAML: /);
  });
});

describe("defaultDatabaseName", () => {
  it.each([
    ["config.yml", "config.db"],
    ["/path/to/myconfig.yml", "myconfig.db"],
    ["/path/to/work.yaml", "work.db"],
    ["relative/home.yml", "home.db"],
    ["/path/to/noext", "noext.db"],
    ["/path/to/my.feeds.yml", "my.feeds.db"]
  ])("%s → %s", (configPath, expected) => {
    expect(defaultDatabaseName(configPath)).toBe(expected);
  });
});

describe("loadRuntime", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "feedkeeper-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("resolves a directory to its config.yml", async () => {
    fs.writeFileSync(path.join(dir, "config.yml"), "database: items.db\n");
    const runtime = await loadRuntime({ configPath: dir });

    expect(runtime.configPath).toBe(path.join(dir, "config.yml"));
    expect(runtime.configDir).toBe(dir);
    expect(resolveDatabasePath(runtime)).toBe(path.join(dir, "items.db"));
  });

  it("names the database after the config file unless the file sets one", async () => {
    fs.writeFileSync(path.join(dir, "work.yml"), "ordering: desc\n");
    fs.writeFileSync(path.join(dir, "home.yml"), "");
    fs.writeFileSync(path.join(dir, "shared.yml"), "database: items.db\n");

    const work = await loadRuntime({ configPath: path.join(dir, "work.yml") });
    const home = await loadRuntime({ configPath: path.join(dir, "home.yml") });
    const shared = await loadRuntime({ configPath: path.join(dir, "shared.yml") });

    expect(work.config.database).toBe("work.db");
    expect(resolveDatabasePath(work)).toBe(path.join(dir, "work.db"));
    expect(resolveDatabasePath(home)).toBe(path.join(dir, "home.db"));
    expect(resolveDatabasePath(shared)).toBe(path.join(dir, "items.db"));
  });

  it("fails on a missing file unless asked to create it", async () => {
    const configPath = path.join(dir, "nested", "config.yml");
    await expect(loadRuntime({ configPath })).rejects.toThrow(`${configPath} is missing.`);

    const runtime = await loadRuntime({ configPath, create: true });
    expect(fs.readFileSync(configPath, "utf8")).toBe("");
    expect(runtime.config.feeds).toEqual([]);
  });

  it("switches to preview feeds when given", async () => {
    const configPath = path.join(dir, "config.yml");
    fs.writeFileSync(configPath, "feeds:\n  - url: https://example.com/feed1.xml\n");

    const normal = await loadRuntime({ configPath });
    expect(isPreviewMode(normal)).toBe(false);
    expect(getFeeds(normal)).toEqual([{ url: "https://example.com/feed1.xml" }]);

    const preview = await loadRuntime({ configPath, previewFeeds: ["https://example.com/preview.xml"] });
    expect(isPreviewMode(preview)).toBe(true);
    expect(getFeeds(preview)).toEqual([{ url: "https://example.com/preview.xml" }]);
  });

  it("adds a feed and writes it back", async () => {
    const configPath = path.join(dir, "config.yml");
    fs.writeFileSync(configPath, "ordering: desc\n");
    const runtime = await loadRuntime({ configPath });

    const updated = await addFeed(runtime, { url: "https://example.com/feed1.xml", name: "One" });
    expect(updated.config.feeds).toEqual([{ url: "https://example.com/feed1.xml", name: "One" }]);

    expect(fs.readFileSync(configPath, "utf8")).not.toContain("database:");
    const reloaded = await loadRuntime({ configPath });
    expect(reloaded.config.database).toBe("config.db");
    expect(reloaded.config.ordering).toBe("desc");
    expect(reloaded.config.feeds).toEqual([{ url: "https://example.com/feed1.xml", name: "One" }]);

    await expect(addFeed(reloaded, { url: "https://example.com/feed1.xml" })).rejects.toBeInstanceOf(
      FeedAlreadyExistsError
    );
  });
});
