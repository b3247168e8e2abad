import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Runtime } from "../src/lib/types";
import { MemoryStore } from "../src/store/memory-store";
import { openStore } from "../src/store/open-store";
import { SqliteStore } from "../src/store/sqlite-store";

describe("openStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "feedkeeper-open-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function runtime(previewFeeds: Runtime["previewFeeds"]): Runtime {
    return {
      configPath: path.join(dir, "config.yml"),
      configDir: dir,
      previewFeeds,
      config: {
        database: path.join("data", "items.db"),
        ordering: "asc",
        showread: false,
        showfavourites: false,
        autoread: false,
        readicon: "✓",
        feeds: []
      }
    };
  }

  it("uses memory for previews", () => {
    const store = openStore(runtime([{ url: "https://example.com/feed.xml" }]));
    expect(store).toBeInstanceOf(MemoryStore);
    expect(fs.existsSync(path.join(dir, "data"))).toBe(false);
    store.close();
  });

  it("opens the database next to the config otherwise", () => {
    const store = openStore(runtime([]));
    expect(store).toBeInstanceOf(SqliteStore);
    expect(fs.existsSync(path.join(dir, "data", "items.db"))).toBe(true);
    store.close();
  });
});
