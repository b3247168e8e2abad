import { beforeEach, describe, expect, it } from "vitest";
import YAML from "yaml";
import { Commands } from "../src/commands";
import { NotFoundError } from "../src/lib/errors";
import type { KeeperConfig, Runtime } from "../src/lib/types";
import { MemoryStore } from "../src/store/memory-store";
import { FEED_1, FEED_2, T0, candidate, createClock } from "./store-contract";

function runtimeWith(overrides: Partial<KeeperConfig> = {}): Runtime {
  return {
    configPath: "/tmp/feedkeeper/config.yml",
    configDir: "/tmp/feedkeeper",
    previewFeeds: [],
    config: {
      database: "feedkeeper.db",
      ordering: "asc",
      showread: false,
      showfavourites: false,
      autoread: false,
      readicon: "✓",
      feeds: [{ url: FEED_1, name: "One" }, { url: FEED_2 }],
      ...overrides
    }
  };
}

describe("Commands", () => {
  let store: MemoryStore;
  let lines: string[];

  function commands(overrides: Partial<KeeperConfig> = {}) {
    return new Commands(runtimeWith(overrides), store, (line) => lines.push(line));
  }

  beforeEach(() => {
    store = new MemoryStore({ now: createClock().now });
    lines = [];
    store.upsertItem(candidate({ guid: "a", title: "A", feedUrl: FEED_1, publishedAt: new Date("2024-05-01T10:00:00.000Z") }));
    store.upsertItem(candidate({ guid: "b", title: "B", feedUrl: FEED_2, publishedAt: new Date("2024-05-01T11:00:00.000Z") }));
    store.upsertItem(
      candidate({ guid: "c", title: "C", feedUrl: FEED_1, publishedAt: new Date("2024-05-01T12:00:00.000Z"), readAt: T0 })
    );
  });

  it("lists unread items grouped by feed", () => {
    commands().list();
    expect(lines).toEqual(["    1    2024-05-01 [One] A", `    2    2024-05-01 [${FEED_2}] B`]);
  });

  it("lists read items with showread", () => {
    commands({ showread: true }).list();
    expect(lines).toEqual([
      "    1    2024-05-01 [One] A",
      "    3 ✓  2024-05-01 [One] C",
      `    2    2024-05-01 [${FEED_2}] B`
    ]);
  });

  it("follows the configured ordering inside groups", () => {
    commands({ showread: true, ordering: "desc" }).list();
    expect(lines).toEqual([
      "    3 ✓  2024-05-01 [One] C",
      "    1    2024-05-01 [One] A",
      `    2    2024-05-01 [${FEED_2}] B`
    ]);
  });

  it("says so when nothing is visible", () => {
    store.markAllRead();
    commands().list();
    expect(lines).toEqual(["No items."]);
  });

  it("lists stored feeds with their configured names", () => {
    commands().feeds();
    expect(lines).toEqual([`One <${FEED_1}>`, FEED_2]);
  });

  it("counts unread items", () => {
    expect(commands().countUnread()).toBe(2);
  });

  it("marks an item read when shown with autoread", () => {
    commands({ autoread: true }).show(1);
    expect(lines[0].split("\n").slice(0, 2)).toEqual(["A", "One · 2024-05-01"]);
    expect(store.getItemById(1).readAt).toEqual(T0);
  });

  it("leaves read state alone without autoread", () => {
    commands().show(2);
    expect(store.getItemById(2).readAt).toBeNull();
  });

  it("passes state changes through to the store", () => {
    const cmds = commands();
    cmds.toggleFavourite(1);
    cmds.markRead(2);
    cmds.markUnread(3);
    cmds.toggleRead(1);
    expect(store.getAllItems().map((item) => [item.favourite, item.readAt])).toEqual([
      [true, T0],
      [false, T0],
      [false, null]
    ]);

    cmds.deleteFeed(FEED_1, false);
    expect(store.getAllItems().map((item) => item.id)).toEqual([1, 2]);
  });

  it("surfaces unknown ids", () => {
    expect(() => commands().show(99)).toThrow(NotFoundError);
  });

  it("prints the effective configuration as YAML", () => {
    commands({ ordering: "desc" }).showConfig();
    expect(lines).toHaveLength(1);
    expect(YAML.parse(lines[0])).toEqual({
      database: "feedkeeper.db",
      ordering: "desc",
      showread: false,
      showfavourites: false,
      autoread: false,
      readicon: "✓",
      feeds: [{ url: FEED_1, name: "One" }, { url: FEED_2 }]
    });
  });

  it("shows preview feeds in place of the configured ones", () => {
    const runtime: Runtime = { ...runtimeWith(), previewFeeds: [{ url: "https://example.com/preview.xml" }] };
    new Commands(runtime, store, (line) => lines.push(line)).showConfig();
    expect(YAML.parse(lines[0])).toMatchObject({ feeds: [{ url: "https://example.com/preview.xml" }] });
  });
});
