#!/usr/bin/env tsx
import path from "node:path";
import process from "node:process";
import ora, { type Ora } from "ora";
import { parseCommandLine, type CommandLine } from "../src/cli-args";
import { Commands } from "../src/commands";
import { UsageError } from "../src/lib/errors";
import { isPreviewMode, loadRuntime } from "../src/lib/load-config";
import { COLORS, GLYPHS, logDetail, logError, logInfo, logSuccess, logWarn, setVerbose } from "../src/lib/log";
import { readVersion } from "../src/lib/version";
import { openStore } from "../src/store/open-store";
import type { RefreshResult } from "../src/lib/types";
import type { Store } from "../src/store/store";

const USAGE = `Usage: feedkeeper [options] <command>

Commands:
  list                          List items
  unread                        Print the number of unread items
  feeds                         List feed URLs present in the store
  show <id>                     Print one item
  read <id>                     Mark an item read
  unread-item <id>              Mark an item unread
  toggle-read <id>              Flip an item's read state
  favourite <id>                Flip an item's favourite flag
  mark-all-read                 Mark every item read
  delete-feed <url>             Delete a feed's items (favourites are kept
                                unless --include-favourites is given)
  refresh                       Fetch feeds and store new items
  add <url> [name]              Add a feed to the configuration
  config                        Print the effective configuration as YAML
  version                       Print the version

Options:
  -c, --config <path>           Config file or directory (env FEEDKEEPER_CONFIG)
  -f, --feed <url>              Preview a feed without touching the database (repeatable)
      --create                  Create the config file if it does not exist
      --include-favourites      With delete-feed, delete favourites as well
  -v, --verbose                 Verbose logging
  -h, --help                    Show this help`;

async function main() {
  let line: CommandLine;
  try {
    line = parseCommandLine(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) {
      throw error;
    }
    logError("Invalid arguments", error);
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }
  if (line.help) {
    console.log(USAGE);
    return;
  }
  setVerbose(line.verbose);

  const { command, args } = line;
  if (command === "version") {
    console.log(`feedkeeper ${readVersion()}`);
    return;
  }

  let store: Store | null = null;
  try {
    const runtime = await loadRuntime({
      configPath: line.config,
      previewFeeds: line.feeds,
      create: line.create
    });
    store = openStore(runtime);
    const commands = new Commands(runtime, store);

    if (isPreviewMode(runtime) && command !== "refresh" && command !== "config") {
      await refresh(commands);
    }

    switch (command) {
      case "list":
        commands.list();
        break;
      case "unread":
        console.log(String(commands.countUnread()));
        break;
      case "feeds":
        commands.feeds();
        break;
      case "config":
        commands.showConfig();
        break;
      case "show":
        commands.show(parseId(args[0]));
        break;
      case "read":
        commands.markRead(parseId(args[0]));
        break;
      case "unread-item":
        commands.markUnread(parseId(args[0]));
        break;
      case "toggle-read":
        commands.toggleRead(parseId(args[0]));
        break;
      case "favourite":
        commands.toggleFavourite(parseId(args[0]));
        break;
      case "mark-all-read":
        commands.markAllRead();
        logSuccess("All items marked read");
        break;
      case "delete-feed":
        commands.deleteFeed(requireArg(args[0], "feed URL"), line.includeFavourites);
        logSuccess(`Deleted items of ${args[0]}`);
        break;
      case "refresh":
        await refresh(commands);
        break;
      case "add":
        await commands.add({ url: requireArg(args[0], "feed URL"), ...(args[1] ? { name: args[1] } : {}) });
        logSuccess(`Added ${args[0]}`);
        logDetail(GLYPHS.folder, path.relative(process.cwd(), runtime.configPath));
        break;
      default:
        console.error(USAGE);
        process.exitCode = 2;
    }
  } catch (error) {
    logError(`${command} failed`, error);
    process.exitCode = 1;
  } finally {
    store?.close();
  }
}

async function refresh(commands: Commands): Promise<void> {
  const spinner: Ora = ora("Fetching feeds...").start();
  let results: RefreshResult[];
  try {
    results = await commands.refresh({
      onProgress: (result, done, total) => {
        spinner.text = `Fetching feeds (${done}/${total}) - ${result.feedUrl}`;
      }
    });
  } catch (error) {
    spinner.fail("Refresh failed");
    throw error;
  }
  const total = results.reduce((acc, result) => acc + result.count, 0);
  spinner.succeed(`Fetched ${results.length} feeds - ${total} entries`);
  for (const result of results) {
    if (result.error) {
      logWarn(`Feed appears dead: ${result.feedUrl} (${result.error})`);
    } else {
      logInfo(GLYPHS.feed, `${result.feedUrl} ${COLORS.detail}${result.count} entries${COLORS.reset}`);
    }
  }
}

function parseId(value: string | undefined): number {
  const id = Number(requireArg(value, "item id"));
  if (!Number.isInteger(id) || id < 1) {
    throw new Error(`invalid item id: ${value}`);
  }
  return id;
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`missing ${name}`);
  }
  return value;
}

void main();
