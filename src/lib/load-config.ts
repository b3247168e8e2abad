import fs from "node:fs/promises";
import path from "node:path";
import YAML, { YAMLParseError } from "yaml";
import { z } from "zod";
import {
  CONFIG_PATH,
  DEFAULT_CONFIG_FILE_NAME,
  DEFAULT_DATABASE_NAME,
  DEFAULT_ORDERING,
  DEFAULT_READ_ICON
} from "./constants";
import { FeedAlreadyExistsError } from "./errors";
import type { FeedConfig, KeeperConfig, Runtime } from "./types";

const feedSchema = z.object({
  url: z.string().url(),
  name: z.string().optional()
});

const configSchema = z.object({
  database: z.string().min(1).optional(),
  ordering: z.enum(["asc", "desc"]).default(DEFAULT_ORDERING),
  showread: z.boolean().default(false),
  showfavourites: z.boolean().default(false),
  autoread: z.boolean().default(false),
  readicon: z.string().min(1).default(DEFAULT_READ_ICON),
  feeds: z.array(feedSchema).default([])
});

export interface LoadRuntimeOptions {
  configPath?: string;
  previewFeeds?: string[];
  create?: boolean;
}

/**
 * Parses and validates a config file's text. `databaseName` fills in a
 * missing `database` key.
 */
export function parseConfig(raw: string, databaseName: string = DEFAULT_DATABASE_NAME): KeeperConfig {
  try {
    // an empty file parses to null
    const { database, ...rest } = configSchema.parse(YAML.parse(raw) ?? {});
    return { ...rest, database: database ?? databaseName };
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map((issue) => {
          const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
          return `- ${path}: ${issue.message}`;
        })
        .join("\n");
      throw new Error(`Configuration is invalid:\n${issues}`);
    }
    if (error instanceof YAMLParseError) {
      throw new Error(`Configuration is not valid YAML: ${error.message}`);
    }
    throw error;
  }
}

export async function loadRuntime(options: LoadRuntimeOptions = {}): Promise<Runtime> {
  const configPath = await resolveConfigPath(options.configPath ?? CONFIG_PATH);
  const raw = await readConfigFile(configPath, options.create ?? false);
  return {
    configPath,
    configDir: path.dirname(configPath),
    previewFeeds: (options.previewFeeds ?? []).map((url) => ({ url })),
    config: parseConfig(raw, defaultDatabaseName(configPath))
  };
}

/** `path/to/work.yml` → `work.db`, so configs side by side keep separate stores. */
export function defaultDatabaseName(configPath: string): string {
  return `${path.basename(configPath, path.extname(configPath))}.db`;
}

export function isPreviewMode(runtime: Runtime): boolean {
  return runtime.previewFeeds.length > 0;
}

export function getFeeds(runtime: Runtime): FeedConfig[] {
  return isPreviewMode(runtime) ? runtime.previewFeeds : runtime.config.feeds;
}

export function resolveDatabasePath(runtime: Runtime): string {
  return path.resolve(runtime.configDir, runtime.config.database);
}

export async function addFeed(runtime: Runtime, feed: FeedConfig): Promise<Runtime> {
  if (runtime.config.feeds.some((existing) => existing.url === feed.url)) {
    throw new FeedAlreadyExistsError(feed.url);
  }
  const next: Runtime = {
    ...runtime,
    config: { ...runtime.config, feeds: [...runtime.config.feeds, feed] }
  };
  await writeConfig(next);
  return next;
}

export async function writeConfig(runtime: Runtime): Promise<void> {
  const { database, ...rest } = runtime.config;
  // a database name derived from the file name stays implicit
  const config = database === defaultDatabaseName(runtime.configPath) ? rest : runtime.config;
  await fs.writeFile(runtime.configPath, YAML.stringify(config), "utf8");
}

async function resolveConfigPath(configPath: string): Promise<string> {
  try {
    const stat = await fs.stat(configPath);
    if (stat.isDirectory()) {
      return path.join(configPath, DEFAULT_CONFIG_FILE_NAME);
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
  }
  return configPath;
}

async function readConfigFile(configPath: string, create: boolean): Promise<string> {
  try {
    return await fs.readFile(configPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error;
    }
    if (!create) {
      throw new Error(`${configPath} is missing. Run with --create to start from an empty configuration.`);
    }
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, "", "utf8");
    return "";
  }
}
