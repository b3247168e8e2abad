import path from "node:path";
import type { Ordering } from "./types";

export const ROOT_DIR = process.cwd();
export const DEFAULT_CONFIG_FILE_NAME = "config.yml";
export const DEFAULT_DATABASE_NAME = "feedkeeper.db";
export const CONFIG_PATH = process.env.FEEDKEEPER_CONFIG ?? path.resolve(ROOT_DIR, DEFAULT_CONFIG_FILE_NAME);

export const ASCENDING_ORDERING: Ordering = "asc";
export const DESCENDING_ORDERING: Ordering = "desc";
export const DEFAULT_ORDERING: Ordering = ASCENDING_ORDERING;

export const DEFAULT_READ_ICON = "✓";
