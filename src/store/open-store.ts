import fs from "node:fs";
import path from "node:path";
import { isPreviewMode, resolveDatabasePath } from "@/lib/load-config";
import { logVerbose } from "@/lib/log";
import type { Runtime } from "@/lib/types";
import { MemoryStore } from "./memory-store";
import { SqliteStore } from "./sqlite-store";
import type { Store, StoreOptions } from "./store";

/**
 * Picks the backend for a session: previewing feeds from the command line
 * never touches the database file.
 */
export function openStore(runtime: Runtime, options: StoreOptions = {}): Store {
  if (isPreviewMode(runtime)) {
    logVerbose("preview mode: using in-memory store");
    return new MemoryStore(options);
  }
  const databasePath = resolveDatabasePath(runtime);
  fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  logVerbose(`opening ${databasePath}`);
  return SqliteStore.open(databasePath, options);
}
