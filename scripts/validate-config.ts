#!/usr/bin/env tsx

/**
 * Validation script for config.yml
 *
 * Usage:
 *   npx tsx scripts/validate-config.ts [path/to/config.yml]
 *
 * Validates:
 * - YAML syntax
 * - Field types and allowed values
 * - Feed URLs, and that none is listed twice
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { CONFIG_PATH } from "../src/lib/constants";
import { parseConfig } from "../src/lib/load-config";
import type { KeeperConfig } from "../src/lib/types";

interface ValidationError {
  field: string;
  message: string;
}

function validateConfigFile(configPath: string): ValidationError[] {
  const errors: ValidationError[] = [];
  if (!existsSync(configPath)) {
    return [{ field: "file", message: "Config file does not exist" }];
  }

  let config: KeeperConfig;
  try {
    config = parseConfig(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return [{ field: "file", message: err instanceof Error ? err.message : String(err) }];
  }

  const seen = new Set<string>();
  config.feeds.forEach((feed, index) => {
    if (seen.has(feed.url)) {
      errors.push({ field: `feeds[${index}].url`, message: `Duplicate feed ${feed.url}` });
    }
    seen.add(feed.url);
  });

  return errors;
}

function main(): void {
  const configPath = process.argv[2] ? resolve(process.argv[2]) : CONFIG_PATH;
  console.log(`🔍 Validating ${configPath}...\n`);

  const errors = validateConfigFile(configPath);
  if (errors.length === 0) {
    console.log("✅ Configuration is valid!\n");
    process.exit(0);
  }

  console.error("❌ Validation errors found:\n");
  errors.forEach((error) => {
    console.error(`  Field: ${error.field}`);
    console.error(`  Error: ${error.message}\n`);
  });
  process.exit(1);
}

main();
