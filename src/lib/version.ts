import { readFileSync } from "node:fs";
import { z } from "zod";

const packageSchema = z.object({ version: z.string().min(1) });

export function readVersion(): string {
  const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf8");
  return packageSchema.parse(JSON.parse(raw)).version;
}
