export const COLORS = {
  reset: "\x1b[0m",
  info: "\x1b[36m",
  success: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  detail: "\x1b[90m"
} as const;

export const GLYPHS = {
  feed: "→",
  item: "•",
  favourite: "★",
  success: "✓",
  warn: "⚠",
  info: "ℹ",
  folder: "▸",
  stats: "≡"
} as const;

let verbose = false;

export function setVerbose(enabled: boolean) {
  verbose = enabled;
}

export function logInfo(icon: string, message: string) {
  console.log(`${COLORS.info}${icon}${COLORS.reset} ${message}`);
}

export function logDetail(icon: string, message: string) {
  console.log(`${COLORS.detail}${icon}${COLORS.reset} ${message}`);
}

export function logSuccess(message: string) {
  console.log(`${COLORS.success}${GLYPHS.success}${COLORS.reset} ${message}`);
}

export function logWarn(message: string) {
  console.warn(`${COLORS.warn}${GLYPHS.warn}${COLORS.reset} ${message}`);
}

export function logError(message: string, error?: unknown) {
  const detail = error instanceof Error ? error.message : error === undefined ? "" : String(error);
  console.error(`${COLORS.error}Error:${COLORS.reset} ${message}${detail ? ` (${detail})` : ""}`);
}

/** Printed only with --verbose. */
export function logVerbose(message: string) {
  if (verbose) {
    console.error(`${COLORS.detail}${GLYPHS.info} ${message}${COLORS.reset}`);
  }
}
