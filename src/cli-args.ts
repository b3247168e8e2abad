import { parseArgs } from "node:util";
import { UsageError } from "@/lib/errors";

export interface CommandLine {
  command: string;
  args: string[];
  config?: string;
  feeds: string[];
  create: boolean;
  includeFavourites: boolean;
  verbose: boolean;
  help: boolean;
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: "string", short: "c" },
      feed: { type: "string", short: "f", multiple: true },
      create: { type: "boolean", default: false },
      "include-favourites": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });
}

/** Unknown flags and missing option values become a `UsageError`. */
export function parseCommandLine(argv: string[]): CommandLine {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), { cause: error });
  }

  const { values, positionals } = parsed;
  const [command = "list", ...args] = positionals;
  return {
    command,
    args,
    ...(values.config ? { config: values.config } : {}),
    feeds: values.feed ?? [],
    create: values.create ?? false,
    includeFavourites: values["include-favourites"] ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false
  };
}
