import { resolve } from "node:path";

/**
 * Parsed command line, one variant per command.
 */
export type ParsedCommand =
  | { command: "analyze"; root: string; out?: string }
  | { command: "load"; document: string; dbPath?: string; clear: boolean }
  | { command: "build"; root: string; dbPath?: string; clear: boolean }
  | { command: "help" };

export const USAGE = `Usage: structgraph <command> [options]

Commands:
  analyze <root> [--out <file>]           Discover, analyze and resolve; print or write the analysis document
  load <document> [--db <path>] [--clear] Load an analysis document into the graph store
  build <root> [--db <path>] [--clear]    Analyze and load in one run

Options:
  --out <file>   Write the analysis document to a file instead of stdout
  --db <path>    SQLite database path (overrides structgraph.config.json)
  --clear        Empty the store before loading
  -h, --help     Show this message`;

/**
 * Invalid command line. The CLI prints the message and the usage, then exits with 1.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

interface RawArgs {
  positionals: string[];
  out?: string;
  dbPath?: string;
  clear: boolean;
  help: boolean;
}

const readArgs = (args: readonly string[]): RawArgs => {
  const result: RawArgs = { positionals: [], clear: false, help: false };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--clear") {
      result.clear = true;
    } else if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--out" || arg === "--db") {
      const nextArg = args[i + 1];
      if (nextArg === undefined || nextArg.startsWith("--")) {
        throw new UsageError(`${arg} requires a value`);
      }
      if (arg === "--out") {
        result.out = resolve(nextArg);
      } else {
        result.dbPath = resolve(nextArg);
      }
      i++;
    } else if (arg?.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (arg !== undefined) {
      result.positionals.push(arg);
    }

    i++;
  }

  return result;
};

const expectOnePositional = (
  command: string,
  name: string,
  positionals: readonly string[],
): string => {
  const [value, ...extra] = positionals;
  if (value === undefined) {
    throw new UsageError(`${command} requires <${name}>`);
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra.join(" ")}`);
  }
  return resolve(value);
};

/**
 * Parse `process.argv.slice(2)`.
 *
 * @throws UsageError on unknown commands, unknown options or missing values
 */
export const parseArgs = (args: readonly string[]): ParsedCommand => {
  const [command, ...rest] = args;
  if (command === undefined || command === "help") {
    return { command: "help" };
  }

  const raw = readArgs(rest);
  if (raw.help || command === "--help" || command === "-h") {
    return { command: "help" };
  }

  switch (command) {
    case "analyze":
      if (raw.dbPath !== undefined || raw.clear) {
        throw new UsageError("analyze does not take --db or --clear");
      }
      return {
        command,
        root: expectOnePositional(command, "root", raw.positionals),
        out: raw.out,
      };
    case "load":
    case "build": {
      if (raw.out !== undefined) {
        throw new UsageError(`${command} does not take --out`);
      }
      const target = expectOnePositional(
        command,
        command === "load" ? "document" : "root",
        raw.positionals,
      );
      return command === "load"
        ? { command, document: target, dbPath: raw.dbPath, clear: raw.clear }
        : { command, root: target, dbPath: raw.dbPath, clear: raw.clear };
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
};
