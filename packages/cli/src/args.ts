/**
 * Command-line argument parsing for `combjson`.
 */

import type { LeadingZeros } from "@combjson/json";
import type { OutputFormat } from "./config.js";

export interface CliOptions {
  /** Input path; absent or `-` reads stdin. */
  file?: string;
  out?: string;
  format?: OutputFormat;
  maxDepth?: number;
  leadingZeros?: LeadingZeros;
  verbose: boolean;
  help: boolean;
}

/** The command line could not be understood. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = "Usage: combjson [options] [file]";

export const HELP = `${USAGE}

Parse a JSON document and print it back.

Reads <file>, or stdin when <file> is absent or "-".

Options:
  -f, --format <json|debug>      Output format (default: json)
  -o, --out <file>               Write output to <file> instead of stdout
      --max-depth <n>            Deepest nesting accepted (default: 1000)
      --leading-zeros <mode>     "reject" (default) or "allow" numbers like 007
  -v, --verbose                  Log progress to stderr
  -h, --help                     Show this help

Exit codes: 0 parsed, 1 syntax error, 2 usage or I/O error.
`;

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false };

  const valueOf = (i: number, flag: string): string => {
    const value = args[i];
    if (value === undefined) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--format" || arg === "-f") {
      const format = valueOf(++i, arg);
      if (format !== "json" && format !== "debug") {
        throw new UsageError(`Invalid ${arg}: ${format} (expected json or debug)`);
      }
      options.format = format;
    } else if (arg === "--out" || arg === "-o") {
      options.out = valueOf(++i, arg);
    } else if (arg === "--max-depth") {
      const depth = valueOf(++i, arg);
      if (!/^\d+$/.test(depth)) {
        throw new UsageError(`Invalid ${arg}: ${depth} (expected a non-negative integer)`);
      }
      options.maxDepth = parseInt(depth, 10);
    } else if (arg === "--leading-zeros") {
      const mode = valueOf(++i, arg);
      if (mode !== "reject" && mode !== "allow") {
        throw new UsageError(`Invalid ${arg}: ${mode} (expected reject or allow)`);
      }
      options.leadingZeros = mode;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (options.file === undefined) {
      options.file = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg} (only one input file may be given)`);
    }
  }

  return options;
}
