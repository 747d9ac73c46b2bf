/**
 * The `combjson` command: read a document, parse it, print it back.
 *
 * All process interaction goes through a `CliIO`, so `run` can be driven
 * in memory.
 */

import * as fs from "fs";
import { inspect, parse, stringify } from "@combjson/json";
import { HELP, USAGE, UsageError, parseArgs } from "./args.js";
import type { CliOptions } from "./args.js";
import { ConfigError, applyOverrides, loadConfig } from "./config.js";
import type { CombjsonConfig, LoadedConfig } from "./config.js";

export interface CliIO {
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;
  readFile(path: string): string;
  readStdin(): string;
  writeFile(path: string, content: string): void;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const ExitCode = {
  Ok: 0,
  SyntaxError: 1,
  Usage: 2,
} as const;

const STDIN_NAME = "<stdin>";

/** The real process. */
export function nodeIO(): CliIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    readFile: (path) => fs.readFileSync(path, "utf8"),
    readStdin: () => fs.readFileSync(0, "utf8"),
    writeFile: (path, content) => fs.writeFileSync(path, content),
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function overridesFrom(options: CliOptions): Partial<CombjsonConfig> {
  const overrides: Partial<CombjsonConfig> = {};
  if (options.verbose) overrides.debug = true;
  if (options.format !== undefined) overrides.format = options.format;
  if (options.maxDepth !== undefined) overrides.maxDepth = options.maxDepth;
  if (options.leadingZeros !== undefined) overrides.leadingZeros = options.leadingZeros;
  return overrides;
}

/** Run the command and return its exit code. */
export function run(argv: readonly string[], io: CliIO): number {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n${USAGE}\n`);
      return ExitCode.Usage;
    }
    throw error;
  }

  if (options.help) {
    io.stdout(HELP);
    return ExitCode.Ok;
  }

  let loaded: LoadedConfig;
  try {
    loaded = loadConfig({ cwd: io.cwd, env: io.env });
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`combjson: ${error.message}\n`);
      return ExitCode.Usage;
    }
    throw error;
  }

  const config = applyOverrides(loaded.config, overridesFrom(options));
  const debug = (message: string): void => {
    if (config.debug) io.stderr(`[combjson] ${message}\n`);
  };

  if (loaded.filepath !== undefined) {
    debug(`Loaded config from ${loaded.filepath}`);
  }

  const file = options.file === "-" ? undefined : options.file;
  const name = file ?? STDIN_NAME;

  let text: string;
  try {
    text = file === undefined ? io.readStdin() : io.readFile(file);
  } catch (error) {
    io.stderr(`combjson: cannot read ${name}: ${errorMessage(error)}\n`);
    return ExitCode.Usage;
  }
  debug(`Read ${text.length} characters from ${name}`);

  const started = performance.now();
  const result = parse(text, { maxDepth: config.maxDepth, leadingZeros: config.leadingZeros });
  debug(`Parsed in ${(performance.now() - started).toFixed(1)}ms`);

  if (!result.ok) {
    const { line, column } = result.error;
    io.stderr(`${name}:${line}:${column}: error: ${result.error.description}\n`);
    return ExitCode.SyntaxError;
  }

  const rendered =
    (config.format === "debug" ? inspect(result.value) : stringify(result.value)) + "\n";

  if (options.out === undefined) {
    io.stdout(rendered);
    return ExitCode.Ok;
  }

  try {
    io.writeFile(options.out, rendered);
  } catch (error) {
    io.stderr(`combjson: cannot write ${options.out}: ${errorMessage(error)}\n`);
    return ExitCode.Usage;
  }
  debug(`Wrote ${options.out}`);
  return ExitCode.Ok;
}
