/**
 * @combjson/cli
 *
 * The `combjson` command, usable as a library.
 *
 * @module
 */

export { run, nodeIO, ExitCode } from "./run.js";
export type { CliIO } from "./run.js";

export { parseArgs, UsageError, HELP, USAGE } from "./args.js";
export type { CliOptions } from "./args.js";

export {
  loadConfig,
  applyOverrides,
  envToConfig,
  ConfigError,
  DEFAULT_CONFIG,
} from "./config.js";
export type { CombjsonConfig, LoadedConfig, LoadConfigOptions, OutputFormat } from "./config.js";
