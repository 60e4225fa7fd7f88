/**
 * Command line front end
 */

export { handleCLI, HELP_TEXT, processIO, runCLI } from "./cli";
export {
  parseArgs,
  parseHeaderArg,
  parseLogLevelFlags,
  parseQueryArg,
  type ParsedArgs,
} from "./args";
export { UsageError } from "./errors";
export { ExitCode } from "./types";
export type { CliEnvironment, CliIO } from "./types";
