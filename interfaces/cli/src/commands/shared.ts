import {
  createOperatorConfig,
  Dispatcher,
  type OperatorConfigInput,
} from "@operator/core";
import { Logger, LogLevel } from "@operator/utils";
import { parseLogLevelFlags, requireFlag, parseSingleFlag } from "../args";
import type { ParsedArgs } from "../args";
import type { CliEnvironment } from "../types";

/**
 * Flags every command takes
 */
export const COMMON_FLAGS = [
  "--content-directory",
  "--error-handler-route",
  "--log-level",
] as const;

export interface CommandSetup {
  dispatcher: Dispatcher;
  logger: Logger;
}

/**
 * Build the logger and dispatcher from the common flags. Commands that write
 * a body to stdout log to stderr.
 */
export function setupCommand(
  parsed: ParsedArgs,
  env: CliEnvironment,
  options: { defaultLevel: LogLevel; useStderr: boolean },
  extra: Partial<OperatorConfigInput> = {},
): CommandSetup {
  const logger = Logger.createFresh({
    level: parseLogLevelFlags(parsed, options.defaultLevel),
    useStderr: options.useStderr,
    context: "operator",
  });

  const config = createOperatorConfig({
    ...extra,
    contentDirectory: requireFlag(parsed, "--content-directory"),
    errorHandlerRoute: parseSingleFlag(parsed, "--error-handler-route"),
    operatorPath: env.operatorPath,
    version: env.version,
  });

  return { dispatcher: Dispatcher.createFresh({ config, logger }), logger };
}
