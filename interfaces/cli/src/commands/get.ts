import { get, type DispatchOutcome } from "@operator/core";
import { parseAcceptHeader, type MediaRange } from "@operator/media-type";
import { getErrorMessage, LogLevel } from "@operator/utils";
import {
  assertKnownFlags,
  parseHeaderArg,
  parseQueryArg,
  parseRepeatedFlag,
  parseSingleFlag,
  requireFlag,
  type ParsedArgs,
} from "../args";
import { UsageError } from "../errors";
import { ExitCode, type CliEnvironment } from "../types";
import { COMMON_FLAGS, setupCommand } from "./shared";

const GET_FLAGS = [
  ...COMMON_FLAGS,
  "--route",
  "--accept",
  "--header",
  "--query",
];

function parsePreferences(accept: string): MediaRange[] {
  try {
    return parseAcceptHeader(accept);
  } catch (error) {
    throw new UsageError(`Invalid --accept: ${getErrorMessage(error)}`, {
      accept,
    });
  }
}

/**
 * Write the outcome of a dispatch. Only a rendered outcome succeeds; an
 * error handler's body is still written.
 */
export function reportOutcome(
  outcome: DispatchOutcome,
  env: CliEnvironment,
): ExitCode {
  switch (outcome.status) {
    case "rendered":
      env.io.writeOut(outcome.result.body);
      return ExitCode.Success;
    case "error-handled":
      env.io.writeOut(outcome.result.body);
      env.io.writeErr(`${outcome.failure.kind}: ${outcome.failure.message}\n`);
      return ExitCode.Failure;
    case "failed":
      env.io.writeErr(`${outcome.failure.kind}: ${outcome.failure.message}\n`);
      return ExitCode.Failure;
  }
}

/**
 * Render one route to stdout
 */
export async function getCommand(
  parsed: ParsedArgs,
  env: CliEnvironment,
): Promise<ExitCode> {
  assertKnownFlags(parsed, GET_FLAGS);

  const route = requireFlag(parsed, "--route");
  const headers = parseRepeatedFlag(parsed, "--header").map(parseHeaderArg);
  const query = parseRepeatedFlag(parsed, "--query").map(parseQueryArg);

  const accept = parseSingleFlag(parsed, "--accept");
  const preferences =
    accept === undefined ? undefined : parsePreferences(accept);
  if (accept !== undefined) {
    headers.push(["accept", accept]);
  }

  const { dispatcher } = setupCommand(parsed, env, {
    defaultLevel: LogLevel.WARN,
    useStderr: true,
  });

  const outcome = await get(dispatcher, {
    route,
    headers,
    query,
    preferences,
  });
  return reportOutcome(outcome, env);
}
