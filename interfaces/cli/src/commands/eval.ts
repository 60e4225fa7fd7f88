import { evaluate } from "@operator/core";
import { parseMediaType, type MediaType } from "@operator/media-type";
import { getErrorMessage, LogLevel } from "@operator/utils";
import {
  assertKnownFlags,
  parseQueryArg,
  parseRepeatedFlag,
  parseSingleFlag,
  type ParsedArgs,
} from "../args";
import { UsageError } from "../errors";
import { ExitCode, type CliEnvironment } from "../types";
import { COMMON_FLAGS, setupCommand } from "./shared";

const EVAL_FLAGS = [...COMMON_FLAGS, "--route", "--media-type", "--query"];

function parseOutputMediaType(
  value: string | undefined,
): MediaType | undefined {
  if (value === undefined) return undefined;
  try {
    return parseMediaType(value);
  } catch (error) {
    throw new UsageError(`Invalid --media-type: ${getErrorMessage(error)}`, {
      mediaType: value,
    });
  }
}

/**
 * Render a template read from stdin against the content directory
 */
export async function evalCommand(
  parsed: ParsedArgs,
  env: CliEnvironment,
): Promise<ExitCode> {
  assertKnownFlags(parsed, EVAL_FLAGS);

  const mediaType = parseOutputMediaType(
    parseSingleFlag(parsed, "--media-type"),
  );
  const { dispatcher } = setupCommand(parsed, env, {
    defaultLevel: LogLevel.WARN,
    useStderr: true,
  });

  const template = await env.io.readStdin();
  const result = await evaluate(dispatcher, template, {
    route: parseSingleFlag(parsed, "--route"),
    query: parseRepeatedFlag(parsed, "--query").map(parseQueryArg),
    mediaType,
  });
  env.io.writeOut(result.body);
  return ExitCode.Success;
}
