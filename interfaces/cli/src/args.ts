import { LogLevel, parseLogLevel } from "@operator/utils";
import { UsageError } from "./errors";

/**
 * Flags that take no value
 */
const SWITCHES = new Set(["--quiet", "--verbose", "--help", "-h"]);

/**
 * Command line split into flags. Repeated flags keep every value in order.
 */
export interface ParsedArgs {
  values: Map<string, string[]>;
  switches: Set<string>;
  positionals: string[];
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const values = new Map<string, string[]>();
  const switches = new Set<string>();
  const positionals: string[] = [];

  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? "";
    if (!arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }
    if (SWITCHES.has(arg)) {
      switches.add(arg);
      continue;
    }

    // --flag=value
    const equals = arg.indexOf("=");
    if (arg.startsWith("--") && equals !== -1) {
      appendValue(values, arg.slice(0, equals), arg.slice(equals + 1));
      continue;
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`${arg} needs a value`, { flag: arg });
    }
    appendValue(values, arg, value);
    index++;
  }

  return { values, switches, positionals };
}

function appendValue(
  values: Map<string, string[]>,
  flag: string,
  value: string,
): void {
  const existing = values.get(flag);
  if (existing) {
    existing.push(value);
  } else {
    values.set(flag, [value]);
  }
}

/**
 * Last value of a flag
 */
export function parseSingleFlag(
  parsed: ParsedArgs,
  flag: string,
): string | undefined {
  return parsed.values.get(flag)?.at(-1);
}

export function requireFlag(parsed: ParsedArgs, flag: string): string {
  const value = parseSingleFlag(parsed, flag);
  if (value === undefined) {
    throw new UsageError(`${flag} is required`, { flag });
  }
  return value;
}

/**
 * Every value of a repeatable flag
 */
export function parseRepeatedFlag(parsed: ParsedArgs, flag: string): string[] {
  return parsed.values.get(flag) ?? [];
}

/**
 * Reject flags the command does not know
 */
export function assertKnownFlags(
  parsed: ParsedArgs,
  known: readonly string[],
): void {
  for (const flag of parsed.values.keys()) {
    if (!known.includes(flag)) {
      throw new UsageError(`Unknown option ${flag}`, { flag });
    }
  }
  const [extra] = parsed.positionals;
  if (extra !== undefined) {
    throw new UsageError(`Unexpected argument ${extra}`, { argument: extra });
  }
}

/**
 * `Name: value` as given to --header
 */
export function parseHeaderArg(arg: string): [string, string] {
  const colon = arg.indexOf(":");
  const name = colon === -1 ? "" : arg.slice(0, colon).trim();
  if (name === "") {
    throw new UsageError(`Invalid header "${arg}", expected "Name: value"`, {
      header: arg,
    });
  }
  return [name, arg.slice(colon + 1).trim()];
}

/**
 * `name=value` as given to --query; a bare name has an empty value
 */
export function parseQueryArg(arg: string): [string, string] {
  const equals = arg.indexOf("=");
  if (equals === -1) {
    return [arg, ""];
  }
  return [arg.slice(0, equals), arg.slice(equals + 1)];
}

/**
 * Log level from --log-level, --quiet and --verbose
 */
export function parseLogLevelFlags(
  parsed: ParsedArgs,
  defaultLevel: LogLevel,
): LogLevel {
  const name = parseSingleFlag(parsed, "--log-level");
  if (name !== undefined) {
    const level = parseLogLevel(name);
    if (level === undefined) {
      throw new UsageError(`Unknown log level "${name}"`, { level: name });
    }
    return level;
  }
  if (parsed.switches.has("--quiet")) return LogLevel.ERROR;
  if (parsed.switches.has("--verbose")) return LogLevel.DEBUG;
  return defaultLevel;
}
