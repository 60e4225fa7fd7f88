import { getErrorMessage, isOperatorError } from "@operator/utils";
import { parseArgs, type ParsedArgs } from "./args";
import { evalCommand } from "./commands/eval";
import { getCommand } from "./commands/get";
import { serveCommand } from "./commands/serve";
import { UsageError } from "./errors";
import { ExitCode, type CliEnvironment, type CliIO } from "./types";

type Command = (parsed: ParsedArgs, env: CliEnvironment) => Promise<ExitCode>;

const COMMANDS: Record<string, Command> = {
  serve: serveCommand,
  get: getCommand,
  eval: evalCommand,
};

export const HELP_TEXT = `
Operator: serves a directory of static files, templates and executables

Usage:
  operator serve --content-directory <dir> [--bind-to <host:port>]
                 [--index-route <route>] [--error-handler-route <route>]
  operator get   --content-directory <dir> --route <route> [--accept <types>]
                 [--header "Name: value"]... [--query name=value]...
                 [--error-handler-route <route>]
  operator eval  --content-directory <dir> [--route <route>]
                 [--media-type <type>] [--query name=value]... < template

Options:
  --log-level <level>  silly, verbose, debug, info, warn, error or none
  --quiet              Only log errors
  --verbose            Log debug output
  --help, -h           Show this help message
  --version, -v        Show the version
`;

/**
 * Run a command line and return the exit status
 */
export async function runCLI(
  args: readonly string[],
  env: CliEnvironment,
): Promise<ExitCode> {
  const [name, ...rest] = args;

  if (name === undefined || name === "--help" || name === "-h") {
    env.io.writeOut(HELP_TEXT);
    return name === undefined ? ExitCode.Usage : ExitCode.Success;
  }
  if (name === "--version" || name === "-v") {
    env.io.writeOut(`operator v${env.version}\n`);
    return ExitCode.Success;
  }

  const command = COMMANDS[name];
  if (!command) {
    env.io.writeErr(`Unknown command "${name}". Run with --help for usage.\n`);
    return ExitCode.Usage;
  }

  try {
    const parsed = parseArgs(rest);
    if (parsed.switches.has("--help") || parsed.switches.has("-h")) {
      env.io.writeOut(HELP_TEXT);
      return ExitCode.Success;
    }
    return await command(parsed, env);
  } catch (error) {
    if (error instanceof UsageError) {
      env.io.writeErr(`${error.message}. Run with --help for usage.\n`);
      return ExitCode.Usage;
    }
    if (isOperatorError(error)) {
      env.io.writeErr(`${error.kind}: ${error.message}\n`);
      return ExitCode.Failure;
    }
    env.io.writeErr(`Error: ${getErrorMessage(error)}\n`);
    return ExitCode.Failure;
  }
}

/**
 * Streams of the running process
 */
export const processIO: CliIO = {
  writeOut: (data) => {
    process.stdout.write(data);
  },
  writeErr: (message) => {
    process.stderr.write(message);
  },
  readStdin: async () => {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString("utf8");
  },
};

/**
 * Run the command line of this process and exit with its status
 */
export async function handleCLI(options: {
  operatorPath: string;
  version: string;
}): Promise<void> {
  process.on("unhandledRejection", (reason) => {
    console.error("Unhandled rejection:", reason);
    process.exit(ExitCode.Failure);
  });

  const exitCode = await runCLI(process.argv.slice(2), {
    io: processIO,
    ...options,
  });
  process.exitCode = exitCode;
}
