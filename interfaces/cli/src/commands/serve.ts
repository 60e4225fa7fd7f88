import { ServerManager, webserverConfigSchema } from "@operator/webserver";
import { LogLevel } from "@operator/utils";
import {
  assertKnownFlags,
  parseSingleFlag,
  type ParsedArgs,
} from "../args";
import { UsageError } from "../errors";
import { ExitCode, type CliEnvironment } from "../types";
import { COMMON_FLAGS, setupCommand } from "./shared";

const SERVE_FLAGS = [...COMMON_FLAGS, "--bind-to", "--index-route"];

/**
 * Resolves on the first SIGINT or SIGTERM
 */
export function waitForTermination(): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (): void => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

/**
 * Serve the content directory over HTTP until asked to stop
 */
export async function serveCommand(
  parsed: ParsedArgs,
  env: CliEnvironment,
): Promise<ExitCode> {
  assertKnownFlags(parsed, SERVE_FLAGS);

  const bindTo = parseSingleFlag(parsed, "--bind-to");
  const webserverConfig = webserverConfigSchema.safeParse({ bindTo });
  if (!webserverConfig.success) {
    throw new UsageError(`Invalid --bind-to "${bindTo}", expected host:port`, {
      bindTo,
    });
  }

  const { dispatcher, logger } = setupCommand(
    parsed,
    env,
    { defaultLevel: LogLevel.INFO, useStderr: false },
    { indexRoute: parseSingleFlag(parsed, "--index-route") },
  );

  const server = new ServerManager({
    dispatcher,
    logger,
    bindTo: webserverConfig.data.bindTo,
  });
  await server.start();

  await (env.shutdownSignal ?? waitForTermination)();
  await server.stop();
  return ExitCode.Success;
}
