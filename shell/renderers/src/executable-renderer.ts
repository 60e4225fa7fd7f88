import { spawn } from "node:child_process";
import type { ContentSource } from "@operator/content-resolver";
import { serialize, type RenderContext } from "@operator/render-context";
import { getErrorMessage, type Logger } from "@operator/utils";
import { ExecutableError } from "./errors";
import type { RenderInvocation, RenderResult, Renderer } from "./types";

export const RENDER_DATA_ENV = "OPERATOR_RENDER_DATA";
export const DEFAULT_EXECUTABLE_TIMEOUT_MS = 30_000;

export interface ExecutableRendererOptions {
  /** Working directory of every spawned program */
  contentDirectory: string;
  logger: Logger;
  timeoutMs?: number;
}

/**
 * SIGKILL a whole process group; falls back when the group is gone
 */
function killProcessGroup(
  pid: number | undefined,
  fallback: () => void,
): void {
  if (pid === undefined) {
    fallback();
    return;
  }
  try {
    process.kill(-pid, "SIGKILL");
  } catch {
    // The group has already exited
    fallback();
  }
}

/**
 * Runs the source as a program and serves its standard output
 */
export class ExecutableRenderer implements Renderer {
  private readonly contentDirectory: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  public static createFresh(
    options: ExecutableRendererOptions,
  ): ExecutableRenderer {
    return new ExecutableRenderer(options);
  }

  private constructor(options: ExecutableRendererOptions) {
    this.contentDirectory = options.contentDirectory;
    this.logger = options.logger.child("ExecutableRenderer");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXECUTABLE_TIMEOUT_MS;
  }

  public render(
    source: ContentSource,
    context: RenderContext,
    invocation: RenderInvocation,
  ): Promise<RenderResult> {
    const program = source.relativePath;
    const signal = invocation.signal;

    return new Promise<RenderResult>((resolve, reject) => {
      if (signal?.aborted) {
        reject(
          new ExecutableError(program, "was cancelled before it started", {
            exitCode: null,
            signal: null,
            stderr: "",
            timedOut: false,
          }),
        );
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let cancelled = false;
      let settled = false;

      this.logger.debug(`Running ${program}`);
      const child = spawn(source.absolutePath, [], {
        cwd: this.contentDirectory,
        env: {
          ...process.env,
          [RENDER_DATA_ENV]: serialize(context, source.mediaType),
        },
        stdio: ["ignore", "pipe", "pipe"],
        // Own process group, so everything the program forks can be killed
        detached: true,
      });

      // Programs that forked may leave descendants holding the output pipes
      const terminate = (): void => {
        killProcessGroup(child.pid, () => child.kill("SIGKILL"));
        child.stdout.destroy();
        child.stderr.destroy();
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, this.timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        terminate();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        outcome();
      };

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (error) => {
        finish(() =>
          reject(
            new ExecutableError(
              program,
              `could not be started (${getErrorMessage(error)})`,
              {
                exitCode: null,
                signal: null,
                stderr: Buffer.concat(stderr).toString("utf8"),
                timedOut: false,
              },
              error,
            ),
          ),
        );
      });

      child.on("close", (exitCode, exitSignal) => {
        finish(() => {
          const errorOutput = Buffer.concat(stderr).toString("utf8");
          if (errorOutput !== "") {
            this.logger.debug(`${program} wrote to stderr: ${errorOutput}`);
          }

          const failure = {
            exitCode,
            signal: exitSignal,
            stderr: errorOutput,
            timedOut,
          };

          if (timedOut) {
            reject(
              new ExecutableError(
                program,
                `timed out after ${this.timeoutMs}ms`,
                failure,
              ),
            );
          } else if (cancelled) {
            reject(new ExecutableError(program, "was cancelled", failure));
          } else if (exitSignal !== null) {
            reject(
              new ExecutableError(
                program,
                `was terminated by ${exitSignal}`,
                failure,
              ),
            );
          } else if (exitCode !== 0) {
            reject(
              new ExecutableError(
                program,
                `exited with status ${exitCode ?? "unknown"}`,
                failure,
              ),
            );
          } else {
            resolve({
              body: Buffer.concat(stdout),
              mediaType: source.mediaType,
            });
          }
        });
      });
    });
  }
}
