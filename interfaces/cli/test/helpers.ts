import type { CliEnvironment } from "../src/types";

export interface BufferedEnvironment extends CliEnvironment {
  stdout(): string;
  stderr(): string;
}

/**
 * Environment that records output in memory and feeds the given stdin
 */
export function bufferedEnvironment(stdin = ""): BufferedEnvironment {
  const out: Buffer[] = [];
  let err = "";

  return {
    io: {
      writeOut: (data) => {
        out.push(
          typeof data === "string" ? Buffer.from(data) : Buffer.from(data),
        );
      },
      writeErr: (message) => {
        err += message;
      },
      readStdin: () => Promise.resolve(stdin),
    },
    operatorPath: "/usr/local/bin/operator",
    version: "1.2.3",
    shutdownSignal: () => Promise.resolve(),
    stdout: () => Buffer.concat(out).toString("utf8"),
    stderr: () => err,
  };
}
