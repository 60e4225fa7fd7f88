/**
 * Process streams used by the commands; tests substitute buffers
 */
export interface CliIO {
  /** Rendered bodies */
  writeOut(data: Uint8Array | string): void;
  /** Messages for the user */
  writeErr(message: string): void;
  readStdin(): Promise<string>;
}

export interface CliEnvironment {
  io: CliIO;
  /** Reported to content as server-info */
  operatorPath: string;
  version: string;
  /**
   * Resolves when the serve command should stop. Defaults to SIGINT or
   * SIGTERM.
   */
  shutdownSignal?: () => Promise<void>;
}

/**
 * Process exit status of a command
 */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
