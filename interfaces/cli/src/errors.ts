/**
 * Bad command line: unknown command, missing or malformed flag
 */
export class UsageError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "UsageError";
  }
}
