/**
 * Base error class for the resolution and rendering engine
 */

/**
 * Every failure the engine can report. Resolution-phase kinds come first,
 * then render-phase kinds, then the terminal kind.
 */
export const FAILURE_KINDS = [
  "InvalidRoute",
  "NotFound",
  "Ambiguous",
  "Forbidden",
  "UnsupportedMediaType",
  "TemplateError",
  "RecursionError",
  "ExecutableError",
  "ErrorHandlerFailed",
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

/**
 * Base error class for all engine errors
 * Provides consistent structure and metadata
 */
export class OperatorError extends Error {
  public readonly kind: FailureKind;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    kind: FailureKind,
    context: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.kind = kind;
    this.context = context;

    // Preserve stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to structured object for logging/serialization
   */
  toJSON(): {
    name: string;
    kind: FailureKind;
    message: string;
    context: Record<string, unknown>;
    cause: string | undefined;
  } {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export function isOperatorError(error: unknown): error is OperatorError {
  return error instanceof OperatorError;
}
