/**
 * Media type error classes
 */
import { OperatorError } from "@operator/utils";

/**
 * A media type, media range or Accept header could not be parsed
 */
export class MediaTypeParseError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "MediaTypeParseError";
  }
}

/**
 * None of the available media types is acceptable to the client
 */
export class UnsupportedMediaTypeError extends OperatorError {
  constructor(available: string[], acceptable: string[]) {
    super(
      `None of the available media types (${available.join(", ") || "none"}) is acceptable (${acceptable.join(", ")})`,
      "UnsupportedMediaType",
      { available, acceptable },
    );
  }
}
