/**
 * Operator Utils Package
 *
 * Shared utilities used across the operator packages.
 */

// Logger
export { Logger, LogLevel, parseLogLevel } from "./logger";
export type { LoggerOptions } from "./logger";

// Errors
export {
  OperatorError,
  isOperatorError,
  FAILURE_KINDS,
  type FailureKind,
} from "./operator-error";
export { getErrorMessage } from "./error";

// Zod
export { z, ZodError } from "./zod";
export type { ZodType } from "./zod";
