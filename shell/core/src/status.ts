import type { FailureKind } from "@operator/utils";
import { ErrorHandlerFailedError } from "./errors";
import type { DispatchOutcome } from "./types";

const STATUS_CODES: Partial<Record<FailureKind, number>> = {
  InvalidRoute: 400,
  Forbidden: 403,
  NotFound: 404,
  UnsupportedMediaType: 406,
};

/**
 * HTTP status code for a failure kind
 */
export function statusCodeFor(kind: FailureKind): number {
  return STATUS_CODES[kind] ?? 500;
}

/**
 * HTTP status code for a dispatch outcome. Error-handled and error-handler
 * failures report the status of the failure that started the error handling.
 */
export function statusCodeForOutcome(outcome: DispatchOutcome): number {
  switch (outcome.status) {
    case "rendered":
      return 200;
    case "error-handled":
      return statusCodeFor(outcome.failure.kind);
    case "failed":
      return statusCodeFor(
        outcome.failure instanceof ErrorHandlerFailedError
          ? outcome.failure.original.kind
          : outcome.failure.kind,
      );
  }
}
