/**
 * Resolution error classes
 */
import { OperatorError } from "@operator/utils";

export class InvalidRouteError extends OperatorError {
  constructor(route: string, reason: string) {
    super(`Invalid route "${route}": ${reason}`, "InvalidRoute", {
      route,
      reason,
    });
  }
}

export class NotFoundError extends OperatorError {
  constructor(route: string) {
    super(`No content found for ${route}`, "NotFound", { route });
  }
}

export class AmbiguousContentError extends OperatorError {
  constructor(route: string, candidates: string[]) {
    super(
      `Content for ${route} is ambiguous between ${candidates.join(", ")}`,
      "Ambiguous",
      { route, candidates },
    );
  }
}

export class ForbiddenError extends OperatorError {
  constructor(route: string, path: string, reason: string, cause?: unknown) {
    super(
      `Access to content for ${route} is forbidden: ${reason}`,
      "Forbidden",
      { route, path },
      cause,
    );
  }
}
