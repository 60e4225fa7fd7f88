/**
 * Dispatch error classes
 */
import { OperatorError } from "@operator/utils";

/**
 * The error handler route failed while handling another failure
 */
export class ErrorHandlerFailedError extends OperatorError {
  constructor(
    public readonly original: OperatorError,
    public readonly handlerFailure: OperatorError,
    errorHandlerRoute: string,
  ) {
    super(
      `Error handler ${errorHandlerRoute} failed with ${handlerFailure.kind} (${handlerFailure.message}) while handling ${original.kind} (${original.message})`,
      "ErrorHandlerFailed",
      {
        errorHandlerRoute,
        original: original.toJSON(),
        handlerFailure: handlerFailure.toJSON(),
      },
      handlerFailure,
    );
  }
}
