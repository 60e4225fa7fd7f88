export {
  createOperatorConfig,
  DEFAULT_MAX_RECURSION_DEPTH,
  operatorConfigSchema,
} from "./config";
export type { OperatorConfig, OperatorConfigInput } from "./config";
export { Dispatcher } from "./dispatcher";
export type { DispatcherOptions } from "./dispatcher";
export { ErrorHandlerFailedError } from "./errors";
export {
  detachedServerInfo,
  evaluate,
  get,
  resolveAndRender,
} from "./operations";
export type { EvaluateOptions, GetRequest } from "./operations";
export { statusCodeFor, statusCodeForOutcome } from "./status";
export type {
  DispatchAttempt,
  DispatchOutcome,
  DispatchRequest,
  RendererSet,
  RenderTrail,
} from "./types";
