/**
 * HTTP front end: serves a content directory through the dispatcher
 */

export {
  webserverConfigSchema,
  parseBindAddress,
  type BindAddress,
  type WebserverConfig,
} from "./config";

export { ServerManager } from "./server-manager";
export type { ServerManagerOptions } from "./server-manager";
export {
  createRequestHandler,
  reasonPhrase,
  requestTarget,
} from "./request-handler";
export type { RequestHandlerOptions, RequestTarget } from "./request-handler";
export { WebserverStartupError } from "./errors";
