import type { MediaType } from "@operator/media-type";
import type {
  HeaderInput,
  QueryInput,
  ServerInfo,
} from "@operator/render-context";
import type { RenderResult } from "@operator/renderers";
import type { Dispatcher } from "./dispatcher";
import type { DispatchOutcome, DispatchRequest } from "./types";

/**
 * Server info for front ends that do not listen on a socket
 */
export function detachedServerInfo(dispatcher: Dispatcher): ServerInfo {
  const { operatorPath, version } = dispatcher.getConfig();
  return { socketAddress: null, operatorPath, version };
}

/**
 * Serve one web request
 */
export function resolveAndRender(
  dispatcher: Dispatcher,
  request: DispatchRequest,
): Promise<DispatchOutcome> {
  return dispatcher.handle(request);
}

export type GetRequest = Omit<
  DispatchRequest,
  "serverInfo" | "headers" | "query"
> & {
  headers?: HeaderInput;
  query?: QueryInput;
};

/**
 * Render a single route outside the web server
 */
export function get(
  dispatcher: Dispatcher,
  request: GetRequest,
): Promise<DispatchOutcome> {
  return dispatcher.handle({
    ...request,
    headers: request.headers ?? {},
    query: request.query ?? {},
    serverInfo: detachedServerInfo(dispatcher),
  });
}

export interface EvaluateOptions {
  /** Route reported in the render context */
  route?: string;
  headers?: HeaderInput;
  query?: QueryInput;
  /** Media type of the output; nested `get` calls prefer it */
  mediaType?: MediaType;
  signal?: AbortSignal;
}

/**
 * Render template text against a content directory
 */
export function evaluate(
  dispatcher: Dispatcher,
  templateText: string,
  options: EvaluateOptions = {},
): Promise<RenderResult> {
  return dispatcher.evaluate(
    templateText,
    {
      route: options.route ?? "/",
      headers: options.headers ?? {},
      query: options.query ?? {},
      serverInfo: detachedServerInfo(dispatcher),
      signal: options.signal,
    },
    options.mediaType,
  );
}
