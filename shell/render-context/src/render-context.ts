import type { ContentIndex } from "@operator/content-resolver";
import type {
  ErrorInfo,
  HeaderInput,
  QueryInput,
  RenderContext,
  ServerInfo,
} from "./types";

function isIterable<T>(value: unknown): value is Iterable<T> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value
  );
}

function normalizeHeaders(input: HeaderInput): Record<string, string> {
  const headers: Record<string, string> = {};
  const add = (name: string, value: string): void => {
    const key = name.toLowerCase();
    const existing = headers[key];
    headers[key] = existing === undefined ? value : `${existing}, ${value}`;
  };

  if (isIterable<readonly [string, string]>(input)) {
    for (const [name, value] of input) {
      add(name, value);
    }
    return headers;
  }

  for (const [name, value] of Object.entries(input)) {
    if (value === undefined) continue;
    if (typeof value === "string") {
      add(name, value);
    } else {
      for (const item of value) add(name, item);
    }
  }
  return headers;
}

function normalizeQuery(input: QueryInput): Record<string, string> {
  const query: Record<string, string> = {};
  const entries = isIterable<readonly [string, string]>(input)
    ? input
    : Object.entries(input);
  // Repeated parameters: the last value wins
  for (const [name, value] of entries) {
    if (value !== undefined) query[name] = value;
  }
  return query;
}

/**
 * Build the render context for one invocation. Pure: the same inputs always
 * give an equal context.
 */
export function build(
  route: string,
  headers: HeaderInput,
  query: QueryInput,
  serverInfo: ServerInfo,
  index: ContentIndex = {},
): RenderContext {
  return Object.freeze({
    request: Object.freeze({
      route,
      headers: Object.freeze(normalizeHeaders(headers)),
      query: Object.freeze(normalizeQuery(query)),
    }),
    serverInfo: Object.freeze({ ...serverInfo }),
    index,
  });
}

/**
 * A copy of the context with the error zone populated
 */
export function withError(
  context: RenderContext,
  error: ErrorInfo,
): RenderContext {
  return Object.freeze({
    request: context.request,
    serverInfo: context.serverInfo,
    index: context.index,
    error: Object.freeze({ ...error }),
  });
}
