import { STATUS_CODES } from "node:http";
import type { Context } from "hono";
import {
  resolveAndRender,
  statusCodeForOutcome,
  type Dispatcher,
} from "@operator/core";
import {
  formatMediaType,
  mediaTypeFromExtension,
  MediaTypeParseError,
  parseAcceptHeader,
  type MediaRange,
} from "@operator/media-type";
import type { ServerInfo } from "@operator/render-context";
import type { Logger } from "@operator/utils";

export interface RequestHandlerOptions {
  dispatcher: Dispatcher;
  logger: Logger;
  serverInfo: () => ServerInfo;
}

export interface RequestTarget {
  route: string;
  /** Media type named by the URL extension, which overrides Accept */
  preference?: MediaRange;
}

export function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? "Unknown";
}

/**
 * Map a request path to a route. A final extension with a known media type
 * (`/resume.pdf`) is removed and becomes the only acceptable media type.
 */
export function requestTarget(path: string, indexRoute?: string): RequestTarget {
  const route = path === "/" && indexRoute !== undefined ? indexRoute : path;

  const nameStart = route.lastIndexOf("/") + 1;
  const name = route.slice(nameStart);
  const dot = name.lastIndexOf(".");
  if (dot <= 0) {
    return { route };
  }

  const mediaType = mediaTypeFromExtension(name.slice(dot + 1));
  if (mediaType === undefined) {
    return { route };
  }

  return {
    route: route.slice(0, nameStart) + name.slice(0, dot),
    preference: { ...mediaType, quality: 1 },
  };
}

/**
 * Hono handler serving every GET request from the content directory
 */
export function createRequestHandler(
  options: RequestHandlerOptions,
): (c: Context) => Promise<Response> {
  const { dispatcher, logger } = options;
  const { indexRoute } = dispatcher.getConfig();

  return async (c) => {
    const target = requestTarget(c.req.path, indexRoute);

    let preferences: readonly MediaRange[];
    if (target.preference) {
      preferences = [target.preference];
    } else {
      try {
        preferences = parseAcceptHeader(c.req.header("accept") ?? "");
      } catch (error) {
        if (error instanceof MediaTypeParseError) {
          logger.debug(`Rejecting ${c.req.path}: ${error.message}`);
          return c.text(`Bad Request: ${error.message}`, 400);
        }
        throw error;
      }
    }

    const outcome = await resolveAndRender(dispatcher, {
      route: target.route,
      headers: c.req.raw.headers,
      query: new URL(c.req.url).searchParams,
      preferences,
      serverInfo: options.serverInfo(),
      signal: c.req.raw.signal,
    });
    const status = statusCodeForOutcome(outcome);
    logger.debug(`GET ${c.req.path} -> ${status} (${outcome.status})`);

    if (outcome.status === "failed") {
      return new Response(reasonPhrase(status), {
        status,
        headers: { "Content-Type": "text/plain; charset=utf-8" },
      });
    }

    return new Response(outcome.result.body, {
      status,
      headers: { "Content-Type": formatMediaType(outcome.result.mediaType) },
    });
  };
}
