import { vi } from "vitest";
import {
  ContentResolver,
  type ContentSource,
} from "@operator/content-resolver";
import { parseMediaType, type MediaRange } from "@operator/media-type";
import { build, type RenderContext } from "@operator/render-context";
import { createSilentLogger } from "@operator/test-utils";
import type { RenderInvocation, RenderResult } from "../src/types";

export function testContext(route = "/page"): RenderContext {
  return build(
    route,
    { accept: "text/html" },
    { name: "world" },
    {
      socketAddress: null,
      operatorPath: "/usr/local/bin/operator",
      version: "1.2.3",
    },
  );
}

/**
 * Resolve a route internally so tests work on real sources
 */
export async function sourceFor(
  contentDirectory: string,
  route: string,
): Promise<ContentSource> {
  return ContentResolver.createFresh({
    contentDirectory,
    logger: createSilentLogger(),
  }).resolve(route, { internal: true });
}

/**
 * An invocation whose nested renders come from a fixed route table
 */
export function tableInvocation(
  routes: Record<string, string>,
): RenderInvocation {
  return {
    getRoute: vi.fn(
      async (route: string, _preferences: readonly MediaRange[]) => {
        const body = routes[route];
        if (body === undefined) {
          throw new Error(`no route ${route}`);
        }
        const result: RenderResult = {
          body: Buffer.from(body),
          mediaType: parseMediaType("text/html"),
        };
        return result;
      },
    ),
  };
}
