import type { ContentSource } from "@operator/content-resolver";
import type { MediaRange, MediaType } from "@operator/media-type";
import type { RenderContext } from "@operator/render-context";

export interface RenderResult {
  body: Buffer;
  mediaType: MediaType;
}

/**
 * Per-render capabilities handed down by the dispatcher
 */
export interface RenderInvocation {
  /**
   * Resolve and render another route through the full pipeline, with the
   * same render context. Enforces the recursion limits.
   */
  getRoute(
    route: string,
    preferences: readonly MediaRange[],
  ): Promise<RenderResult>;
  /** Aborts long-running renders, such as executables */
  signal?: AbortSignal | undefined;
}

/**
 * One rendering strategy
 */
export interface Renderer {
  render(
    source: ContentSource,
    context: RenderContext,
    invocation: RenderInvocation,
  ): Promise<RenderResult>;
}
