import { readFile } from "node:fs/promises";
import {
  ForbiddenError,
  type ContentSource,
} from "@operator/content-resolver";
import { getErrorMessage } from "@operator/utils";
import type { RenderContext } from "@operator/render-context";
import type { RenderInvocation, RenderResult, Renderer } from "./types";

/**
 * Serves the file as-is
 */
export class StaticRenderer implements Renderer {
  public async render(
    source: ContentSource,
    _context?: RenderContext,
    _invocation?: RenderInvocation,
  ): Promise<RenderResult> {
    try {
      return {
        body: await readFile(source.absolutePath),
        mediaType: source.mediaType,
      };
    } catch (error) {
      throw new ForbiddenError(
        source.route,
        source.absolutePath,
        `cannot read ${source.relativePath} (${getErrorMessage(error)})`,
        error,
      );
    }
  }
}
