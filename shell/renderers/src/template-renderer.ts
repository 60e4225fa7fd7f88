import { readFile } from "node:fs/promises";
import Handlebars from "handlebars";
import type { ContentSource } from "@operator/content-resolver";
import type { MediaRange, MediaType } from "@operator/media-type";
import { toRenderData, type RenderContext } from "@operator/render-context";
import {
  getErrorMessage,
  isOperatorError,
  type Logger,
} from "@operator/utils";
import { RecursionError, TemplateError, type TemplateLocation } from "./errors";
import type { RenderInvocation, RenderResult, Renderer } from "./types";

export interface TemplateRendererOptions {
  logger: Logger;
  /** Upper bound on render passes spent resolving `get` calls */
  maxPasses?: number;
}

export const DEFAULT_MAX_PASSES = 16;

function locate(error: unknown): TemplateLocation {
  if (!(error instanceof Error)) {
    return {};
  }
  if ("lineNumber" in error && typeof error.lineNumber === "number") {
    const column =
      "column" in error && typeof error.column === "number"
        ? error.column + 1
        : undefined;
    return { line: error.lineNumber, column };
  }
  const match = /line (\d+)/.exec(error.message);
  return match?.[1] === undefined ? {} : { line: Number(match[1]) };
}

function describeError(error: unknown): string {
  return getErrorMessage(error).replace(/\s*\n\s*/g, " ").trim();
}

/**
 * One template evaluation. Handlebars helpers are synchronous, so `get`
 * calls record the routes they need and the template is rendered again once
 * those routes have been fetched.
 */
class TemplateEvaluation {
  private readonly fetched = new Map<string, string>();
  private pending = new Set<string>();
  private problems: string[] = [];
  private readonly template: Handlebars.TemplateDelegate;

  constructor(
    private readonly name: string,
    text: string,
  ) {
    const handlebars = Handlebars.create();
    handlebars.registerHelper("get", (...args: unknown[]) => {
      // The last argument is always the Handlebars options object
      const [route, ...rest] = args.slice(0, -1);
      if (typeof route !== "string" || rest.length > 0) {
        this.problems.push('"get" takes exactly one route string');
        return "";
      }

      const body = this.fetched.get(route);
      if (body === undefined) {
        this.pending.add(route);
        return "";
      }
      return new handlebars.SafeString(body);
    });
    this.template = handlebars.compile(text, { strict: true });
  }

  /**
   * Render once. Returns the output, or the routes that still need fetching.
   */
  public pass(data: unknown): { output: string } | { pending: string[] } {
    this.pending = new Set();
    this.problems = [];

    let output: string;
    try {
      output = this.template(data);
    } catch (error) {
      throw new TemplateError(
        this.name,
        describeError(error),
        locate(error),
        error,
      );
    }

    if (this.pending.size > 0) {
      return { pending: [...this.pending] };
    }
    const [problem] = this.problems;
    if (problem !== undefined) {
      throw new TemplateError(this.name, problem);
    }
    return { output };
  }

  public store(route: string, body: string): void {
    this.fetched.set(route, body);
  }
}

/**
 * Renders Handlebars templates against the render data
 */
export class TemplateRenderer implements Renderer {
  private readonly logger: Logger;
  private readonly maxPasses: number;

  public static createFresh(options: TemplateRendererOptions): TemplateRenderer {
    return new TemplateRenderer(options);
  }

  private constructor(options: TemplateRendererOptions) {
    this.logger = options.logger.child("TemplateRenderer");
    this.maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
  }

  public async render(
    source: ContentSource,
    context: RenderContext,
    invocation: RenderInvocation,
  ): Promise<RenderResult> {
    let text: string;
    try {
      text = await readFile(source.absolutePath, "utf8");
    } catch (error) {
      throw new TemplateError(
        source.relativePath,
        `cannot read template (${getErrorMessage(error)})`,
        {},
        error,
      );
    }
    return this.renderSource(
      text,
      source.mediaType,
      context,
      invocation,
      source.relativePath,
    );
  }

  /**
   * Render template text that does not live in the content directory
   */
  public async renderSource(
    text: string,
    mediaType: MediaType,
    context: RenderContext,
    invocation: RenderInvocation,
    name = "<anonymous>",
  ): Promise<RenderResult> {
    const evaluation = new TemplateEvaluation(name, text);
    const data = toRenderData(context, mediaType);
    const preferences: MediaRange[] = [
      { ...mediaType, parameters: {}, quality: 1 },
    ];

    for (let pass = 1; pass <= this.maxPasses; pass++) {
      const outcome = evaluation.pass(data);
      if ("output" in outcome) {
        return { body: Buffer.from(outcome.output, "utf8"), mediaType };
      }

      for (const route of outcome.pending) {
        this.logger.debug(`${name} includes ${route}`);
        evaluation.store(
          route,
          await this.fetch(name, route, preferences, invocation),
        );
      }
    }

    throw new TemplateError(
      name,
      `"get" calls were still pending after ${this.maxPasses} passes`,
    );
  }

  private async fetch(
    name: string,
    route: string,
    preferences: readonly MediaRange[],
    invocation: RenderInvocation,
  ): Promise<string> {
    try {
      const result = await invocation.getRoute(route, preferences);
      return result.body.toString("utf8");
    } catch (error) {
      if (error instanceof RecursionError) {
        throw error;
      }
      const reason = isOperatorError(error)
        ? `${error.kind}: ${error.message}`
        : describeError(error);
      throw new TemplateError(
        name,
        `"get" of ${route} failed (${reason})`,
        {},
        error,
      );
    }
  }
}
