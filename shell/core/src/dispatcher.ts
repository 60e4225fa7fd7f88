import {
  ContentResolver,
  normalizeRoute,
  type RenderStrategy,
} from "@operator/content-resolver";
import {
  APPLICATION_OCTET_STREAM,
  type MediaRange,
  type MediaType,
} from "@operator/media-type";
import {
  build,
  withError,
  type RenderContext,
} from "@operator/render-context";
import {
  ExecutableRenderer,
  RecursionError,
  StaticRenderer,
  TemplateRenderer,
  type RenderInvocation,
  type RenderResult,
} from "@operator/renderers";
import {
  getErrorMessage,
  isOperatorError,
  OperatorError,
  type FailureKind,
  type Logger,
} from "@operator/utils";
import type { OperatorConfig } from "./config";
import { ErrorHandlerFailedError } from "./errors";
import { statusCodeFor } from "./status";
import type {
  DispatchAttempt,
  DispatchOutcome,
  DispatchRequest,
  RendererSet,
  RenderTrail,
} from "./types";

export interface DispatcherOptions {
  config: OperatorConfig;
  logger: Logger;
  /** Replaces the default renderer for each strategy */
  renderers?: RendererSet;
}

interface RenderOptions {
  preferences: readonly MediaRange[] | undefined;
  internal: boolean;
  signal: AbortSignal | undefined;
  trail: RenderTrail;
}

/** Failure kind for unexpected errors thrown by each renderer */
const RENDER_FAILURE_KIND: Record<RenderStrategy, FailureKind> = {
  static: "Forbidden",
  template: "TemplateError",
  executable: "ExecutableError",
};

const EMPTY_TRAIL: RenderTrail = { routes: [] };

/**
 * Ties resolution and rendering together and applies the error handling
 * policy. Holds no per-request state; one instance serves every request.
 */
export class Dispatcher {
  private readonly config: OperatorConfig;
  private readonly logger: Logger;
  private readonly resolver: ContentResolver;
  private readonly templateRenderer: TemplateRenderer;
  private readonly renderers: RendererSet;

  public static createFresh(options: DispatcherOptions): Dispatcher {
    return new Dispatcher(options);
  }

  private constructor(options: DispatcherOptions) {
    this.config = options.config;
    this.logger = options.logger.child("Dispatcher");
    this.resolver = ContentResolver.createFresh({
      contentDirectory: this.config.contentDirectory,
      logger: options.logger,
    });
    this.templateRenderer = TemplateRenderer.createFresh({
      logger: options.logger,
      maxPasses: this.config.maxTemplatePasses,
    });
    this.renderers = options.renderers ?? {
      static: new StaticRenderer(),
      template: this.templateRenderer,
      executable: ExecutableRenderer.createFresh({
        contentDirectory: this.config.contentDirectory,
        logger: options.logger,
        timeoutMs: this.config.executableTimeoutMs,
      }),
    };
  }

  public getConfig(): OperatorConfig {
    return this.config;
  }

  public getResolver(): ContentResolver {
    return this.resolver;
  }

  /**
   * Serve a request. Failures of the original attempt are handed to the
   * error handler route once; nothing is thrown.
   */
  public async handle(
    request: DispatchRequest,
    attempt: DispatchAttempt = "original",
  ): Promise<DispatchOutcome> {
    let context = build(
      request.route,
      request.headers,
      request.query,
      request.serverInfo,
    );

    try {
      const route = normalizeRoute(request.route);
      context = await this.contextFor(route, request);
      const result = await this.renderRoute(route, context, {
        preferences: request.preferences,
        internal: attempt === "error-handler",
        signal: request.signal,
        trail: EMPTY_TRAIL,
      });
      return { status: "rendered", result };
    } catch (error) {
      const failure = this.toFailure(error, "Forbidden");
      const errorHandlerRoute = this.config.errorHandlerRoute;

      if (attempt === "error-handler") {
        const handlerFailure = new ErrorHandlerFailedError(
          failure,
          failure,
          request.route,
        );
        this.logger.error(handlerFailure.message);
        return { status: "failed", failure: handlerFailure };
      }

      if (errorHandlerRoute === undefined) {
        this.logger.warn(`Failed to serve ${request.route}: ${failure.message}`);
        return { status: "failed", failure };
      }

      this.logger.info(
        `Failed to serve ${request.route} (${failure.kind}), rendering ${errorHandlerRoute}`,
      );
      return this.handleFailure(request, context, failure, errorHandlerRoute);
    }
  }

  /**
   * Render template text that is not part of the content directory
   */
  public async evaluate(
    templateText: string,
    request: DispatchRequest,
    mediaType: MediaType = APPLICATION_OCTET_STREAM,
  ): Promise<RenderResult> {
    const options: RenderOptions = {
      preferences: request.preferences,
      internal: true,
      signal: request.signal,
      trail: EMPTY_TRAIL,
    };

    try {
      const context = await this.contextFor(
        normalizeRoute(request.route),
        request,
      );
      return await this.templateRenderer.renderSource(
        templateText,
        mediaType,
        context,
        this.invocation(context, options),
        "<stdin>",
      );
    } catch (error) {
      throw this.toFailure(error, "TemplateError");
    }
  }

  /**
   * Render context for a normalized route, with the content index as it is
   * at the start of the request
   */
  private async contextFor(
    route: string,
    request: DispatchRequest,
  ): Promise<RenderContext> {
    return build(
      route,
      request.headers,
      request.query,
      request.serverInfo,
      await this.resolver.buildIndex(),
    );
  }

  private async handleFailure(
    request: DispatchRequest,
    context: RenderContext,
    failure: OperatorError,
    errorHandlerRoute: string,
  ): Promise<DispatchOutcome> {
    const errorContext = withError(context, {
      kind: failure.kind,
      message: failure.message,
      statusCode: statusCodeFor(failure.kind),
    });

    try {
      const result = await this.renderRoute(errorHandlerRoute, errorContext, {
        preferences: request.preferences,
        internal: true,
        signal: request.signal,
        trail: EMPTY_TRAIL,
      });
      return { status: "error-handled", result, failure };
    } catch (error) {
      const handlerFailure = new ErrorHandlerFailedError(
        failure,
        this.toFailure(error, "Forbidden"),
        errorHandlerRoute,
      );
      this.logger.error(handlerFailure.message);
      return { status: "failed", failure: handlerFailure };
    }
  }

  private async renderRoute(
    route: string,
    context: RenderContext,
    options: RenderOptions,
  ): Promise<RenderResult> {
    const normalized = normalizeRoute(route);
    this.checkTrail(normalized, options.trail);

    const source = await this.resolver.resolve(normalized, {
      preferences: options.preferences,
      internal: options.internal,
    });

    const nested: RenderOptions = {
      ...options,
      trail: { routes: [...options.trail.routes, normalized] },
    };

    try {
      return await this.renderers[source.strategy].render(
        source,
        context,
        this.invocation(context, nested),
      );
    } catch (error) {
      throw this.toFailure(error, RENDER_FAILURE_KIND[source.strategy]);
    }
  }

  /**
   * Capabilities for one render. Nested routes are always resolved
   * internally and share the render context.
   */
  private invocation(
    context: RenderContext,
    options: RenderOptions,
  ): RenderInvocation {
    return {
      signal: options.signal,
      getRoute: (route, preferences) =>
        this.renderRoute(route, context, {
          ...options,
          preferences,
          internal: true,
        }),
    };
  }

  private checkTrail(route: string, trail: RenderTrail): void {
    const { routes } = trail;
    if (routes.at(-1) === route) {
      throw new RecursionError(route, routes, "self-reference");
    }
    if (routes.includes(route)) {
      throw new RecursionError(route, routes, "cycle");
    }
    if (routes.length >= this.config.maxRecursionDepth) {
      throw new RecursionError(route, routes, "depth");
    }
  }

  private toFailure(error: unknown, kind: FailureKind): OperatorError {
    if (isOperatorError(error)) {
      return error;
    }
    return new OperatorError(getErrorMessage(error), kind, {}, error);
  }
}
