import type { RenderStrategy } from "@operator/content-resolver";
import type { MediaRange } from "@operator/media-type";
import type {
  HeaderInput,
  QueryInput,
  ServerInfo,
} from "@operator/render-context";
import type { RenderResult, Renderer } from "@operator/renderers";
import type { OperatorError } from "@operator/utils";

export interface DispatchRequest {
  route: string;
  headers: HeaderInput;
  query: QueryInput;
  /** Acceptable media types, best first. Absent means no preference. */
  preferences?: readonly MediaRange[] | undefined;
  serverInfo: ServerInfo;
  signal?: AbortSignal | undefined;
}

/**
 * Whether a dispatch serves the request itself or its error handler
 */
export type DispatchAttempt = "original" | "error-handler";

export type DispatchOutcome =
  | { status: "rendered"; result: RenderResult }
  | { status: "error-handled"; result: RenderResult; failure: OperatorError }
  | { status: "failed"; failure: OperatorError };

export type RendererSet = Record<RenderStrategy, Renderer>;

/**
 * Routes currently being rendered, outermost first
 */
export interface RenderTrail {
  readonly routes: readonly string[];
}
