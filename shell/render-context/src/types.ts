import type { ContentIndex } from "@operator/content-resolver";
import type { FailureKind } from "@operator/utils";

export interface RequestInfo {
  readonly route: string;
  /** Lowercased header names */
  readonly headers: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, string>>;
}

export interface ServerInfo {
  /** `host:port` the server listens on, null outside the web server */
  readonly socketAddress: string | null;
  readonly operatorPath: string;
  readonly version: string;
}

export interface ErrorInfo {
  readonly kind: FailureKind;
  readonly message: string;
  readonly statusCode: number;
}

/**
 * Everything a renderer may know about the invocation. Immutable; error
 * handler dispatch derives a new context with the `error` zone set.
 */
export interface RenderContext {
  readonly request: RequestInfo;
  readonly serverInfo: ServerInfo;
  /** Every route of the content directory when the request started */
  readonly index: ContentIndex;
  readonly error?: ErrorInfo;
}

export type HeaderInput =
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string | readonly string[] | undefined>>;

export type QueryInput =
  | Iterable<readonly [string, string]>
  | Readonly<Record<string, string | undefined>>;
