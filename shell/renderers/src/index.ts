export { StaticRenderer } from "./static-renderer";
export {
  DEFAULT_MAX_PASSES,
  TemplateRenderer,
} from "./template-renderer";
export type { TemplateRendererOptions } from "./template-renderer";
export {
  DEFAULT_EXECUTABLE_TIMEOUT_MS,
  ExecutableRenderer,
  RENDER_DATA_ENV,
} from "./executable-renderer";
export type { ExecutableRendererOptions } from "./executable-renderer";
export {
  ExecutableError,
  RecursionError,
  TemplateError,
} from "./errors";
export type {
  ExecutableFailure,
  RecursionReason,
  TemplateLocation,
} from "./errors";
export type { RenderInvocation, RenderResult, Renderer } from "./types";
