export { ContentResolver } from "./resolver";
export type { ContentResolverOptions } from "./resolver";
export type { ContentIndex } from "./content-index";
export {
  isHiddenRoute,
  isHiddenSegment,
  normalizeRoute,
  routeSegments,
} from "./route";
export { parseContentFileName, TEMPLATE_EXTENSION } from "./naming";
export type {
  ContentFileName,
  ContentFileNameResult,
  RenderStrategy,
} from "./naming";
export type { ContentSource, ResolveOptions, Specificity } from "./types";
export {
  AmbiguousContentError,
  ForbiddenError,
  InvalidRouteError,
  NotFoundError,
} from "./errors";
