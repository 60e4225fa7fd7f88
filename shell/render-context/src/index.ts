export { build, withError } from "./render-context";
export {
  parseRenderData,
  renderDataSchema,
  serialize,
  toRenderData,
} from "./render-data";
export type { RenderData } from "./render-data";
export type {
  ErrorInfo,
  HeaderInput,
  QueryInput,
  RenderContext,
  RequestInfo,
  ServerInfo,
} from "./types";
