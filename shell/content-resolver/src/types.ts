import type { MediaRange, MediaType } from "@operator/media-type";
import type { RenderStrategy } from "./naming";

/**
 * How a source matched the route: by full file name, by logical name, or as
 * the index of the directory the route names
 */
export type Specificity = "exact" | "annotated" | "index";

export interface ContentSource {
  absolutePath: string;
  /** Path below the content directory, `/`-separated */
  relativePath: string;
  /** Normalized route the source was resolved for */
  route: string;
  logicalName: string;
  mediaType: MediaType;
  strategy: RenderStrategy;
  specificity: Specificity;
  hidden: boolean;
}

export interface ResolveOptions {
  /** Acceptable media types, best first. Absent means no preference. */
  preferences?: readonly MediaRange[] | undefined;
  /** Internal resolution may see hidden content */
  internal?: boolean | undefined;
}
