import type { ContentIndex } from "@operator/content-resolver";
import { essence, type MediaType } from "@operator/media-type";
import { FAILURE_KINDS, z, type ZodType } from "@operator/utils";
import type { RenderContext } from "./types";

const contentIndexSchema: ZodType<ContentIndex> = z.lazy(() =>
  z.record(z.union([z.string(), contentIndexSchema])),
);

/**
 * Wire form of a render context, as seen by templates and executables
 */
export const renderDataSchema = z
  .object({
    "/": contentIndexSchema,
    request: z.object({
      route: z.string().startsWith("/"),
      headers: z.record(z.string()),
      "query-parameters": z.record(z.string()),
    }),
    "server-info": z.object({
      "socket-address": z.string().nullable(),
      "operator-path": z.string(),
      version: z.string(),
    }),
    "target-media-type": z.string().nullable(),
    error: z
      .object({
        kind: z.enum(FAILURE_KINDS),
        message: z.string(),
        "status-code": z.number().int(),
      })
      .optional(),
  })
  .strict();

export type RenderData = z.infer<typeof renderDataSchema>;

/**
 * Wire form of a context. `targetMediaType` is the media type of the content
 * being rendered, when there is one.
 */
export function toRenderData(
  context: RenderContext,
  targetMediaType?: MediaType,
): RenderData {
  const data: RenderData = {
    "/": context.index,
    request: {
      route: context.request.route,
      headers: { ...context.request.headers },
      "query-parameters": { ...context.request.query },
    },
    "server-info": {
      "socket-address": context.serverInfo.socketAddress,
      "operator-path": context.serverInfo.operatorPath,
      version: context.serverInfo.version,
    },
    "target-media-type":
      targetMediaType === undefined ? null : essence(targetMediaType),
  };

  if (context.error) {
    data.error = {
      kind: context.error.kind,
      message: context.error.message,
      "status-code": context.error.statusCode,
    };
  }
  return data;
}

/**
 * Single-line JSON of the wire form, as handed to executables
 */
export function serialize(
  context: RenderContext,
  targetMediaType?: MediaType,
): string {
  return JSON.stringify(toRenderData(context, targetMediaType));
}

/**
 * Parse and validate serialized render data
 */
export function parseRenderData(text: string): RenderData {
  return renderDataSchema.parse(JSON.parse(text));
}
