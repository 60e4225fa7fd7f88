import {
  APPLICATION_OCTET_STREAM,
  mediaTypeFromExtension,
  type MediaType,
} from "@operator/media-type";

export type RenderStrategy = "static" | "template" | "executable";

export const TEMPLATE_EXTENSION = "hbs";

export interface ContentFileName {
  logicalName: string;
  mediaType: MediaType;
  strategy: RenderStrategy;
}

export type ContentFileNameResult =
  | { valid: true; name: ContentFileName }
  | { valid: false; reason: string };

/**
 * Interpret a content file name:
 * `<logical-name>.<media-extension>[.<strategy-extension>]`
 *
 * - one extension: static, must not be executable
 * - `.hbs` second extension: template, must not be executable
 * - any other second extension: executable, must be executable
 */
export function parseContentFileName(
  fileName: string,
  executable: boolean,
): ContentFileNameResult {
  const prefix = fileName.startsWith(".") ? "." : "";
  const [stem = "", ...extensions] = fileName.slice(prefix.length).split(".");
  const logicalName = prefix + stem;

  if (stem === "") {
    return { valid: false, reason: "missing logical name" };
  }
  if (extensions.some((extension) => extension === "")) {
    return { valid: false, reason: "empty extension" };
  }

  const [mediaExtension, strategyExtension, ...extra] = extensions;

  if (mediaExtension === undefined) {
    return { valid: false, reason: "missing media type extension" };
  }
  if (extra.length > 0) {
    return { valid: false, reason: "too many extensions" };
  }

  const mediaType = mediaTypeFromExtension(mediaExtension);

  if (strategyExtension === undefined) {
    if (executable) {
      return { valid: false, reason: "static content must not be executable" };
    }
    return {
      valid: true,
      name: {
        logicalName,
        mediaType: mediaType ?? APPLICATION_OCTET_STREAM,
        strategy: "static",
      },
    };
  }

  if (mediaType === undefined) {
    return {
      valid: false,
      reason: `unknown media type extension "${mediaExtension}"`,
    };
  }

  if (strategyExtension.toLowerCase() === TEMPLATE_EXTENSION) {
    if (executable) {
      return { valid: false, reason: "templates must not be executable" };
    }
    return {
      valid: true,
      name: { logicalName, mediaType, strategy: "template" },
    };
  }

  if (!executable) {
    return {
      valid: false,
      reason: `".${strategyExtension}" files must be executable`,
    };
  }
  return {
    valid: true,
    name: { logicalName, mediaType, strategy: "executable" },
  };
}
