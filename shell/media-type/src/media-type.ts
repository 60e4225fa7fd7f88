import { getMimeType } from "hono/utils/mime";
import { MediaTypeParseError } from "./errors";

/**
 * A concrete media type such as `text/html`. See RFC 2046.
 */
export interface MediaType {
  readonly type: string;
  readonly subtype: string;
  readonly parameters: Readonly<Record<string, string>>;
}

/**
 * A media range from a preference list. `type` and `subtype` may be `*`.
 */
export interface MediaRange extends MediaType {
  /** Weight from the `q` parameter, between 0 and 1 */
  readonly quality: number;
}

export const APPLICATION_OCTET_STREAM: MediaType = {
  type: "application",
  subtype: "octet-stream",
  parameters: {},
};

const ANY_MEDIA_RANGE: MediaRange = {
  type: "*",
  subtype: "*",
  parameters: {},
  quality: 1,
};

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const QUALITY = /^(?:0(?:\.\d{0,3})?|1(?:\.0{0,3})?)$/;

/**
 * Split on a delimiter, ignoring delimiters inside quoted strings
 */
function splitOutsideQuotes(input: string, delimiter: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quoted = false;
  for (let index = 0; index < input.length; index++) {
    const character = input.charAt(index);
    if (character === "\\" && quoted) {
      current += character + input.charAt(index + 1);
      index++;
    } else if (character === '"') {
      quoted = !quoted;
      current += character;
    } else if (character === delimiter && !quoted) {
      parts.push(current);
      current = "";
    } else {
      current += character;
    }
  }
  parts.push(current);
  return parts;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, "$1");
  }
  return value;
}

interface ParsedParts {
  type: string;
  subtype: string;
  parameters: Array<[string, string]>;
}

function parseParts(input: string): ParsedParts {
  const [essence = "", ...rawParameters] = splitOutsideQuotes(input, ";");
  const [type, subtype, ...rest] = essence.trim().toLowerCase().split("/");

  if (
    type === undefined ||
    subtype === undefined ||
    rest.length > 0 ||
    !TOKEN.test(type) ||
    !TOKEN.test(subtype)
  ) {
    throw new MediaTypeParseError(`Malformed media type: "${input}"`, {
      input,
    });
  }

  const parameters: Array<[string, string]> = [];
  for (const rawParameter of rawParameters) {
    const trimmed = rawParameter.trim();
    if (trimmed === "") continue;
    const separator = trimmed.indexOf("=");
    const name = separator === -1 ? "" : trimmed.slice(0, separator).trim();
    const value = separator === -1 ? "" : trimmed.slice(separator + 1).trim();
    if (!TOKEN.test(name) || value === "") {
      throw new MediaTypeParseError(
        `Malformed parameter "${trimmed}" in media type "${input}"`,
        { input },
      );
    }
    parameters.push([name.toLowerCase(), unquote(value)]);
  }

  return { type, subtype, parameters };
}

/**
 * Parse a concrete media type. Wildcards are rejected.
 */
export function parseMediaType(input: string): MediaType {
  const { type, subtype, parameters } = parseParts(input);
  if (type === "*" || subtype === "*") {
    throw new MediaTypeParseError(
      `"${input}" is a media range, not a specific media type`,
      { input },
    );
  }
  return { type, subtype, parameters: Object.fromEntries(parameters) };
}

/**
 * Parse a media range with an optional `q` weight.
 * Parameters after `q` are accept-extensions and are dropped.
 */
export function parseMediaRange(input: string): MediaRange {
  const { type, subtype, parameters } = parseParts(input);
  if (type === "*" && subtype !== "*") {
    throw new MediaTypeParseError(`Malformed media range: "${input}"`, {
      input,
    });
  }

  const kept: Array<[string, string]> = [];
  let quality = 1;
  for (const [name, value] of parameters) {
    if (name === "q") {
      if (!QUALITY.test(value)) {
        throw new MediaTypeParseError(
          `Invalid quality value "${value}" in "${input}"`,
          { input },
        );
      }
      quality = Number(value);
      break;
    }
    kept.push([name, value]);
  }

  return { type, subtype, parameters: Object.fromEntries(kept), quality };
}

/**
 * Parse an Accept header value into media ranges ordered by descending
 * quality. Ranges with equal quality keep the order the client sent them in.
 * An empty value accepts anything.
 */
export function parseAcceptHeader(value: string): MediaRange[] {
  const entries = splitOutsideQuotes(value, ",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "");

  if (entries.length === 0) {
    return [ANY_MEDIA_RANGE];
  }

  return entries
    .map(parseMediaRange)
    .map((range, index) => ({ range, index }))
    .sort((a, b) => b.range.quality - a.range.quality || a.index - b.index)
    .map(({ range }) => range);
}

/**
 * `type/subtype` without parameters
 */
export function essence(mediaType: MediaType): string {
  return `${mediaType.type}/${mediaType.subtype}`;
}

export function formatMediaType(mediaType: MediaType): string {
  const parameters = Object.entries(mediaType.parameters).map(
    ([name, value]) =>
      TOKEN.test(value)
        ? `; ${name}=${value}`
        : `; ${name}="${value.replace(/(["\\])/g, "\\$1")}"`,
  );
  return essence(mediaType) + parameters.join("");
}

export function formatMediaRange(range: MediaRange): string {
  const formatted = formatMediaType(range);
  return range.quality === 1 ? formatted : `${formatted}; q=${range.quality}`;
}

/**
 * Media type for a file name extension (without the leading dot), or
 * undefined when the extension is unknown
 */
export function mediaTypeFromExtension(
  extension: string,
): MediaType | undefined {
  const guessed = getMimeType(`file.${extension.toLowerCase()}`);
  if (guessed === undefined) {
    return undefined;
  }
  const { type, subtype } = parseMediaType(guessed);
  return { type, subtype, parameters: {} };
}

/**
 * Whether two media types have the same type and subtype
 */
export function isSameEssence(a: MediaType, b: MediaType): boolean {
  return a.type === b.type && a.subtype === b.subtype;
}
