import { describe, it, expect } from "vitest";
import {
  APPLICATION_OCTET_STREAM,
  essence,
  formatMediaRange,
  formatMediaType,
  mediaTypeFromExtension,
  parseAcceptHeader,
  parseMediaRange,
  parseMediaType,
} from "../src/media-type";
import { MediaTypeParseError } from "../src/errors";

describe("parseMediaType", () => {
  it("should parse type, subtype and parameters", () => {
    expect(parseMediaType("Text/HTML; Charset=utf-8")).toEqual({
      type: "text",
      subtype: "html",
      parameters: { charset: "utf-8" },
    });
  });

  it("should unquote quoted parameter values", () => {
    const mediaType = parseMediaType('text/plain; title="a;b \\"c\\""');
    expect(mediaType.parameters).toEqual({ title: 'a;b "c"' });
  });

  it("should reject wildcards", () => {
    expect(() => parseMediaType("text/*")).toThrow(MediaTypeParseError);
    expect(() => parseMediaType("*/*")).toThrow(MediaTypeParseError);
  });

  it("should reject malformed input", () => {
    expect(() => parseMediaType("")).toThrow(MediaTypeParseError);
    expect(() => parseMediaType("text")).toThrow(MediaTypeParseError);
    expect(() => parseMediaType("text/html/extra")).toThrow(
      MediaTypeParseError,
    );
    expect(() => parseMediaType("text/html; charset")).toThrow(
      MediaTypeParseError,
    );
  });
});

describe("parseMediaRange", () => {
  it("should default quality to 1", () => {
    expect(parseMediaRange("*/*")).toEqual({
      type: "*",
      subtype: "*",
      parameters: {},
      quality: 1,
    });
  });

  it("should read q and drop accept-extensions after it", () => {
    expect(parseMediaRange("text/html;level=1;q=0.5;ext=x")).toEqual({
      type: "text",
      subtype: "html",
      parameters: { level: "1" },
      quality: 0.5,
    });
  });

  it("should reject out-of-range quality values", () => {
    expect(() => parseMediaRange("text/html;q=1.5")).toThrow(
      MediaTypeParseError,
    );
    expect(() => parseMediaRange("text/html;q=abc")).toThrow(
      MediaTypeParseError,
    );
    expect(() => parseMediaRange("text/html;q=0.1234")).toThrow(
      MediaTypeParseError,
    );
  });

  it("should reject a wildcard type with a concrete subtype", () => {
    expect(() => parseMediaRange("*/html")).toThrow(MediaTypeParseError);
  });
});

describe("parseAcceptHeader", () => {
  it("should treat an empty header as accepting anything", () => {
    expect(parseAcceptHeader("")).toHaveLength(1);
    expect(parseAcceptHeader("  ").map(formatMediaRange)).toEqual(["*/*"]);
  });

  it("should order by quality and keep declaration order on ties", () => {
    const ranges = parseAcceptHeader(
      "text/plain;q=0.5, application/json, text/*;q=0.5, text/html",
    );

    expect(ranges.map(essence)).toEqual([
      "application/json",
      "text/html",
      "text/plain",
      "text/*",
    ]);
  });

  it("should ignore empty list elements", () => {
    expect(parseAcceptHeader("text/html,,").map(essence)).toEqual([
      "text/html",
    ]);
  });

  it("should fail on malformed entries", () => {
    expect(() => parseAcceptHeader("text/html, nonsense")).toThrow(
      MediaTypeParseError,
    );
  });
});

describe("formatting", () => {
  it("should format parameters and quote where needed", () => {
    expect(
      formatMediaType({
        type: "text",
        subtype: "plain",
        parameters: { charset: "utf-8", title: "a b" },
      }),
    ).toBe('text/plain; charset=utf-8; title="a b"');
  });

  it("should add q only when it is not 1", () => {
    expect(formatMediaRange(parseMediaRange("text/*;q=0.25"))).toBe(
      "text/*; q=0.25",
    );
    expect(formatMediaRange(parseMediaRange("text/*;q=1"))).toBe("text/*");
  });
});

describe("mediaTypeFromExtension", () => {
  it("should map known extensions without parameters", () => {
    expect(mediaTypeFromExtension("html")).toEqual({
      type: "text",
      subtype: "html",
      parameters: {},
    });
    expect(mediaTypeFromExtension("JSON")).toEqual({
      type: "application",
      subtype: "json",
      parameters: {},
    });
    expect(essence(mediaTypeFromExtension("css") ?? APPLICATION_OCTET_STREAM)).toBe(
      "text/css",
    );
  });

  it("should return undefined for unknown extensions", () => {
    expect(mediaTypeFromExtension("definitely-not-a-type")).toBeUndefined();
  });
});
