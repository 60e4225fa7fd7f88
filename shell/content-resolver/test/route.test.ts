import { describe, it, expect } from "vitest";
import { isHiddenRoute, normalizeRoute, routeSegments } from "../src/route";
import { InvalidRouteError } from "../src/errors";

describe("normalizeRoute", () => {
  it("should collapse separators and strip the trailing one", () => {
    expect(normalizeRoute("//docs///guide/")).toBe("/docs/guide");
    expect(normalizeRoute("/")).toBe("/");
    expect(normalizeRoute("///")).toBe("/");
  });

  it("should be idempotent", () => {
    const once = normalizeRoute("/a//b/");
    expect(normalizeRoute(once)).toBe(once);
  });

  it("should reject routes that are not absolute", () => {
    expect(() => normalizeRoute("")).toThrow(InvalidRouteError);
    expect(() => normalizeRoute("home")).toThrow(InvalidRouteError);
  });

  it("should reject relative segments and NUL bytes", () => {
    expect(() => normalizeRoute("/a/../etc/passwd")).toThrow(
      InvalidRouteError,
    );
    expect(() => normalizeRoute("/./a")).toThrow(InvalidRouteError);
    expect(() => normalizeRoute("/a\0b")).toThrow(InvalidRouteError);
  });

  it("should report the InvalidRoute kind", () => {
    try {
      normalizeRoute("nope");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRouteError);
      if (error instanceof InvalidRouteError) {
        expect(error.kind).toBe("InvalidRoute");
        expect(error.context).toEqual({
          route: "nope",
          reason: "route must start with /",
        });
      }
    }
  });
});

describe("route helpers", () => {
  it("should split segments", () => {
    expect(routeSegments("/")).toEqual([]);
    expect(routeSegments("/a/b")).toEqual(["a", "b"]);
  });

  it("should detect hidden segments", () => {
    expect(isHiddenRoute("/.private/page")).toBe(true);
    expect(isHiddenRoute("/public/.draft")).toBe(true);
    expect(isHiddenRoute("/public/page")).toBe(false);
  });
});
