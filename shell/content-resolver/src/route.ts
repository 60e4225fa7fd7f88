import { InvalidRouteError } from "./errors";

/**
 * Canonical form of a route: rooted at `/`, single separators, no trailing
 * separator, no `.` or `..` segments
 */
export function normalizeRoute(input: string): string {
  if (input === "") {
    throw new InvalidRouteError(input, "route is empty");
  }
  if (!input.startsWith("/")) {
    throw new InvalidRouteError(input, "route must start with /");
  }
  if (input.includes("\0")) {
    throw new InvalidRouteError(input, "route contains a NUL byte");
  }

  const segments = input.split("/").filter((segment) => segment !== "");
  if (segments.some((segment) => segment === "." || segment === "..")) {
    throw new InvalidRouteError(input, "route contains a relative segment");
  }

  return `/${segments.join("/")}`;
}

/**
 * Segments of a normalized route; the root route has none
 */
export function routeSegments(route: string): string[] {
  return route.split("/").filter((segment) => segment !== "");
}

export function isHiddenSegment(segment: string): boolean {
  return segment.startsWith(".");
}

export function isHiddenRoute(route: string): boolean {
  return routeSegments(route).some(isHiddenSegment);
}
