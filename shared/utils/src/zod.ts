/**
 * Centralized Zod exports for the workspace.
 *
 * IMPORTANT: Do not use wildcard exports here as they cause TypeScript to load
 * all of Zod's complex types, creating millions of type instantiations.
 */

export { z, ZodError } from "zod";

export type { ZodType } from "zod";
