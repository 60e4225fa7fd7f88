import { resolve } from "node:path";
import { normalizeRoute } from "@operator/content-resolver";
import {
  DEFAULT_EXECUTABLE_TIMEOUT_MS,
  DEFAULT_MAX_PASSES,
} from "@operator/renderers";
import { z } from "@operator/utils";

export const DEFAULT_MAX_RECURSION_DEPTH = 16;

/**
 * Operator configuration schema
 */
export const operatorConfigSchema = z.object({
  // Directory whose files are served
  contentDirectory: z.string().min(1),

  // Route rendered (with the error zone set) when a request fails
  errorHandlerRoute: z.string().optional(),

  // Route served for requests to "/"
  indexRoute: z.string().optional(),

  executableTimeoutMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_EXECUTABLE_TIMEOUT_MS),
  maxRecursionDepth: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_RECURSION_DEPTH),
  maxTemplatePasses: z.number().int().positive().default(DEFAULT_MAX_PASSES),

  // Reported to content as server-info
  operatorPath: z.string(),
  version: z.string(),
});

export type OperatorConfig = z.infer<typeof operatorConfigSchema>;
export type OperatorConfigInput = z.input<typeof operatorConfigSchema>;

/**
 * Validate configuration, make the content directory absolute and normalize
 * the configured routes
 */
export function createOperatorConfig(
  input: OperatorConfigInput,
): OperatorConfig {
  const config = operatorConfigSchema.parse(input);
  return {
    ...config,
    contentDirectory: resolve(config.contentDirectory),
    errorHandlerRoute:
      config.errorHandlerRoute === undefined
        ? undefined
        : normalizeRoute(config.errorHandlerRoute),
    indexRoute:
      config.indexRoute === undefined
        ? undefined
        : normalizeRoute(config.indexRoute),
  };
}
