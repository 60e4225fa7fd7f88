import { vi } from "vitest";
import { Logger, LogLevel } from "@operator/utils";

/**
 * Create a silent logger for tests
 * This is a real logger with LogLevel.NONE - no output
 */
export function createSilentLogger(context?: string): Logger {
  return Logger.createFresh({
    level: LogLevel.NONE,
    ...(context ? { context } : {}),
  });
}

/**
 * Create a Logger whose output methods are spies
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * await resolver.resolve("/docs");
 * expect(logger.warn).toHaveBeenCalled();
 * ```
 */
export function createMockLogger(): Logger {
  const logger = createSilentLogger();
  for (const method of [
    "silly",
    "verbose",
    "debug",
    "info",
    "warn",
    "error",
  ] as const) {
    vi.spyOn(logger, method);
  }
  vi.spyOn(logger, "child").mockReturnValue(logger);
  return logger;
}
