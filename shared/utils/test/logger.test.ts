import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, LogLevel, parseLogLevel } from "../src/logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should carry level and stderr output over to children", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = Logger.createFresh({
      level: LogLevel.WARN,
      useStderr: true,
    });

    const child = logger.child("cli");
    child.info("ignored");
    child.warn("kept");

    expect(child.getLevel()).toBe(LogLevel.WARN);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should not log below the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = Logger.createFresh({ level: LogLevel.WARN });

    logger.info("ignored");
    logger.warn("kept");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should prefix messages with the child context", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = Logger.createFresh({ level: LogLevel.INFO });

    logger.child("resolver").info("hello");

    const [message] = info.mock.calls[0] ?? [];
    expect(message).toMatch(/^\[[^\]]+\] \[resolver\] hello$/);
  });

  it("should nest child contexts", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = Logger.createFresh({ level: LogLevel.INFO, context: "core" });

    logger.child("dispatcher").info("hello");

    const [message] = info.mock.calls[0] ?? [];
    expect(message).toMatch(/\[core:dispatcher\] hello$/);
  });

  it("should send every level to stderr when useStderr is set", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = Logger.createFresh({
      level: LogLevel.DEBUG,
      useStderr: true,
    });

    logger.debug("one");
    logger.info("two");

    expect(error).toHaveBeenCalledTimes(2);
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it("should stay silent at LogLevel.NONE", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = Logger.createFresh({ level: LogLevel.NONE });

    logger.error("nothing");

    expect(error).not.toHaveBeenCalled();
  });
});

describe("parseLogLevel", () => {
  it("should parse level names case-insensitively", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("WARN")).toBe(LogLevel.WARN);
    expect(parseLogLevel("none")).toBe(LogLevel.NONE);
  });

  it("should return undefined for unknown names", () => {
    expect(parseLogLevel("loud")).toBeUndefined();
  });
});
