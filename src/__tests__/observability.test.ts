/**
 * Tests for the loggers.
 */

import { describe, it, expect, vi } from "vitest";
import { ConsoleLogger, InMemoryLogger, LogLevel, NoopLogger, parseLogLevel } from "../observability/index.js";

describe("ConsoleLogger", () => {
  it("should write JSON lines with redacted secrets", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ format: "json", context: { component: "publisher" } });

    logger.info("Batch sent", { token: "test-secret", count: 2, auth: { password: "test-secret", user: "demo" } });

    expect(log).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: "INFO",
      message: "Batch sent",
      component: "publisher",
      token: "[REDACTED]",
      count: 2,
      auth: { password: "[REDACTED]", user: "demo" },
    });
  });

  it("should send warnings to stderr and skip levels below the threshold", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Info, format: "json" });

    logger.debug("hidden");
    logger.warn("Pull failed", { error: new TypeError("boom") });

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(error.mock.calls[0]?.[0]))).toMatchObject({
      level: "WARN",
      error: { name: "TypeError", message: "boom" },
    });
  });

  it("should carry parent context into children", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ format: "pretty", context: { projectId: "demo" } }).child({ topic: "orders" });

    logger.info("Publisher created");

    expect(String(log.mock.calls[0]?.[0])).toMatch(/ INFO: Publisher created \{"projectId":"demo","topic":"orders"\}$/);
  });
});

describe("InMemoryLogger", () => {
  it("should share entries with its children", () => {
    const logger = new InMemoryLogger({ projectId: "demo" });
    const child = logger.child({ subscription: "orders-sub" });

    logger.info("Client ready");
    child.warn("Ack failed", { ackId: "ack-1" });

    expect(logger.getLogs().map((entry) => entry.message)).toEqual(["Client ready", "Ack failed"]);
    expect(logger.getLogsByLevel(LogLevel.Warn)[0]?.context).toEqual({
      projectId: "demo",
      subscription: "orders-sub",
      ackId: "ack-1",
    });

    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe("NoopLogger", () => {
  it("should return itself as a child", () => {
    const logger = new NoopLogger();
    expect(logger.child()).toBe(logger);
  });
});

describe("parseLogLevel", () => {
  it("should accept level names in any case", () => {
    expect(parseLogLevel("DEBUG")).toBe(LogLevel.Debug);
    expect(parseLogLevel("warning")).toBe(LogLevel.Warn);
    expect(parseLogLevel("loud")).toBeUndefined();
  });
});
