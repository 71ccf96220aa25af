/**
 * Logger Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { createLogger, formatLog, getLogLevel, levelFromEnv, setLogLevel, type LogLevel } from "../logger";

describe("levelFromEnv", () => {
  it("reads LOG_LEVEL case-insensitively", () => {
    expect(levelFromEnv({ LOG_LEVEL: " Warn " })).toBe("warn");
  });

  it("falls back to DEBUG, then info", () => {
    expect(levelFromEnv({ LOG_LEVEL: "verbose", DEBUG: "1" })).toBe("debug");
    expect(levelFromEnv({})).toBe("info");
  });
});

describe("formatLog", () => {
  it("prefixes time, level and module", () => {
    expect(
      formatLog({
        timestamp: "2026-01-15T12:00:00.123Z",
        level: "warn",
        module: "Actions",
        message: "slow request",
      })
    ).toBe("[12:00:00.123] [WARN ] [Actions] slow request");
  });
});

describe("createLogger", () => {
  let initial: LogLevel;
  let logSpy: MockInstance;
  let warnSpy: MockInstance;

  beforeEach(() => {
    initial = getLogLevel();
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("drops messages below the active level", () => {
    setLogLevel("warn");
    const log = createLogger("Test");

    log.info("hidden");
    log.warn("shown");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0]?.[0])).toMatch(/\[WARN \] \[Test\] shown$/);
  });

  it("passes data as a second argument only when given", () => {
    setLogLevel("debug");
    const log = createLogger("Test");

    log.debug("plain");
    log.info("with data", { id: 1 });

    expect(logSpy.mock.calls[0]).toHaveLength(1);
    expect(logSpy.mock.calls[1]?.[1]).toEqual({ id: 1 });
  });
});
