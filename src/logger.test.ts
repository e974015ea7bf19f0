import { afterEach, describe, it, expect } from "vitest";
import { formatPrefix, getLogLevel, installConsoleLogger, restoreConsole, setLogLevel, shouldLog } from "./logger.js";

describe("logger", () => {
  afterEach(() => {
    restoreConsole();
    setLogLevel("info");
  });

  it("prefixes lines with timestamp and level", () => {
    expect(formatPrefix("warn", new Date("2026-01-02T03:04:05.000Z"))).toBe("[2026-01-02T03:04:05.000Z] [WARN]");
  });

  it("filters below the current level", () => {
    setLogLevel("warn");
    expect(getLogLevel()).toBe("warn");
    expect(shouldLog("info")).toBe(false);
    expect(shouldLog("warn")).toBe(true);
    expect(shouldLog("error")).toBe(true);
  });

  it("wraps the console once and can undo it", () => {
    const before = console.info;
    installConsoleLogger("debug");
    const wrapped = console.info;
    expect(wrapped).not.toBe(before);
    expect(getLogLevel()).toBe("debug");

    installConsoleLogger("error");
    expect(console.info).toBe(wrapped);
    expect(getLogLevel()).toBe("error");

    restoreConsole();
    expect(console.info).not.toBe(wrapped);
  });
});
