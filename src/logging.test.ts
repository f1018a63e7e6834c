import { describe, it, expect } from "vitest";
import { createLogger, resolveLogLevel } from "./logging.js";

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

describe("createLogger", () => {
  it("creates logger with the given name", () => {
    const log = createLogger("test-module");
    expect(log.settings.name).toBe("test-module");
  });

  it("maps custom minLevel correctly", () => {
    expect(createLogger("debug-module", "debug").settings.minLevel).toBe(2);
    expect(createLogger("error-module", "error").settings.minLevel).toBe(5);
    expect(createLogger("silly-module", "silly").settings.minLevel).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// resolveLogLevel
// ---------------------------------------------------------------------------

describe("resolveLogLevel", () => {
  it("falls back to info when unset", () => {
    expect(resolveLogLevel(undefined)).toBe(3);
  });

  it("is case-insensitive", () => {
    expect(resolveLogLevel("DEBUG")).toBe(2);
    expect(resolveLogLevel(" warn ")).toBe(4);
  });

  it("ignores unknown levels", () => {
    expect(resolveLogLevel("verbose")).toBe(3);
    expect(resolveLogLevel("toString")).toBe(3);
  });
});
