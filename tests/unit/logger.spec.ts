import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger } from "../../src/logger";
import { environment } from "../../src/environment";
import {
  consoleLogger,
  formatLogLine,
  resetDevelopmentLogger,
  sanitizeComponentName,
  sanitizeLogMessage,
  setDevelopmentLogger,
} from "../../src/dev-logger";

afterEach(() => {
  resetDevelopmentLogger();
  environment.clearCache();
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("forwards to the installed sink in development", () => {
    environment.setExplicitEnv("development");
    const sink = vi.fn();
    setDevelopmentLogger(sink);
    createLogger("codec").warn("odd input", { n: 1 });
    expect(sink).toHaveBeenCalledWith("warn", "codec", "odd input", { n: 1 });
  });

  it("prefixes child component names", () => {
    environment.setExplicitEnv("development");
    const sink = vi.fn();
    setDevelopmentLogger(sink);
    createLogger("parser").child("query").info("hi");
    expect(sink).toHaveBeenCalledWith("info", "parser:query", "hi", undefined);
  });

  it("drops every call in production", () => {
    environment.setExplicitEnv("production");
    const sink = vi.fn();
    setDevelopmentLogger(sink);
    const log = createLogger("parser");
    log.debug("a");
    log.info("b");
    log.warn("c");
    log.error("d");
    expect(sink).not.toHaveBeenCalled();
  });

  it("writes one line to the console by default", () => {
    environment.setExplicitEnv("development");
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("parser").error("failed", { code: "ERR_X" });
    expect(spy).toHaveBeenCalledWith(
      '[ERROR] (parser) failed | context={"code":"ERR_X"}',
    );
  });
});

describe("log sanitization", () => {
  it("replaces unsafe component names", () => {
    expect(sanitizeComponentName("parser:query")).toBe("parser:query");
    expect(sanitizeComponentName("bad name")).toBe("unsafe-component-name");
    expect(sanitizeComponentName(".hidden")).toBe("unsafe-component-name");
    expect(sanitizeComponentName("")).toBe("unsafe-component-name");
  });

  it("strips control characters and truncates", () => {
    expect(sanitizeLogMessage("a\nb\u0007c")).toBe("a b c");
    const long = sanitizeLogMessage("x".repeat(2000));
    expect(long).toBe(`${"x".repeat(1024)}...[TRUNC]`);
  });

  it("formats lines without context", () => {
    expect(formatLogLine("debug", "codec", "hello")).toBe(
      "[DEBUG] (codec) hello",
    );
  });

  it("routes each level to the matching console method", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    consoleLogger("debug", "c", "1");
    consoleLogger("info", "c", "2");
    consoleLogger("warn", "c", "3");
    expect(debug).toHaveBeenCalledWith("[DEBUG] (c) 1");
    expect(info).toHaveBeenCalledWith("[INFO] (c) 2");
    expect(warn).toHaveBeenCalledWith("[WARN] (c) 3");
  });
});
