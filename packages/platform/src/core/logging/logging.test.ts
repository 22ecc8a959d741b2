import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger, currentLogLevel } from "./index.js";

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("createLogger()", () => {
  it("writes one JSON record with level, context and data", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("http").info("Received HTTP 200 response", { status: 200 });

    expect(spy).toHaveBeenCalledOnce();
    expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
      level: "info",
      context: "http",
      message: "Received HTTP 200 response",
      status: 200,
    });
  });

  it("routes warnings to console.warn", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("http").warn("Received HTTP 404 response");

    expect(JSON.parse(String(spy.mock.calls[0][0])).level).toBe("warn");
  });

  it("drops debug records in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("SATKIT_LOG_LEVEL", "");
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    createLogger("tasks").debug("Polling task");

    expect(spy).not.toHaveBeenCalled();
  });

  it("honours SATKIT_LOG_LEVEL over NODE_ENV", () => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("SATKIT_LOG_LEVEL", "DEBUG");
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    createLogger("tasks").debug("Polling task");

    expect(currentLogLevel()).toBe("debug");
    expect(spy).toHaveBeenCalledOnce();
  });

  it("suppresses info when the level is warn", () => {
    vi.stubEnv("SATKIT_LOG_LEVEL", "warn");
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("config").info("Saved configuration");

    expect(spy).not.toHaveBeenCalled();
  });
});
