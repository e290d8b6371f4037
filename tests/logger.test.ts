import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, info, setLogLevel } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("visible");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  it("prefixes info lines with their level", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    info("always");
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(String(logSpy.mock.calls[0]?.[0])).toContain("[INFO] always");
  });

  it("writes errors to stderr", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    error("broken");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("rejects unknown levels", () => {
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
  });
});
