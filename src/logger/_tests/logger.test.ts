import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger, setLogLevel, getLogLevel, parseLogLevel } from "../../logger";

describe("logger", () => {
  const origLevel = getLogLevel();
  beforeEach(() => {
    setLogLevel("trace");
  });
  afterEach(() => {
    setLogLevel(origLevel);
    vi.restoreAllMocks();
  });

  it("respects log levels and formats output", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    logger.info("hello", 123);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toMatch(/\[INFO\] hello 123/);
  });

  it("can silence lower levels", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => { /* no-op */ });
    logger.debug("nope");
    logger.error("boom");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalled();
  });

  it("parses level names from the environment", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });
});
