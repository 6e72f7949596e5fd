import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = new Logger("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] shown");
  });

  it("prefixes scoped messages, nesting scopes", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    const logger = new Logger("debug").scoped("build").scoped("compile");
    logger.debug("app/main.py -> app/main.pyc");

    expect(log).toHaveBeenCalledWith("[DEBUG] build/compile: app/main.py -> app/main.pyc");
  });

  it("reports whether a level is enabled", () => {
    const logger = new Logger("info");
    expect(logger.isEnabled("debug")).toBe(false);
    expect(logger.isEnabled("error")).toBe(true);
  });
});
