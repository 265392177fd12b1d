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

  it("prints debug messages at debug level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new Logger("debug").debug("details");
    expect(log).toHaveBeenCalledWith("[DEBUG] details");
  });

  it("always prints errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const cause = new Error("cause");
    new Logger("error").error("failed", cause);
    expect(error).toHaveBeenNthCalledWith(1, "[ERROR] failed");
    expect(error).toHaveBeenNthCalledWith(2, cause);
  });
});
