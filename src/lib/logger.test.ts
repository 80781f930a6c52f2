// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    window.__errorLog = undefined;
  });

  it("prefixes messages with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("picker").warn("heads up", 3);
    expect(warn).toHaveBeenCalledWith("[picker]", "heads up", 3);
  });

  it("drops debug output outside development", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.stubEnv("DEV", false);
    createLogger("picker").debug("hidden");
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv("DEV", true);
    createLogger("picker").debug("shown");
    expect(debug).toHaveBeenCalledWith("[picker]", "shown");
  });

  it("records errors with their scope and cause", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("picker").error("map failed", new Error("no webgl"));

    expect(error).toHaveBeenCalledWith("[picker]", "map failed", "no webgl");
    expect(window.__errorLog).toHaveLength(1);
    expect(window.__errorLog?.[0]).toMatchObject({
      scope: "picker",
      message: "map failed",
      cause: "no webgl",
    });
    expect(window.__errorLog?.[0].stack).toContain("no webgl");
  });

  it("records errors logged without a cause", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("estimate").error("request failed");

    expect(error).toHaveBeenCalledWith("[estimate]", "request failed", "");
    expect(window.__errorLog?.[0]).toEqual(
      expect.objectContaining({ scope: "estimate", message: "request failed", cause: undefined }),
    );
  });

  it("keeps only the most recent twenty errors", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("picker");
    for (let i = 1; i <= 25; i++) logger.error(`failure ${i}`);

    expect(window.__errorLog).toHaveLength(20);
    expect(window.__errorLog?.[0].message).toBe("failure 6");
    expect(window.__errorLog?.[19].message).toBe("failure 25");
  });
});
