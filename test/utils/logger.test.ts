import { afterEach, describe, expect, it, vi } from "vitest";
import { getLogLevel, isLogLevel, log, setLogLevel } from "../../src/utils/logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("recognizes only its own level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
  });

  it("writes scoped lines at or above the current level to stderr", () => {
    const lines: string[] = [];
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      lines.push(line);
    });
    setLogLevel("warn");
    expect(getLogLevel()).toBe("warn");

    const logger = log.child("planner").child("replan");
    logger.info("hidden");
    logger.warn("Plan rejected", { tasks: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\S+ \[WARN\] \[planner:replan\] Plan rejected \{"tasks":2\}$/);
  });

  it("stays quiet when silent", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("silent");
    log.error("nobody hears this");
    expect(spy).not.toHaveBeenCalled();
  });
});
