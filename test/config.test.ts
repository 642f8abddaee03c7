import { describe, expect, it } from "vitest";
import { configFromEnv, configure, defaults, getConfig, resetConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("config", () => {
  it("merges overrides over the defaults", () => {
    configure({ limits: { maxRevisions: 5 }, sandbox: { artifactExtensions: [".png"] } });
    expect(getConfig().limits.maxRevisions).toBe(5);
    expect(getConfig().limits.maxCycles).toBe(defaults.limits.maxCycles);
    expect(getConfig().sandbox.artifactExtensions).toEqual([".png"]);
  });

  it("resets to the defaults", () => {
    configure({ model: { name: "other" } });
    resetConfig();
    expect(getConfig()).toEqual(defaults);
  });

  it("leaves the frozen defaults alone", () => {
    configure({ search: { maxResults: 1 } });
    expect(defaults.search.maxResults).toBe(5);
  });
});

describe("configFromEnv", () => {
  it("reads the recognized variables", () => {
    configure(
      configFromEnv({
        LLM_PROVIDER: "Anthropic",
        LLM_MODEL: "claude-test",
        MAX_REVISIONS: "4",
        MAX_CYCLES: "12",
        SEARCH_MAX_RESULTS: "8",
        PYTHON_BIN: "/usr/bin/python3.12",
      }),
    );
    const config = getConfig();
    expect(config.model).toMatchObject({ provider: "anthropic", name: "claude-test" });
    expect(config.limits).toMatchObject({ maxRevisions: 4, maxCycles: 12 });
    expect(config.search.maxResults).toBe(8);
    expect(config.sandbox.pythonBin).toBe("/usr/bin/python3.12");
  });

  it("keeps defaults for unset variables", () => {
    configure(configFromEnv({}));
    expect(getConfig()).toEqual(defaults);
  });

  it("rejects an unknown provider and bad integers", () => {
    expect(() => configFromEnv({ LLM_PROVIDER: "mystery" })).toThrow(ConfigError);
    expect(() => configFromEnv({ MAX_REVISIONS: "two" })).toThrow('MAX_REVISIONS must be a non-negative integer, got "two"');
    expect(() => configFromEnv({ MAX_CYCLES: "-1" })).toThrow(ConfigError);
  });
});
