import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ logLevel: "warn", cacheSize: 65536, maxInputLength: 500 });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ LOG_LEVEL: "  ", DICEMATH_CACHE_SIZE: "" }).cacheSize).toBe(65536);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      DICEMATH_CACHE_SIZE: "128",
      DICEMATH_MAX_INPUT: " 80 ",
    });

    expect(config).toEqual({ logLevel: "debug", cacheSize: 128, maxInputLength: 80 });
  });

  it("rejects an unknown log level", () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: "loud" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].startsWith("LOG_LEVEL: ")).toBe(true);
    }
  });

  it("rejects non-positive sizes", () => {
    expect(() => loadConfig({ DICEMATH_CACHE_SIZE: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ DICEMATH_MAX_INPUT: "-4" })).toThrow(ConfigError);
    expect(() => loadConfig({ DICEMATH_CACHE_SIZE: "lots" })).toThrow(ConfigError);
  });
});
