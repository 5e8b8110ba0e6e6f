import { describe, expect, it } from "vitest";
import { DEFAULT_CHUNK_SIZE, resolveChunkSize, resolveLogLevel } from "./config";
import { ConfigError } from "./utils/errors";
import { LogLevel } from "./utils/logger";

describe("resolveChunkSize", () => {
  it("should fall back to the default", () => {
    expect(resolveChunkSize(undefined, {})).toBe(DEFAULT_CHUNK_SIZE);
    expect(DEFAULT_CHUNK_SIZE).toBe(4000);
  });

  it("should prefer an explicit value over the environment", () => {
    const env = { MDCHUNK_CHUNK_SIZE: "800" };

    expect(resolveChunkSize(undefined, env)).toBe(800);
    expect(resolveChunkSize("1200", env)).toBe(1200);
    expect(resolveChunkSize(300, env)).toBe(300);
  });

  it("should reject values that are not positive integers", () => {
    expect(() => resolveChunkSize("abc", {})).toThrow(ConfigError);
    expect(() => resolveChunkSize("abc", {})).toThrow('Invalid chunk size "abc": must be a number');
    expect(() => resolveChunkSize("0", {})).toThrow("must be greater than zero");
    expect(() => resolveChunkSize("2.5", {})).toThrow("must be a whole number");
  });
});

describe("resolveLogLevel", () => {
  it("should read the level from the environment", () => {
    expect(resolveLogLevel({ MDCHUNK_LOG_LEVEL: "debug" })).toBe(LogLevel.DEBUG);
    expect(resolveLogLevel({})).toBeUndefined();
  });

  it("should reject unknown levels", () => {
    expect(() => resolveLogLevel({ MDCHUNK_LOG_LEVEL: "loud" })).toThrow(
      'Invalid log level "loud"',
    );
  });
});
