import { describe, it, expect } from "vitest";

import { loadConfig } from "../src/config";
import { resolveLogLevel } from "../src/logger";

describe("loadConfig", () => {
  it("uses development defaults", () => {
    expect(loadConfig({ NODE_ENV: "development" })).toEqual({
      port: 3333,
      host: "0.0.0.0",
      dbPath: "./data/tabsync.db",
      apiKey: undefined,
      decodeErrorPolicy: "skip",
      nodeEnv: "development",
    });
  });

  it("requires an explicit database path in production", () => {
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow(
      "TABSYNC_DB_PATH must be set in non-dev environments."
    );
  });

  it("falls back to DB_PATH", () => {
    const config = loadConfig({ NODE_ENV: "production", DB_PATH: "/data/tabs.db" });
    expect(config.dbPath).toBe("/data/tabs.db");
  });

  it("prefers TABSYNC_DB_PATH over DB_PATH", () => {
    const config = loadConfig({ TABSYNC_DB_PATH: "/data/a.db", DB_PATH: "/data/b.db" });
    expect(config.dbPath).toBe("/data/a.db");
  });

  it("ignores a non-numeric port", () => {
    expect(loadConfig({ PORT: "abc" }).port).toBe(3333);
    expect(loadConfig({ PORT: "8080" }).port).toBe(8080);
  });

  it("treats a blank api key as unset", () => {
    expect(loadConfig({ TABSYNC_API_KEY: "   " }).apiKey).toBeUndefined();
    expect(loadConfig({ TABSYNC_API_KEY: "test-secret" }).apiKey).toBe("test-secret");
  });

  it("accepts only known decode error policies", () => {
    expect(loadConfig({ TABSYNC_DECODE_ERROR_POLICY: "abort" }).decodeErrorPolicy).toBe("abort");
    expect(() => loadConfig({ TABSYNC_DECODE_ERROR_POLICY: "panic" })).toThrow(
      'TABSYNC_DECODE_ERROR_POLICY must be "skip" or "abort", got "panic"'
    );
  });
});

describe("resolveLogLevel", () => {
  it("honours LOG_LEVEL first", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "warn", NODE_ENV: "test" })).toBe("warn");
  });

  it("is silent under test and info in production", () => {
    expect(resolveLogLevel({ NODE_ENV: "test" })).toBe("silent");
    expect(resolveLogLevel({ NODE_ENV: "production" })).toBe("info");
    expect(resolveLogLevel({})).toBe("debug");
  });
});
