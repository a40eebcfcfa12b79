/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(8000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.SERVICE_NAME).toBe("GL Stream");
    expect(config.SERVICE_VERSION).toBe("1.0.0");
    expect(config.RANDOM_SEED).toBe(42);
    expect(config.FIXED_START_DATE).toBe("2025-11-10");
    expect(config.HISTORICAL_DAYS).toBe(365);
    expect(config.STREAMING_INTERVAL_MS).toBe(30000);
    expect(config.BATCH_LIMIT_MAX).toBe(10000);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      RANDOM_SEED: "7",
      FIXED_START_DATE: "2024-02-29",
      HISTORICAL_DAYS: "0",
      STREAMING_INTERVAL_MS: "1000",
    });

    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.RANDOM_SEED).toBe(7);
    expect(config.FIXED_START_DATE).toBe("2024-02-29");
    expect(config.HISTORICAL_DAYS).toBe(0);
    expect(config.STREAMING_INTERVAL_MS).toBe(1000);
  });

  it("rejects a start date that is not a calendar date", () => {
    expect(() => loadConfig({ FIXED_START_DATE: "2025-02-30" })).toThrow(
      "FIXED_START_DATE must be a calendar date",
    );
  });

  it("rejects a lookback window over ten years", () => {
    expect(() => loadConfig({ HISTORICAL_DAYS: "3651" })).toThrow();
  });

  it("bounds the streaming interval to what a timer can hold", () => {
    expect(loadConfig({ STREAMING_INTERVAL_MS: "2147483647" }).STREAMING_INTERVAL_MS).toBe(
      2_147_483_647,
    );
    expect(() => loadConfig({ STREAMING_INTERVAL_MS: "3000000000" })).toThrow();
    expect(() => loadConfig({ STREAMING_INTERVAL_MS: "0" })).toThrow();
  });

  it("rejects a non-numeric seed", () => {
    expect(() => loadConfig({ RANDOM_SEED: "abc" })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
