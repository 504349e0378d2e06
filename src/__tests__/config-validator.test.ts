import { describe, it, expect } from "vitest";
import { validateConfig } from "../config-validator.js";
import type { AppConfig } from "../config.js";

function baseConfig(): AppConfig {
  return {
    tradier: {
      baseUrl: "https://api.tradier.com/v1",
      apiToken: "test-token",
      isSandbox: false,
      rateLimit: 120,
      rateWindowMs: 60_000,
      timeoutMs: 20_000,
    },
    symbols: {
      feedUrl: "https://feed.example.test/delo-download",
      timeoutMs: 30_000,
      refreshIntervalMs: 86_400_000,
    },
    snapshot: {
      batchSize: 860,
      refreshIntervalMs: 61_000,
      maxConcurrency: 8,
      startupDelayMs: 1000,
    },
    rest: {
      port: 3000,
      apiKey: "test-api-key-that-is-long-enough",
      allowOrigins: ["*"],
    },
  };
}

describe("validateConfig", () => {
  it("should pass validation for a valid config", () => {
    const result = validateConfig(baseConfig());
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("should return error for invalid REST port (too low)", () => {
    const config = baseConfig();
    config.rest.port = 0;
    expect(validateConfig(config).errors).toContain("REST port must be between 1 and 65535, got 0");
  });

  it("should return error for invalid REST port (too high)", () => {
    const config = baseConfig();
    config.rest.port = 65536;
    expect(validateConfig(config).errors).toContain("REST port must be between 1 and 65535, got 65536");
  });

  it("should reject non-http URLs", () => {
    const config = baseConfig();
    config.tradier.baseUrl = "ftp://api.tradier.com";
    config.symbols.feedUrl = "not a url";

    const { errors } = validateConfig(config);
    expect(errors).toContain('Tradier base URL must be an http(s) URL, got "ftp://api.tradier.com"');
    expect(errors).toContain('Symbol feed URL must be an http(s) URL, got "not a url"');
  });

  it("should bound batch size to Tradier's multi-symbol ceiling", () => {
    const config = baseConfig();
    config.snapshot.batchSize = 1001;
    expect(validateConfig(config).errors).toEqual(["snapshot.batchSize must be between 1 and 1000, got 1001"]);
  });

  it("should reject zero or NaN concurrency", () => {
    const config = baseConfig();
    config.snapshot.maxConcurrency = 0;
    expect(validateConfig(config).errors).toEqual(["snapshot.maxConcurrency must be between 1 and 64, got 0"]);

    config.snapshot.maxConcurrency = Number.NaN;
    expect(validateConfig(config).errors).toEqual(["snapshot.maxConcurrency must be between 1 and 64, got NaN"]);
  });

  it("should reject a non-positive refresh interval", () => {
    const config = baseConfig();
    config.snapshot.refreshIntervalMs = 0;
    expect(validateConfig(config).errors).toEqual(["snapshot.refreshIntervalMs must be positive, got 0"]);
  });

  it("should allow a zero startup delay but not a negative one", () => {
    const config = baseConfig();
    config.snapshot.startupDelayMs = 0;
    expect(validateConfig(config).errors).toEqual([]);

    config.snapshot.startupDelayMs = -5;
    expect(validateConfig(config).errors).toEqual(["snapshot.startupDelayMs must be zero or positive, got -5"]);
  });

  it("should warn when the Tradier token is missing", () => {
    const config = baseConfig();
    config.tradier.apiToken = "";
    const result = validateConfig(config);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["TRADIER_API_TOKEN not set — quote snapshot will stay empty"]);
  });

  it("should warn for a short API key but not an empty one", () => {
    const config = baseConfig();
    config.rest.apiKey = "short";
    expect(validateConfig(config).warnings).toEqual(["REST API key is only 5 characters (recommended: at least 16)"]);

    config.rest.apiKey = "";
    expect(validateConfig(config).warnings).toEqual([]);
  });
});
