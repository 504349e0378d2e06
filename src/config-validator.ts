import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - Tradier base URL and symbol feed URL are absolute http(s) URLs
 * - Timeouts and intervals are positive integers
 * - Batch size is in valid range (1-1000, Tradier's multi-symbol ceiling)
 * - Max concurrency is in valid range (1-64)
 * - Rate limit is positive
 * - Tradier token is set (warning — snapshot stays empty without it)
 * - API key is at least 16 characters (warning if shorter)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  if (!isHttpUrl(cfg.tradier.baseUrl)) {
    errors.push(`Tradier base URL must be an http(s) URL, got "${cfg.tradier.baseUrl}"`);
  }

  if (!isHttpUrl(cfg.symbols.feedUrl)) {
    errors.push(`Symbol feed URL must be an http(s) URL, got "${cfg.symbols.feedUrl}"`);
  }

  if (!isPositiveInteger(cfg.tradier.timeoutMs)) {
    errors.push(`tradier.timeoutMs must be positive, got ${cfg.tradier.timeoutMs}`);
  }

  if (!isPositiveInteger(cfg.tradier.rateLimit)) {
    errors.push(`tradier.rateLimit must be positive, got ${cfg.tradier.rateLimit}`);
  }

  if (!isPositiveInteger(cfg.symbols.timeoutMs)) {
    errors.push(`symbols.timeoutMs must be positive, got ${cfg.symbols.timeoutMs}`);
  }

  if (!isPositiveInteger(cfg.symbols.refreshIntervalMs)) {
    errors.push(`symbols.refreshIntervalMs must be positive, got ${cfg.symbols.refreshIntervalMs}`);
  }

  if (!Number.isInteger(cfg.snapshot.batchSize) || cfg.snapshot.batchSize < 1 || cfg.snapshot.batchSize > 1000) {
    errors.push(`snapshot.batchSize must be between 1 and 1000, got ${cfg.snapshot.batchSize}`);
  }

  if (!Number.isInteger(cfg.snapshot.maxConcurrency) || cfg.snapshot.maxConcurrency < 1 || cfg.snapshot.maxConcurrency > 64) {
    errors.push(`snapshot.maxConcurrency must be between 1 and 64, got ${cfg.snapshot.maxConcurrency}`);
  }

  if (!isPositiveInteger(cfg.snapshot.refreshIntervalMs)) {
    errors.push(`snapshot.refreshIntervalMs must be positive, got ${cfg.snapshot.refreshIntervalMs}`);
  }

  if (!Number.isInteger(cfg.snapshot.startupDelayMs) || cfg.snapshot.startupDelayMs < 0) {
    errors.push(`snapshot.startupDelayMs must be zero or positive, got ${cfg.snapshot.startupDelayMs}`);
  }

  if (!cfg.tradier.apiToken) {
    warnings.push("TRADIER_API_TOKEN not set — quote snapshot will stay empty");
  }

  // Warn if API key is too short (non-fatal, but insecure)
  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}
