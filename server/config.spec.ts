import { describe, it, expect } from "vitest";
import { readCliDefaults } from "./config";
import { DEFAULT_USER_AGENT } from "./audit/types";

describe("readCliDefaults", () => {
  it("falls back to built-in defaults", () => {
    expect(readCliDefaults({})).toEqual({
      maxPages: 500,
      maxConcurrentFetches: 5,
      timeoutMs: 30000,
      userAgent: DEFAULT_USER_AGENT,
      requestDelayMs: 0,
      logLevel: "info",
      logPretty: false,
    });
  });

  it("reads crawl settings from the environment", () => {
    const defaults = readCliDefaults({
      CRAWL_MAX_PAGES: "25",
      CRAWL_CONCURRENCY: "2",
      CRAWL_TIMEOUT_MS: "5000",
      CRAWL_USER_AGENT: "test-agent/2.0",
      CRAWL_DELAY_MS: "250",
      LOG_LEVEL: "debug",
      LOG_PRETTY: "true",
    });

    expect(defaults).toEqual({
      maxPages: 25,
      maxConcurrentFetches: 2,
      timeoutMs: 5000,
      userAgent: "test-agent/2.0",
      requestDelayMs: 250,
      logLevel: "debug",
      logPretty: true,
    });
  });

  it("rejects values that are not positive integers", () => {
    expect(() => readCliDefaults({ CRAWL_MAX_PAGES: "0" })).toThrow();
    expect(() => readCliDefaults({ CRAWL_CONCURRENCY: "many" })).toThrow();
  });
});
