/**
 * Tests for config.ts: parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

const BASE_ENV = { WEBHOOK_SECRET: "test-secret" };

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated entries", () => {
    expect(parseApiKeys("k1:admin, k2:operator ,k3:viewer")).toEqual([
      { key: "k1", role: "admin" },
      { key: "k2", role: "operator" },
      { key: "k3", role: "viewer" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow(
      "Invalid API_KEYS entry #1. Expected format: key:role",
    );
    expect(() => parseApiKeys("k1:admin,a:b:c")).toThrow("Invalid API_KEYS entry #2");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:superuser")).toThrow('Invalid role "superuser"');
  });

  it("throws on a duplicate key without echoing it", () => {
    let message = "";
    try {
      parseApiKeys("dup-key:admin,dup-key:viewer");
    } catch (e: unknown) {
      message = e instanceof Error ? e.message : "";
    }
    expect(message).toBe("Duplicate API key in API_KEYS (entry #2)");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when only the secret is set", () => {
    const config = loadConfig(BASE_ENV);
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.CONFIRMATION_THRESHOLD).toBe(3);
    expect(config.QUEUE_CAPACITY).toBe(1000);
    expect(config.FAIL_TRADES_ON_EXHAUSTION).toBe(false);
    expect(config.RETRY_MAX_ATTEMPTS).toBe(5);
    expect(config.RETRY_INITIAL_DELAY_MS).toBe(2000);
    expect(config.RETRY_MAX_DELAY_MS).toBe(10000);
    expect(config.RETRY_MULTIPLIER).toBe(2);
    expect(config.DATA_DIR).toBeUndefined();
    expect(config.ADDRESS_BOOK_PATH).toBeUndefined();
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      ...BASE_ENV,
      PORT: "8080",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      CONFIRMATION_THRESHOLD: "6",
      FAIL_TRADES_ON_EXHAUSTION: "true",
      DATA_DIR: "/var/lib/escrowhook",
    });
    expect(config.PORT).toBe(8080);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.CONFIRMATION_THRESHOLD).toBe(6);
    expect(config.FAIL_TRADES_ON_EXHAUSTION).toBe(true);
    expect(config.DATA_DIR).toBe("/var/lib/escrowhook");
  });

  it("requires WEBHOOK_SECRET", () => {
    expect(() => loadConfig({})).toThrow("WEBHOOK_SECRET is required");
    expect(() => loadConfig({ WEBHOOK_SECRET: "" })).toThrow(
      "WEBHOOK_SECRET must not be empty",
    );
  });

  it("throws on invalid numbers", () => {
    expect(() => loadConfig({ ...BASE_ENV, PORT: "0" })).toThrow();
    expect(() => loadConfig({ ...BASE_ENV, PORT: "99999" })).toThrow();
    expect(() => loadConfig({ ...BASE_ENV, CONFIRMATION_THRESHOLD: "0" })).toThrow();
    expect(() => loadConfig({ ...BASE_ENV, QUEUE_CAPACITY: "-1" })).toThrow();
  });

  it("rejects a boolean flag that is not true or false", () => {
    expect(() => loadConfig({ ...BASE_ENV, FAIL_TRADES_ON_EXHAUSTION: "yes" })).toThrow();
  });
});
