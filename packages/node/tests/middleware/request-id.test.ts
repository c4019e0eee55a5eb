/**
 * Tests for request ID middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "../setup.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("requestIdMiddleware", () => {
  it("echoes a well-formed incoming ID", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", { headers: { "X-Request-Id": "abc-123" } });

    expect(res.headers.get("X-Request-Id")).toBe("abc-123");
  });

  it("assigns a UUID when none is sent", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });

  it("replaces an ID with unsafe characters", async () => {
    const { app } = createTestApp();

    const res = await app.request("/health", {
      headers: { "X-Request-Id": "bad/id?x=1" },
    });

    expect(res.headers.get("X-Request-Id")).toMatch(UUID);
  });

  it("is set on error responses too", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/status", { headers: { "X-Request-Id": "req-err" } });

    expect(res.status).toBe(401);
    expect(res.headers.get("X-Request-Id")).toBe("req-err");
  });
});
