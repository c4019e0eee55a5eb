/**
 * Tests for the retry engine.
 */

import { describe, it, expect, vi } from "vitest";
import { err, ok } from "@escrowhook/types";
import {
  DEFAULT_RETRY_POLICY,
  backoffSchedule,
  computeDelay,
  runWithRetry,
  validateRetryPolicy,
} from "../src/retry.js";
import type { RetryPolicy } from "../src/retry.js";

function recordingSleep() {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
}

describe("computeDelay / backoffSchedule", () => {
  it("doubles from 2s and caps at 10s by default", () => {
    expect(backoffSchedule(DEFAULT_RETRY_POLICY)).toEqual([2000, 4000, 8000, 10000, 10000]);
  });

  it("adds jitter within the cap", () => {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, jitterMs: 100 };
    expect(computeDelay(1, policy, () => 0.5)).toBe(2050);
    expect(computeDelay(4, policy, () => 0.5)).toBe(10000);
  });

  it("ignores jitter in the schedule", () => {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, jitterMs: 500, maxAttempts: 2 };
    expect(backoffSchedule(policy)).toEqual([2000, 4000]);
  });
});

describe("validateRetryPolicy", () => {
  it("accepts the default policy", () => {
    expect(() => validateRetryPolicy(DEFAULT_RETRY_POLICY)).not.toThrow();
  });

  it("rejects zero attempts and shrinking multipliers", () => {
    expect(() => validateRetryPolicy({ ...DEFAULT_RETRY_POLICY, maxAttempts: 0 }))
      .toThrow("maxAttempts");
    expect(() => validateRetryPolicy({ ...DEFAULT_RETRY_POLICY, multiplier: 0.5 }))
      .toThrow("multiplier");
    expect(() => validateRetryPolicy({ ...DEFAULT_RETRY_POLICY, initialDelayMs: -1 }))
      .toThrow(">= 0");
  });
});

describe("runWithRetry", () => {
  it("returns on first success without waiting", async () => {
    const { waits, sleep } = recordingSleep();
    const outcome = await runWithRetry(() => ok("done"), DEFAULT_RETRY_POLICY, { sleep });

    expect(outcome).toEqual({ ok: true, value: "done", attempts: 1, waits: [] });
    expect(waits).toEqual([]);
  });

  it("retries until success", async () => {
    const { waits, sleep } = recordingSleep();
    const step = vi.fn((attempt: number) =>
      attempt < 3 ? err(new Error(`fail-${attempt}`)) : ok(attempt),
    );

    const outcome = await runWithRetry(step, DEFAULT_RETRY_POLICY, { sleep });

    expect(outcome.ok).toBe(true);
    expect(outcome.attempts).toBe(3);
    expect(step).toHaveBeenCalledTimes(3);
    expect(waits).toEqual([2000, 4000]);
  });

  it("makes five attempts with four waits before giving up", async () => {
    const { waits, sleep } = recordingSleep();
    const step = vi.fn(() => err(new Error("store unavailable")));

    const outcome = await runWithRetry(step, DEFAULT_RETRY_POLICY, { sleep });

    expect(step).toHaveBeenCalledTimes(5);
    expect(waits).toEqual([2000, 4000, 8000, 10000]);
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(5);
    expect(outcome.waits).toEqual([2000, 4000, 8000, 10000]);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe("store unavailable");
    }
  });

  it("treats a thrown error as a failed attempt", async () => {
    const { sleep } = recordingSleep();
    let calls = 0;
    const outcome = await runWithRetry(
      () => {
        calls++;
        if (calls === 1) {
          throw new Error("boom");
        }
        return ok(calls);
      },
      DEFAULT_RETRY_POLICY,
      { sleep },
    );

    expect(outcome).toMatchObject({ ok: true, value: 2, attempts: 2 });
  });

  it("wraps non-Error throws", async () => {
    const { sleep } = recordingSleep();
    const outcome = await runWithRetry(
      () => {
        throw "plain string";
      },
      { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 },
      { sleep },
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(Error);
      expect(outcome.error.message).toBe("plain string");
    }
  });

  it("reports each retry to onRetry", async () => {
    const { sleep } = recordingSleep();
    const onRetry = vi.fn();

    await runWithRetry(() => err(new Error("nope")), { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 }, {
      sleep,
      onRetry,
    });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((c) => c[0])).toEqual([
      { attempt: 1, error: new Error("nope"), delayMs: 2000 },
      { attempt: 2, error: new Error("nope"), delayMs: 4000 },
    ]);
  });

  it("accepts async steps", async () => {
    const { sleep } = recordingSleep();
    const outcome = await runWithRetry(async () => ok(42), DEFAULT_RETRY_POLICY, { sleep });
    expect(outcome).toMatchObject({ ok: true, value: 42 });
  });
});
