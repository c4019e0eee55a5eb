/**
 * Tests for the trade confirmation state machine.
 */

import { describe, it, expect } from "vitest";
import type { Trade } from "@escrowhook/types";
import {
  TradeStateError,
  applyConfirmation,
  canTransition,
  createTrade,
  isTerminal,
  markFailed,
  recordTransition,
} from "../src/state-machine.js";
import type { ApplyContext, TransitionRecord } from "../src/state-machine.js";
import { catchError, makeEvent } from "./helpers.js";

const T0 = "2026-03-01T00:00:00.000Z";
const T1 = "2026-03-01T00:01:00.000Z";
const T2 = "2026-03-01T00:02:00.000Z";

function ctx(now: string, threshold = 3): ApplyContext {
  return { threshold, now };
}

function applyAll(
  events: readonly Parameters<typeof makeEvent>[0][],
  threshold = 3,
): Trade | undefined {
  let trade: Trade | undefined;
  for (const overrides of events) {
    trade = applyConfirmation(trade, makeEvent(overrides), ctx(T0, threshold)).trade;
  }
  return trade;
}

describe("transition table", () => {
  it("allows only forward moves and failure", () => {
    expect(canTransition("pending", "confirmed")).toBe(true);
    expect(canTransition("confirmed", "completed")).toBe(true);
    expect(canTransition("pending", "failed")).toBe(true);
    expect(canTransition("confirmed", "failed")).toBe(true);
    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("confirmed", "pending")).toBe(false);
    expect(canTransition("completed", "failed")).toBe(false);
    expect(canTransition("failed", "pending")).toBe(false);
  });

  it("rejects a move the table does not list", () => {
    const transitions: TransitionRecord[] = [];
    const error = catchError(() => recordTransition(transitions, "pending", "completed"));

    expect(error).toBeInstanceOf(TradeStateError);
    expect(error).toMatchObject({ code: "INVALID_TRANSITION" });
    expect(transitions).toEqual([]);
  });

  it("records a listed move", () => {
    const transitions: TransitionRecord[] = [];
    expect(recordTransition(transitions, "confirmed", "completed")).toBe("completed");
    expect(transitions).toEqual([{ from: "confirmed", to: "completed" }]);
  });

  it("treats completed and failed as terminal", () => {
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("pending")).toBe(false);
    expect(isTerminal("confirmed")).toBe(false);
  });
});

describe("applyConfirmation", () => {
  it("creates a pending trade below the threshold", () => {
    const result = applyConfirmation(
      undefined,
      makeEvent({ confirmationCount: 1 }),
      ctx(T0),
    );

    expect(result.duplicate).toBe(false);
    expect(result.transitions).toEqual([]);
    expect(result.trade).toMatchObject({
      tradeId: "T1",
      status: "pending",
      confirmations: 1,
      createdAt: T0,
    });
    expect(result.trade.confirmedAt).toBeUndefined();
    expect(result.trade.events).toHaveLength(1);
    expect(result.trade.events[0]!.outcome).toBe("applied");
  });

  it("walks pending → confirmed → completed", () => {
    const first = applyConfirmation(undefined, makeEvent({ confirmationCount: 1 }), ctx(T0));
    const second = applyConfirmation(
      first.trade,
      makeEvent({ confirmationCount: 3 }),
      ctx(T1),
    );
    expect(second.trade.status).toBe("confirmed");
    expect(second.trade.confirmedAt).toBe(T1);
    expect(second.transitions).toEqual([{ from: "pending", to: "confirmed" }]);

    const third = applyConfirmation(
      second.trade,
      makeEvent({ confirmationCount: 6, eventType: "final_confirmation" }),
      ctx(T2),
    );
    expect(third.trade.status).toBe("completed");
    expect(third.trade.confirmations).toBe(6);
    expect(third.trade.confirmedAt).toBe(T1);
    expect(third.trade.completedAt).toBe(T2);
    expect(third.transitions).toEqual([{ from: "confirmed", to: "completed" }]);
    expect(third.trade.events).toHaveLength(3);
  });

  it("moves through both transitions on a final confirmation above threshold", () => {
    const result = applyConfirmation(
      undefined,
      makeEvent({ confirmationCount: 4, eventType: "final_confirmation" }),
      ctx(T0),
    );

    expect(result.trade.status).toBe("completed");
    expect(result.transitions).toEqual([
      { from: "pending", to: "confirmed" },
      { from: "confirmed", to: "completed" },
    ]);
    expect(result.trade.confirmedAt).toBe(T0);
    expect(result.trade.completedAt).toBe(T0);
  });

  it("does not complete on a final confirmation below the threshold", () => {
    const early = applyConfirmation(
      undefined,
      makeEvent({ confirmationCount: 1, eventType: "final_confirmation" }),
      ctx(T0),
    );
    expect(early.trade.status).toBe("pending");
    expect(early.trade.confirmations).toBe(1);
    expect(early.trade.completedAt).toBeUndefined();

    const crossing = applyConfirmation(
      early.trade,
      makeEvent({ confirmationCount: 3 }),
      ctx(T1),
    );
    expect(crossing.trade.status).toBe("confirmed");
    expect(crossing.transitions).toEqual([{ from: "pending", to: "confirmed" }]);
    expect(crossing.trade.completedAt).toBeUndefined();

    const final = applyConfirmation(
      crossing.trade,
      makeEvent({ confirmationCount: 3, eventType: "final_confirmation" }),
      ctx(T2),
    );
    expect(final.trade.status).toBe("completed");
    expect(final.trade.confirmedAt).toBe(T1);
    expect(final.trade.completedAt).toBe(T2);
  });

  it("completes on a final confirmation at the same count that confirmed the trade", () => {
    const confirmed = applyAll([
      { confirmationCount: 1 },
      { confirmationCount: 2 },
      { confirmationCount: 3 },
    ]);
    expect(confirmed?.status).toBe("confirmed");

    const result = applyConfirmation(
      confirmed,
      makeEvent({ confirmationCount: 3, eventType: "final_confirmation" }),
      ctx(T2),
    );
    expect(result.duplicate).toBe(false);
    expect(result.transitions).toEqual([{ from: "confirmed", to: "completed" }]);
    expect(result.trade.confirmedAt).toBe(T0);
    expect(result.trade.completedAt).toBe(T2);
  });

  it("never lowers confirmations and marks lower counts stale", () => {
    const trade = applyAll([{ confirmationCount: 2 }, { confirmationCount: 1, txHash: "tx-2" }], 5);

    expect(trade?.confirmations).toBe(2);
    expect(trade?.events.map((e) => e.outcome)).toEqual(["applied", "stale"]);
  });

  it("ignores an event ID already applied", () => {
    const event = makeEvent({ confirmationCount: 2 });
    const first = applyConfirmation(undefined, event, ctx(T0));
    const again = applyConfirmation(first.trade, event, ctx(T1));

    expect(again.duplicate).toBe(true);
    expect(again.trade).toBe(first.trade);
    expect(again.transitions).toEqual([]);
  });

  it("ignores a redelivery with a new event ID but the same content", () => {
    const first = applyConfirmation(
      undefined,
      makeEvent({ txHash: "tx-9", confirmationCount: 2 }),
      ctx(T0),
    );
    const redelivered = applyConfirmation(
      first.trade,
      makeEvent({ txHash: "tx-9", confirmationCount: 2 }),
      ctx(T1),
    );

    expect(redelivered.duplicate).toBe(true);
    expect(redelivered.trade.events).toHaveLength(1);
  });

  it("logs late events on a completed trade without changing it", () => {
    const completed = applyAll([{ confirmationCount: 3, eventType: "final_confirmation" }]);
    expect(completed?.status).toBe("completed");

    const late = applyConfirmation(
      completed,
      makeEvent({ confirmationCount: 12, txHash: "tx-late" }),
      ctx(T2),
    );

    expect(late.duplicate).toBe(false);
    expect(late.transitions).toEqual([]);
    expect(late.trade.status).toBe("completed");
    expect(late.trade.confirmations).toBe(3);
    expect(late.trade.events.at(-1)?.outcome).toBe("late");
  });

  it("throws when the event belongs to another trade", () => {
    const trade = createTrade("T1", T0);
    const error = catchError(() =>
      applyConfirmation(trade, makeEvent({ tradeId: "T2" }), ctx(T0)),
    );

    expect(error).toBeInstanceOf(TradeStateError);
    expect(error).toMatchObject({ code: "TRADE_MISMATCH" });
  });

  it("throws on a threshold below 1", () => {
    const error = catchError(() => applyConfirmation(undefined, makeEvent(), ctx(T0, 0)));
    expect(error).toMatchObject({ code: "INVALID_THRESHOLD" });
  });
});

describe("markFailed", () => {
  it("fails a pending trade and keeps its confirmation data", () => {
    const pending = applyAll([{ confirmationCount: 2 }]);
    expect(pending).toBeDefined();
    if (pending === undefined) return;

    const result = markFailed(pending, "store unavailable", T1);
    expect(result.transitions).toEqual([{ from: "pending", to: "failed" }]);
    expect(result.trade).toMatchObject({
      status: "failed",
      confirmations: 2,
      failedAt: T1,
      failureReason: "store unavailable",
    });
    expect(result.trade.events).toHaveLength(1);
  });

  it("leaves terminal trades unchanged", () => {
    const completed = applyAll([{ confirmationCount: 3, eventType: "final_confirmation" }]);
    expect(completed).toBeDefined();
    if (completed === undefined) return;

    const result = markFailed(completed, "late failure", T1);
    expect(result.trade).toBe(completed);
    expect(result.transitions).toEqual([]);
  });
});
