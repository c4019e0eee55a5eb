/**
 * Tests for JsonlRecordStore: durability and crash recovery.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, mkdtempSync, readFileSync, rmSync, chmodSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlRecordStore } from "../src/jsonl-store.js";
import { StoreError } from "../src/types.js";

interface Item {
  readonly label: string;
}

function isItem(value: unknown): value is Item {
  return (
    value !== null &&
    typeof value === "object" &&
    "label" in value &&
    typeof value.label === "string"
  );
}

describe("JsonlRecordStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "escrowhook-store-"));
    filePath = join(dir, "nested", "items.jsonl");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the parent directory and an empty file", () => {
    const store = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    expect(store.size).toBe(0);
    expect(readFileSync(filePath, "utf-8")).toBe("");
  });

  it("appends one line per write", () => {
    const store = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    store.put("k1", { label: "one" });
    store.put("k1", { label: "two" });

    const lines = readFileSync(filePath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1]!)).toMatchObject({
      key: "k1",
      version: 2,
      value: { label: "two" },
    });
  });

  it("survives a restart with the latest version per key", () => {
    const first = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    first.put("k1", { label: "one" });
    first.put("k2", { label: "x" });
    first.put("k1", { label: "two" });

    const reopened = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    expect(reopened.size).toBe(2);
    expect(reopened.get("k1")).toMatchObject({ version: 2, value: { label: "two" } });
    expect(reopened.list().map((r) => r.key)).toEqual(["k1", "k2"]);

    // Versioning continues from the reloaded head
    expect(reopened.put("k1", { label: "three" }, { expectedVersion: 2 }).version).toBe(3);
  });

  it("skips a torn trailing line", () => {
    const first = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    first.put("k1", { label: "one" });
    appendFileSync(filePath, '{"key":"k2","version":1,"upda');

    const reopened = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    expect(reopened.size).toBe(1);
    expect(reopened.skippedLines).toBe(1);
  });

  it("cuts a torn tail so the next write survives another restart", () => {
    const first = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    first.put("k1", { label: "one" });
    appendFileSync(filePath, '{"key":"k1","vers');

    const second = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    expect(second.skippedLines).toBe(1);
    second.put("k2", { label: "after crash" });

    const third = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    expect(third.skippedLines).toBe(0);
    expect(third.get("k1")).toMatchObject({ version: 1, value: { label: "one" } });
    expect(third.get("k2")).toMatchObject({ version: 1, value: { label: "after crash" } });
    expect(readFileSync(filePath, "utf-8").trim().split("\n")).toHaveLength(2);
  });

  it("skips lines whose value fails validation", () => {
    const first = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    first.put("good", { label: "ok" });
    appendFileSync(
      filePath,
      JSON.stringify({ key: "bad", version: 1, updatedAt: "2026-01-01T00:00:00.000Z", value: { label: 7 } }) + "\n",
    );

    const reopened = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    expect(reopened.has("good")).toBe(true);
    expect(reopened.has("bad")).toBe(false);
    expect(reopened.skippedLines).toBe(1);
  });

  it("compact keeps only the head version of each key", () => {
    const store = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    store.put("k1", { label: "one" });
    store.put("k1", { label: "two" });
    store.put("k2", { label: "x" });

    expect(store.compact()).toBe(2);
    const lines = readFileSync(filePath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);

    const reopened = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    expect(reopened.get("k1")).toMatchObject({ version: 2, value: { label: "two" } });
  });

  it("rejects stale conditional writes without touching the file", () => {
    const store = new JsonlRecordStore<Item>({ filePath, validate: isItem });
    store.put("k1", { label: "one" });
    store.put("k1", { label: "two" });

    expect(() => store.put("k1", { label: "lost" }, { expectedVersion: 1 }))
      .toThrow(StoreError);
    expect(readFileSync(filePath, "utf-8").trim().split("\n")).toHaveLength(2);
  });

  it("fails construction when the path is not writable", () => {
    if (process.getuid?.() === 0) {
      // root ignores file permissions
      return;
    }
    const readOnlyDir = join(dir, "ro");
    const store = new JsonlRecordStore<Item>({ filePath: join(readOnlyDir, "a.jsonl"), validate: isItem });
    expect(store.size).toBe(0);
    chmodSync(readOnlyDir, 0o500);
    try {
      expect(() => new JsonlRecordStore<Item>({ filePath: join(readOnlyDir, "b.jsonl"), validate: isItem }))
        .toThrow("Cannot open record store");
    } finally {
      chmodSync(readOnlyDir, 0o700);
    }
  });

  it("fails construction when the path is a directory", () => {
    expect(() => new JsonlRecordStore<Item>({ filePath: dir, validate: isItem })).toThrow(StoreError);
  });
});
