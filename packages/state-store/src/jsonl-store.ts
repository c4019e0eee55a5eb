/**
 * @escrowhook/state-store: File-based JSONL RecordStore implementation.
 *
 * Every write appends one JSON line holding the full new version of a
 * record. On load, the highest version per key wins.
 *
 * Crash safety:
 * - Each write is fsynced before put() returns
 * - Torn trailing lines (unclean shutdown) are skipped on load and cut
 *   from the file, so the next append starts on a fresh line
 * - compact() rewrites through a temp file + rename, never in place
 *
 * File format:
 * {"key":"T1","version":3,"updatedAt":"...","value":{...}}
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  truncateSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import type {
  ListOptions,
  PutOptions,
  RecordStore,
  StoredRecord,
  Updater,
} from "./types.js";
import {
  applyListOptions,
  checkExpectedVersion,
  StoreError,
  validateKey,
} from "./types.js";

export interface JsonlRecordStoreOptions<T> {
  /** Path to the JSONL file */
  readonly filePath: string;

  /**
   * Guard applied to each value read back from disk.
   * Lines whose value fails the guard are skipped.
   */
  readonly validate: (value: unknown) => value is T;
}

export class JsonlRecordStore<T> implements RecordStore<T> {
  private readonly _filePath: string;
  private readonly _validate: (value: unknown) => value is T;
  private readonly _records = new Map<string, StoredRecord<T>>();

  /** Lines skipped on load (corrupt, torn, or failing validation) */
  private _skippedLines = 0;

  /**
   * Open (or create) a store at `filePath`.
   *
   * The parent directory is created if needed, and the file is probed for
   * writability so an unusable path fails at startup, not on first write.
   */
  constructor(options: JsonlRecordStoreOptions<T>) {
    this._filePath = options.filePath;
    this._validate = options.validate;

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      closeSync(openSync(this._filePath, "a"));
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new StoreError(
        "STORE_UNAVAILABLE",
        `Cannot open record store at ${this._filePath}: ${reason}`,
      );
    }

    this._loadFromFile();
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  get(key: string): StoredRecord<T> | undefined {
    validateKey(key);
    return this._records.get(key);
  }

  list(options?: ListOptions<T>): readonly StoredRecord<T>[] {
    return applyListOptions([...this._records.values()], options);
  }

  has(key: string): boolean {
    return this._records.has(key);
  }

  get size(): number {
    return this._records.size;
  }

  get filePath(): string {
    return this._filePath;
  }

  get skippedLines(): number {
    return this._skippedLines;
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  put(key: string, value: T, options?: PutOptions): StoredRecord<T> {
    validateKey(key);

    const current = this._records.get(key);
    const currentVersion = current?.version ?? 0;
    checkExpectedVersion(key, currentVersion, options?.expectedVersion);

    const record: StoredRecord<T> = {
      key,
      value,
      version: currentVersion + 1,
      updatedAt: new Date().toISOString(),
    };

    // Persist first; memory only changes once the line is on disk
    this._appendAndSync(JSON.stringify(record) + "\n");
    this._records.set(key, record);
    return record;
  }

  update(key: string, updater: Updater<T>): StoredRecord<T> {
    const current = this.get(key);
    const next = updater(current?.value);
    return this.put(key, next, {
      expectedVersion: current?.version ?? "no_record",
    });
  }

  /**
   * Rewrite the file with only the latest version of each record.
   *
   * @returns Number of lines in the compacted file
   */
  compact(): number {
    const tmpPath = `${this._filePath}.compact`;
    let data = "";
    for (const record of this._records.values()) {
      data += JSON.stringify(record) + "\n";
    }

    const fd = openSync(tmpPath, "w");
    try {
      writeSync(fd, data);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, this._filePath);
    return this._records.size;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    const lastNewline = content.lastIndexOf("\n");
    if (lastNewline < content.length - 1) {
      this._truncateTo(Buffer.byteLength(content.slice(0, lastNewline + 1)));
    }

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn write from an unclean shutdown
        this._skippedLines++;
        continue;
      }

      const record = this._toRecord(parsed);
      if (record === undefined) {
        this._skippedLines++;
        continue;
      }

      const existing = this._records.get(record.key);
      if (existing === undefined || record.version > existing.version) {
        this._records.set(record.key, record);
      }
    }
  }

  private _toRecord(line: unknown): StoredRecord<T> | undefined {
    if (
      line === null ||
      typeof line !== "object" ||
      !("key" in line && "version" in line && "updatedAt" in line && "value" in line)
    ) {
      return undefined;
    }

    const { key, version, updatedAt, value } = line;
    if (
      typeof key !== "string" ||
      key.length === 0 ||
      typeof version !== "number" ||
      !Number.isInteger(version) ||
      version < 1 ||
      typeof updatedAt !== "string" ||
      !this._validate(value)
    ) {
      return undefined;
    }

    return { key, value, version, updatedAt };
  }

  private _truncateTo(bytes: number): void {
    try {
      truncateSync(this._filePath, bytes);
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new StoreError(
        "STORE_UNAVAILABLE",
        `Cannot repair torn tail of ${this._filePath}: ${reason}`,
      );
    }
  }

  private _appendAndSync(data: string): void {
    let fd: number;
    try {
      fd = openSync(this._filePath, "a");
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new StoreError("STORE_UNAVAILABLE", `Write failed: ${reason}`);
    }
    try {
      writeSync(fd, data);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}
