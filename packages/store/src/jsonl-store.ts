/**
 * @acct-emulator/store — File-based JSONL KvStore implementation.
 *
 * Persists committed transactions as one JSON object per line in a
 * `.jsonl` file and keeps the current state in memory.
 *
 * Crash safety:
 * - Each commit flushes to disk via fsync before it is applied in memory
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * Each line is a LogEntry:
 * {"tx":3,"committedAt":"...","ops":[{"op":"seq","c":"deals","v":1},{"op":"put","c":"deals","k":1,"v":{...}}]}
 *
 * `compact()` replaces the log with a single entry holding the current state.
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  writeFileSync,
  readFileSync,
  renameSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import { InMemoryKvStore } from "./in-memory-store.js";
import type { KvStoreOptions, LogEntry, LogOperation } from "./types.js";
import { StoreError } from "./types.js";

/**
 * Options for creating a JsonlKvStore.
 */
export interface JsonlKvStoreOptions extends KvStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

function isLogOperation(value: unknown): value is LogOperation {
  if (
    typeof value !== "object" ||
    value === null ||
    !("op" in value) ||
    !("c" in value) ||
    typeof value.c !== "string"
  ) {
    return false;
  }
  switch (value.op) {
    case "seq":
      return "v" in value && typeof value.v === "number";
    case "put":
      return "k" in value && typeof value.k === "number" && "v" in value;
    case "del":
      return "k" in value && typeof value.k === "number";
    case "sput":
      return (
        "k" in value &&
        typeof value.k === "string" &&
        "v" in value &&
        typeof value.v === "string"
      );
    case "sdel":
      return "k" in value && typeof value.k === "string";
    default:
      return false;
  }
}

function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "tx" in value &&
    typeof value.tx === "number" &&
    "committedAt" in value &&
    typeof value.committedAt === "string" &&
    "ops" in value &&
    Array.isArray(value.ops) &&
    value.ops.every(isLogOperation)
  );
}

/**
 * File-based JSONL key-value store.
 *
 * The in-memory state is rebuilt from the file on construction.
 */
export class JsonlKvStore extends InMemoryKvStore {
  private readonly _filePath: string;

  /** Set when the file ends in a torn line; the next write starts a fresh one. */
  private _needsNewline = false;

  /**
   * Create a new JsonlKvStore.
   *
   * If the file exists, its transactions are replayed.
   * If the file does not exist, it will be created on first commit.
   * The parent directory is created if it doesn't exist.
   */
  constructor(options: JsonlKvStoreOptions) {
    super(options);
    this._filePath = options.filePath;

    try {
      mkdirSync(dirname(this._filePath), { recursive: true });
      this._loadFromFile();
    } catch (err) {
      throw new StoreError(
        "IO_ERROR",
        `Cannot open store file "${this._filePath}"`,
        undefined,
        { cause: err },
      );
    }
  }

  /**
   * Rewrite the log as a single snapshot transaction.
   *
   * Writes to a sibling temp file, fsyncs it and renames it over the log.
   */
  compact(): void {
    this.assertIdle();
    const ops = this.snapshot();
    const tempPath = `${this._filePath}.compact`;
    const data =
      ops.length === 0
        ? ""
        : JSON.stringify({
            tx: this.lastTransaction,
            committedAt: new Date().toISOString(),
            ops,
          } satisfies LogEntry) + "\n";

    try {
      const fd = openSync(tempPath, "w");
      try {
        writeFileSync(fd, data, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tempPath, this._filePath);
    } catch (err) {
      throw new StoreError("IO_ERROR", "Compaction failed", undefined, {
        cause: err,
      });
    }
    this._needsNewline = false;
  }

  // ─── File Path ──────────────────────────────────────────────────────

  /**
   * Get the file path this store writes to.
   * Useful for testing and debugging.
   */
  get filePath(): string {
    return this._filePath;
  }

  // ─── Persistence ────────────────────────────────────────────────────

  protected override persist(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    try {
      this._writeAndSync(this._needsNewline ? "\n" + line : line);
    } catch (err) {
      throw new StoreError(
        "IO_ERROR",
        `Failed to write transaction ${entry.tx}`,
        undefined,
        { cause: err },
      );
    }
    this._needsNewline = false;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Replay transactions from the JSONL file into memory.
   *
   * Tolerates partial/corrupt lines (which can happen on unclean shutdown).
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._needsNewline = content.length > 0 && !content.endsWith("\n");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn line; skip
        continue;
      }

      if (isLogEntry(parsed)) {
        this.replay(parsed);
      }
    }
  }

  /**
   * Write data to the JSONL file and fsync for durability.
   */
  private _writeAndSync(data: string): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

/**
 * Open (or create) a JSONL-backed store.
 *
 * @throws StoreError IO_ERROR if the file cannot be read
 */
export function openStore(options: JsonlKvStoreOptions): JsonlKvStore {
  return new JsonlKvStore(options);
}
