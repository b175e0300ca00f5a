/**
 * @acct-emulator/store — In-memory KvStore implementation.
 *
 * Keeps every collection in plain Maps. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * JsonlKvStore extends this class and adds a durable transaction log;
 * everything about staging, reading and committing lives here.
 *
 * Properties:
 * - Records are held serialized, so callers always receive fresh copies
 * - Transactions stage writes in an overlay and apply them on commit
 * - One transaction at a time (synchronous callbacks only)
 */

import type {
  CollectionDef,
  KvStore,
  KvStoreOptions,
  LogEntry,
  LogOperation,
  ReadTransaction,
  RecordCollection,
  ScanPredicate,
  Sequenced,
  StringCollection,
  StringEntry,
  WriteTransaction,
} from "./types.js";
import { StoreError } from "./types.js";

// =============================================================================
// Internal State
// =============================================================================

interface CollectionState {
  readonly records: Map<number, string>;
  readonly strings: Map<string, string>;
  sequence: number;
}

/** Pending writes for one collection. `null` marks a deletion. */
interface StagedCollection {
  readonly records: Map<number, string | null>;
  readonly strings: Map<string, string | null>;
  sequence: number | undefined;
}

type CollectionResolver = (def: CollectionDef) => CollectionState;

function checkRecordKey(collection: string, key: number): void {
  if (!Number.isSafeInteger(key) || key < 1) {
    throw new StoreError(
      "INVALID_KEY",
      `Key for "${collection}" must be a positive safe integer, got ${key}`,
      collection,
    );
  }
}

function checkStringKey(collection: string, key: string): void {
  if (key.length === 0) {
    throw new StoreError(
      "INVALID_KEY",
      `Key for "${collection}" must be a non-empty string`,
      collection,
    );
  }
}

function serialize(collection: string, value: unknown): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    throw new StoreError(
      "INVALID_VALUE",
      `Value for "${collection}" is not JSON-serializable`,
      collection,
      { cause: err },
    );
  }
  if (text === undefined) {
    throw new StoreError(
      "INVALID_VALUE",
      `Value for "${collection}" is not JSON-serializable`,
      collection,
    );
  }
  return text;
}

function decode<T>(collection: RecordCollection<T>, raw: string, key: number): T {
  try {
    return collection.codec.parse(JSON.parse(raw));
  } catch (err) {
    throw new StoreError(
      "CORRUPT_RECORD",
      `Record ${key} in "${collection.name}" failed to decode`,
      collection.name,
      { cause: err },
    );
  }
}

// =============================================================================
// Transaction
// =============================================================================

class StoreTransaction implements WriteTransaction {
  private readonly _staged = new Map<string, StagedCollection>();

  constructor(private readonly _resolve: CollectionResolver) {}

  // ─── Records ────────────────────────────────────────────────────────

  get<T>(collection: RecordCollection<T>, key: number): T {
    const value = this.find(collection, key);
    if (value === undefined) {
      throw new StoreError(
        "NOT_FOUND",
        `Record ${key} not found in "${collection.name}"`,
        collection.name,
      );
    }
    return value;
  }

  find<T>(collection: RecordCollection<T>, key: number): T | undefined {
    checkRecordKey(collection.name, key);
    const raw = this._readRecord(collection, key);
    return raw === undefined ? undefined : decode(collection, raw, key);
  }

  scan<T>(collection: RecordCollection<T>, predicate?: ScanPredicate<T>): T[] {
    const base = this._resolve(collection);
    const keys = new Set(base.records.keys());
    const staged = this._staged.get(collection.name);
    if (staged !== undefined) {
      for (const key of staged.records.keys()) {
        keys.add(key);
      }
    }

    const result: T[] = [];
    for (const key of [...keys].sort((a, b) => a - b)) {
      const raw = this._readRecord(collection, key);
      if (raw === undefined) {
        continue;
      }
      const value = decode(collection, raw, key);
      if (predicate === undefined || predicate(value, key)) {
        result.push(value);
      }
    }
    return result;
  }

  nextID(collection: Sequenced): number {
    const base = this._resolve(collection);
    const staged = this._stage(collection.name);
    const next = (staged.sequence ?? base.sequence) + 1;
    staged.sequence = next;
    return next;
  }

  put<T>(collection: RecordCollection<T>, key: number, value: T): void {
    checkRecordKey(collection.name, key);
    const base = this._resolve(collection);
    const staged = this._stage(collection.name);
    staged.records.set(key, serialize(collection.name, value));

    // Explicit keys push the sequence forward so nextID never collides.
    if (key > (staged.sequence ?? base.sequence)) {
      staged.sequence = key;
    }
  }

  delete(collection: RecordCollection<unknown>, key: number): void {
    checkRecordKey(collection.name, key);
    if (this._readRecord(collection, key) === undefined) {
      throw new StoreError(
        "NOT_FOUND",
        `Record ${key} not found in "${collection.name}"`,
        collection.name,
      );
    }
    this._stage(collection.name).records.set(key, null);
  }

  // ─── Strings ────────────────────────────────────────────────────────

  getString(collection: StringCollection, key: string): string {
    const value = this.findString(collection, key);
    if (value === undefined) {
      throw new StoreError(
        "NOT_FOUND",
        `Key "${key}" not found in "${collection.name}"`,
        collection.name,
      );
    }
    return value;
  }

  findString(collection: StringCollection, key: string): string | undefined {
    checkStringKey(collection.name, key);
    const base = this._resolve(collection);
    const staged = this._staged.get(collection.name);
    if (staged !== undefined && staged.strings.has(key)) {
      return staged.strings.get(key) ?? undefined;
    }
    return base.strings.get(key);
  }

  scanStrings(
    collection: StringCollection,
    predicate?: (value: string, key: string) => boolean,
  ): StringEntry[] {
    const base = this._resolve(collection);
    const keys = new Set(base.strings.keys());
    const staged = this._staged.get(collection.name);
    if (staged !== undefined) {
      for (const key of staged.strings.keys()) {
        keys.add(key);
      }
    }

    const result: StringEntry[] = [];
    for (const key of [...keys].sort()) {
      const value = this.findString(collection, key);
      if (value !== undefined && (predicate === undefined || predicate(value, key))) {
        result.push([key, value]);
      }
    }
    return result;
  }

  putString(collection: StringCollection, key: string, value: string): void {
    checkStringKey(collection.name, key);
    this._resolve(collection);
    this._stage(collection.name).strings.set(key, value);
  }

  deleteString(collection: StringCollection, key: string): boolean {
    if (this.findString(collection, key) === undefined) {
      return false;
    }
    this._stage(collection.name).strings.set(key, null);
    return true;
  }

  // ─── Commit ─────────────────────────────────────────────────────────

  /** The staged writes, in the form they are logged and applied. */
  operations(): LogOperation[] {
    const ops: LogOperation[] = [];
    for (const [name, staged] of this._staged) {
      if (staged.sequence !== undefined) {
        ops.push({ op: "seq", c: name, v: staged.sequence });
      }
      for (const [key, raw] of staged.records) {
        ops.push(
          raw === null
            ? { op: "del", c: name, k: key }
            : { op: "put", c: name, k: key, v: JSON.parse(raw) },
        );
      }
      for (const [key, value] of staged.strings) {
        ops.push(
          value === null
            ? { op: "sdel", c: name, k: key }
            : { op: "sput", c: name, k: key, v: value },
        );
      }
    }
    return ops;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _readRecord(collection: RecordCollection<unknown>, key: number): string | undefined {
    const base = this._resolve(collection);
    const staged = this._staged.get(collection.name);
    if (staged !== undefined && staged.records.has(key)) {
      return staged.records.get(key) ?? undefined;
    }
    return base.records.get(key);
  }

  private _stage(name: string): StagedCollection {
    let staged = this._staged.get(name);
    if (staged === undefined) {
      staged = { records: new Map(), strings: new Map(), sequence: undefined };
      this._staged.set(name, staged);
    }
    return staged;
  }
}

// =============================================================================
// Store
// =============================================================================

/**
 * In-memory key-value store.
 *
 * Subclasses make commits durable by overriding `persist`, which runs
 * before a commit is applied to memory; if it throws, the commit is
 * abandoned and memory is untouched.
 */
export class InMemoryKvStore implements KvStore {
  private readonly _declared = new Map<string, CollectionDef["kind"]>();
  private readonly _state = new Map<string, CollectionState>();
  private _lastTx = 0;
  private _active = false;
  private _closed = false;

  constructor(options: KvStoreOptions) {
    for (const def of options.collections) {
      if (this._declared.has(def.name)) {
        throw new StoreError(
          "DUPLICATE_COLLECTION",
          `Collection "${def.name}" is declared more than once`,
          def.name,
        );
      }
      this._declared.set(def.name, def.kind);
      this._stateFor(def.name);
    }
  }

  // ─── Transactions ───────────────────────────────────────────────────

  view<R>(fn: (tx: ReadTransaction) => R): R {
    return this._run(fn, false);
  }

  update<R>(fn: (tx: WriteTransaction) => R): R {
    return this._run(fn, true);
  }

  // ─── Single Operations ──────────────────────────────────────────────

  get<T>(collection: RecordCollection<T>, key: number): T {
    return this.view((tx) => tx.get(collection, key));
  }

  find<T>(collection: RecordCollection<T>, key: number): T | undefined {
    return this.view((tx) => tx.find(collection, key));
  }

  scan<T>(collection: RecordCollection<T>, predicate?: ScanPredicate<T>): T[] {
    return this.view((tx) => tx.scan(collection, predicate));
  }

  getString(collection: StringCollection, key: string): string {
    return this.view((tx) => tx.getString(collection, key));
  }

  findString(collection: StringCollection, key: string): string | undefined {
    return this.view((tx) => tx.findString(collection, key));
  }

  scanStrings(
    collection: StringCollection,
    predicate?: (value: string, key: string) => boolean,
  ): StringEntry[] {
    return this.view((tx) => tx.scanStrings(collection, predicate));
  }

  nextID(collection: Sequenced): number {
    return this.update((tx) => tx.nextID(collection));
  }

  put<T>(collection: RecordCollection<T>, key: number, value: T): void {
    this.update((tx) => tx.put(collection, key, value));
  }

  delete(collection: RecordCollection<unknown>, key: number): void {
    this.update((tx) => tx.delete(collection, key));
  }

  putString(collection: StringCollection, key: string, value: string): void {
    this.update((tx) => tx.putString(collection, key, value));
  }

  deleteString(collection: StringCollection, key: string): boolean {
    return this.update((tx) => tx.deleteString(collection, key));
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  collectionNames(): readonly string[] {
    return [...this._declared.keys()];
  }

  close(): void {
    this._closed = true;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Id of the last committed transaction (0 before the first commit). */
  get lastTransaction(): number {
    return this._lastTx;
  }

  // ─── Extension Points ───────────────────────────────────────────────

  protected persist(_entry: LogEntry): void {
    // memory only
  }

  /** Apply an entry read back from durable storage. */
  protected replay(entry: LogEntry): void {
    this._apply(entry.ops);
    if (entry.tx > this._lastTx) {
      this._lastTx = entry.tx;
    }
  }

  /** The whole current state expressed as log operations. */
  protected snapshot(): LogOperation[] {
    const ops: LogOperation[] = [];
    for (const [name, state] of this._state) {
      if (state.sequence > 0) {
        ops.push({ op: "seq", c: name, v: state.sequence });
      }
      for (const [key, raw] of state.records) {
        ops.push({ op: "put", c: name, k: key, v: JSON.parse(raw) });
      }
      for (const [key, value] of state.strings) {
        ops.push({ op: "sput", c: name, k: key, v: value });
      }
    }
    return ops;
  }

  protected assertIdle(): void {
    this._ensureOpen();
    if (this._active) {
      throw new StoreError(
        "TRANSACTION_ACTIVE",
        "Operation not allowed while a transaction is running",
      );
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _run<R>(fn: (tx: StoreTransaction) => R, commit: boolean): R {
    this.assertIdle();
    this._active = true;
    try {
      const tx = new StoreTransaction((def) => this._resolve(def));
      const result = fn(tx);
      if (result instanceof Promise) {
        throw new StoreError(
          "ASYNC_TRANSACTION",
          "Transaction callbacks must be synchronous",
        );
      }
      if (commit) {
        const ops = tx.operations();
        if (ops.length > 0) {
          this._commit(ops);
        }
      }
      return result;
    } finally {
      this._active = false;
    }
  }

  private _commit(ops: readonly LogOperation[]): void {
    const entry: LogEntry = {
      tx: this._lastTx + 1,
      committedAt: new Date().toISOString(),
      ops,
    };
    this.persist(entry);
    this._lastTx = entry.tx;
    this._apply(entry.ops);
  }

  private _apply(ops: readonly LogOperation[]): void {
    for (const op of ops) {
      const state = this._stateFor(op.c);
      switch (op.op) {
        case "seq":
          state.sequence = Math.max(state.sequence, op.v);
          break;
        case "put":
          state.records.set(op.k, JSON.stringify(op.v));
          state.sequence = Math.max(state.sequence, op.k);
          break;
        case "del":
          state.records.delete(op.k);
          break;
        case "sput":
          state.strings.set(op.k, op.v);
          break;
        case "sdel":
          state.strings.delete(op.k);
          break;
      }
    }
  }

  private _resolve(def: CollectionDef): CollectionState {
    this._ensureOpen();
    const kind = this._declared.get(def.name);
    if (kind !== def.kind) {
      throw new StoreError(
        "UNDECLARED_COLLECTION",
        kind === undefined
          ? `Collection "${def.name}" is not declared`
          : `Collection "${def.name}" is declared as ${kind}, not ${def.kind}`,
        def.name,
      );
    }
    return this._stateFor(def.name);
  }

  private _stateFor(name: string): CollectionState {
    let state = this._state.get(name);
    if (state === undefined) {
      state = { records: new Map(), strings: new Map(), sequence: 0 };
      this._state.set(name, state);
    }
    return state;
  }

  private _ensureOpen(): void {
    if (this._closed) {
      throw new StoreError("STORE_CLOSED", "Store is closed");
    }
  }
}
