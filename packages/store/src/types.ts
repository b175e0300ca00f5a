/**
 * @acct-emulator/store — Core types.
 *
 * Defines the key-value store contract used by every other package.
 *
 * Design principles:
 * - Collections are declared when the store is opened; nothing else is reachable
 * - Integer keys are allocated per collection and never reused
 * - Every mutation runs inside a transaction that commits as a single log entry
 * - Transactions are synchronous, so one commits before the next can start
 */

// =============================================================================
// Collections
// =============================================================================

/**
 * Decodes a stored JSON value back into a typed record.
 *
 * A zod schema satisfies this interface structurally.
 */
export interface RecordCodec<T> {
  parse(data: unknown): T;
}

/** Integer-keyed collection of JSON records. */
export interface RecordCollection<T> {
  readonly kind: "records";
  readonly name: string;
  readonly codec: RecordCodec<T>;
}

/** String-keyed collection of plain string values. */
export interface StringCollection {
  readonly kind: "strings";
  readonly name: string;
}

/** A named id sequence with no records of its own. */
export interface Sequence {
  readonly kind: "sequence";
  readonly name: string;
}

export type CollectionDef = RecordCollection<unknown> | StringCollection | Sequence;

/** Anything that can hand out ids via `nextID`. */
export type Sequenced = RecordCollection<unknown> | Sequence;

export function defineCollection<T>(
  name: string,
  codec: RecordCodec<T>,
): RecordCollection<T> {
  return { kind: "records", name, codec };
}

export function defineStringCollection(name: string): StringCollection {
  return { kind: "strings", name };
}

export function defineSequence(name: string): Sequence {
  return { kind: "sequence", name };
}

// =============================================================================
// Transactions
// =============================================================================

export type ScanPredicate<T> = (value: T, key: number) => boolean;

export type StringEntry = readonly [key: string, value: string];

/**
 * Read access to a consistent view of the store.
 */
export interface ReadTransaction {
  /**
   * @throws StoreError NOT_FOUND if the key is absent
   */
  get<T>(collection: RecordCollection<T>, key: number): T;

  find<T>(collection: RecordCollection<T>, key: number): T | undefined;

  /**
   * Values in ascending key order, filtered by the predicate when given.
   */
  scan<T>(collection: RecordCollection<T>, predicate?: ScanPredicate<T>): T[];

  /**
   * @throws StoreError NOT_FOUND if the key is absent
   */
  getString(collection: StringCollection, key: string): string;

  findString(collection: StringCollection, key: string): string | undefined;

  /** Entries in ascending key order, filtered by the predicate when given. */
  scanStrings(
    collection: StringCollection,
    predicate?: (value: string, key: string) => boolean,
  ): StringEntry[];
}

/**
 * Read-write access. Writes are staged and become visible to other
 * callers only when the enclosing `update` returns.
 */
export interface WriteTransaction extends ReadTransaction {
  /** Allocate the next id (1-based, strictly increasing, never reused). */
  nextID(collection: Sequenced): number;

  put<T>(collection: RecordCollection<T>, key: number, value: T): void;

  /**
   * @throws StoreError NOT_FOUND if the key is absent
   */
  delete(collection: RecordCollection<unknown>, key: number): void;

  putString(collection: StringCollection, key: string, value: string): void;

  /** Idempotent. Returns whether a value was removed. */
  deleteString(collection: StringCollection, key: string): boolean;
}

// =============================================================================
// Store
// =============================================================================

/**
 * Embedded key-value store.
 *
 * The single-operation methods inherited from WriteTransaction each run
 * in their own transaction. Calling them from inside `view`/`update`
 * throws TRANSACTION_ACTIVE; use the transaction handle instead.
 */
export interface KvStore extends WriteTransaction {
  /** Run a read-only callback. The callback must be synchronous. */
  view<R>(fn: (tx: ReadTransaction) => R): R;

  /**
   * Run a read-write callback and commit its writes atomically.
   * If the callback throws, nothing is written.
   */
  update<R>(fn: (tx: WriteTransaction) => R): R;

  /** Names of the collections declared at open time. */
  collectionNames(): readonly string[];

  close(): void;

  readonly closed: boolean;
}

export interface KvStoreOptions {
  readonly collections: readonly CollectionDef[];
}

// =============================================================================
// Transaction Log
// =============================================================================

/**
 * One mutation inside a committed transaction.
 *
 * Short field names keep log lines compact:
 * `c` collection, `k` key, `v` value.
 */
export type LogOperation =
  | { readonly op: "seq"; readonly c: string; readonly v: number }
  | { readonly op: "put"; readonly c: string; readonly k: number; readonly v: unknown }
  | { readonly op: "del"; readonly c: string; readonly k: number }
  | { readonly op: "sput"; readonly c: string; readonly k: string; readonly v: string }
  | { readonly op: "sdel"; readonly c: string; readonly k: string };

/** A committed transaction as written to the log. */
export interface LogEntry {
  readonly tx: number;
  readonly committedAt: string;
  readonly ops: readonly LogOperation[];
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "NOT_FOUND"
  | "UNDECLARED_COLLECTION"
  | "DUPLICATE_COLLECTION"
  | "INVALID_KEY"
  | "INVALID_VALUE"
  | "CORRUPT_RECORD"
  | "TRANSACTION_ACTIVE"
  | "ASYNC_TRANSACTION"
  | "STORE_CLOSED"
  | "IO_ERROR";

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly collection?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}
