/**
 * @acct-emulator/store — Embedded transactional key-value store.
 *
 * Provides:
 * - KvStore interface with synchronous view/update transactions
 * - InMemoryKvStore for tests and development
 * - JsonlKvStore for durable file-based persistence (append-only log + compaction)
 *
 * @packageDocumentation
 */

// Core types
export type {
  RecordCodec,
  RecordCollection,
  StringCollection,
  Sequence,
  CollectionDef,
  Sequenced,
  ScanPredicate,
  StringEntry,
  ReadTransaction,
  WriteTransaction,
  KvStore,
  KvStoreOptions,
  LogOperation,
  LogEntry,
  StoreErrorCode,
} from "./types.js";
export {
  StoreError,
  defineCollection,
  defineStringCollection,
  defineSequence,
} from "./types.js";

// Implementations
export { InMemoryKvStore } from "./in-memory-store.js";
export { JsonlKvStore, openStore } from "./jsonl-store.js";
export type { JsonlKvStoreOptions } from "./jsonl-store.js";
