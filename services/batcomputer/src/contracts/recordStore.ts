import type { NamedRecord, RecordId, StoredRecord } from '../types';
import type { Pagination } from '../schemas';

/** Mutable id → record table owned by one app instance. */
export interface RecordStore<T extends NamedRecord> {
  /** Rejects with `ConflictError` when the name is already taken (case-insensitive). */
  create(input: T): Promise<StoredRecord<T>>;
  get(id: RecordId): Promise<StoredRecord<T> | null>;
  /** Insertion order. */
  list(page?: Partial<Pagination>): Promise<StoredRecord<T>[]>;
  count(): Promise<number>;
  /** Empties the table and restarts ids at 1. */
  clear(): Promise<void>;
}

/** Read-only reference table seeded at startup. */
export interface Catalog<T extends NamedRecord> {
  /** Throws `NotFoundError` naming the id. */
  get(id: RecordId): T;
  /** Throws `ConflictError` when an entry already uses the name. */
  assertNameAvailable(name: string): void;
  entries(): Array<StoredRecord<T>>;
  count(predicate?: (entry: T) => boolean): number;
}
