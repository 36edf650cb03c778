import { ConflictError } from '../errors';
import type { RecordStore } from '../contracts/recordStore';
import type { NamedRecord, RecordId, StoredRecord } from '../types';
import type { Pagination } from '../schemas';

export interface MemoryRecordStoreOptions {
  /** Entity label used in error messages, e.g. "Contact". */
  label: string;
}

/**
 * Implements `RecordStore` on a `Map`, which keeps insertion order for `list`.
 *
 * `create` does its uniqueness check and insert without awaiting in between,
 * so two requests can never interleave inside it.
 */
export class MemoryRecordStore<T extends NamedRecord> implements RecordStore<T> {
  private readonly records = new Map<RecordId, StoredRecord<T>>();
  private nextId: RecordId = 1;

  constructor(private readonly options: MemoryRecordStoreOptions) {}

  async create(input: T): Promise<StoredRecord<T>> {
    const wanted = input.name.toLowerCase();
    for (const existing of this.records.values()) {
      if (existing.name.toLowerCase() === wanted) {
        throw new ConflictError(`${this.options.label} named '${input.name}' already exists.`);
      }
    }

    const id = this.nextId;
    const stored: StoredRecord<T> = { ...input, id };
    this.records.set(id, stored);
    this.nextId += 1;
    return stored;
  }

  async get(id: RecordId) {
    return this.records.get(id) ?? null;
  }

  async list(page: Partial<Pagination> = {}) {
    const skip = page.skip ?? 0;
    const all = [...this.records.values()];
    return typeof page.limit === 'number' ? all.slice(skip, skip + page.limit) : all.slice(skip);
  }

  async count() {
    return this.records.size;
  }

  async clear() {
    this.records.clear();
    this.nextId = 1;
  }
}
