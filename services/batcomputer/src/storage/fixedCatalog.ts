import { ConflictError, NotFoundError } from '../errors';
import type { Catalog } from '../contracts/recordStore';
import type { NamedRecord, RecordId, StoredRecord } from '../types';

export interface FixedCatalogOptions {
  notFound: (id: RecordId) => string;
  duplicate: (name: string) => string;
}

/**
 * Immutable reference table. "Creating" against it only checks for a name
 * clash; entries are never added at runtime.
 */
export class FixedCatalog<T extends NamedRecord> implements Catalog<T> {
  private readonly byId: ReadonlyMap<RecordId, T>;

  constructor(seed: Iterable<[RecordId, T]>, private readonly messages: FixedCatalogOptions) {
    const byId = new Map<RecordId, T>();
    for (const [id, entry] of seed) {
      if (byId.has(id)) throw new Error(`duplicate catalog id ${id}`);
      byId.set(id, entry);
    }
    this.byId = byId;
  }

  get(id: RecordId): T {
    const entry = this.byId.get(id);
    if (!entry) throw new NotFoundError(this.messages.notFound(id));
    return { ...entry };
  }

  assertNameAvailable(name: string): void {
    const wanted = name.toLowerCase();
    for (const entry of this.byId.values()) {
      if (entry.name.toLowerCase() === wanted) {
        throw new ConflictError(this.messages.duplicate(name));
      }
    }
  }

  entries(): Array<StoredRecord<T>> {
    return [...this.byId.entries()].map(([id, entry]) => ({ ...entry, id }));
  }

  count(predicate?: (entry: T) => boolean): number {
    if (!predicate) return this.byId.size;
    let n = 0;
    for (const entry of this.byId.values()) if (predicate(entry)) n += 1;
    return n;
  }
}
