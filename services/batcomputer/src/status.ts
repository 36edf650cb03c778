import type { Catalog } from './contracts/recordStore';
import type { Gadget, Stone } from './schemas';

export interface InventoryStatus {
  status: string;
  gadgets_in_stock: number;
}

export interface ArchiveStatus {
  status: string;
  stones_acquired: number;
}

export function inventoryStatus(gadgets: Catalog<Gadget>): InventoryStatus {
  const inStock = gadgets.count((gadget) => gadget.in_stock);
  return {
    status: `${inStock}/${gadgets.count()} gadget types in stock.`,
    gadgets_in_stock: inStock,
  };
}

export function archiveStatus(stones: Catalog<Stone>): ArchiveStatus {
  const acquired = stones.count((stone) => stone.acquired);
  const missing = stones.count() - acquired;
  return {
    status: missing === 0 ? 'All stones acquired!' : `Seeking ${missing} more stones...`,
    stones_acquired: acquired,
  };
}
