import gadgetSeed from '../../data/gadgets.json';
import stoneSeed from '../../data/stones.json';
import { FixedCatalog } from './fixedCatalog';
import { gadgetSeedSchema, stoneSeedSchema, type Gadget, type Stone } from '../schemas';
import type { RecordId } from '../types';

export function createGadgetCatalog(seed: unknown = gadgetSeed): FixedCatalog<Gadget> {
  const entries = gadgetSeedSchema.parse(seed);
  return new FixedCatalog(
    entries.map(({ id, ...gadget }): [RecordId, Gadget] => [id, gadget]),
    {
      notFound: (id) => `Gadget with ID ${id} not found in inventory.`,
      duplicate: (name) => `Gadget specification for '${name}' already exists.`,
    },
  );
}

export function createStoneCatalog(seed: unknown = stoneSeed): FixedCatalog<Stone> {
  const entries = stoneSeedSchema.parse(seed);
  return new FixedCatalog(
    entries.map(({ id, ...stone }): [RecordId, Stone] => [id, stone]),
    {
      notFound: (id) => `Stone with ID ${id} not found.`,
      duplicate: (name) => `Stone '${name}' already exists in the Collector's archive.`,
    },
  );
}
