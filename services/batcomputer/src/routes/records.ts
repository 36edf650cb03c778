import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RecordStore } from '../contracts/recordStore';
import { NotFoundError } from '../errors';
import type { GuardChain } from '../guards/chain';
import { intParam, type Pagination } from '../schemas';
import type { NamedRecord } from '../types';
import { parseInput } from '../validation';

export interface RecordRoutesOptions<T extends NamedRecord> {
  /** Collection path, e.g. "/contacts". */
  path: string;
  /** Key of the array in the list response, e.g. "contacts". */
  listKey: string;
  /** Entity name used in error details, e.g. "Contact". */
  label: string;
  store: RecordStore<T>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  pagination: GuardChain<Pagination>;
}

const recordParams = z.object({ id: intParam });

/** List, fetch by id, create and wipe for one in-memory store. */
export async function registerRecordRoutes<T extends NamedRecord>(
  app: FastifyInstance,
  options: RecordRoutesOptions<T>,
) {
  const { path, listKey, label, store, schema, pagination } = options;

  app.get(path, async (req) => {
    const page = await pagination.resolve(req);
    const records = await store.list(page);
    return { skip: page.skip, limit: page.limit, [listKey]: records };
  });

  // static routes such as /contacts/me still win over this one
  app.get(`${path}/:id`, async (req) => {
    const { id } = parseInput(recordParams, req.params);
    const record = await store.get(id);
    if (!record) throw new NotFoundError(`${label} with ID ${id} not found.`);
    return record;
  });

  app.post(path, async (req, reply) => {
    const input = parseInput(schema, req.body);
    const created = await store.create(input);
    req.log.info({ path, id: created.id, name: created.name }, 'Record created');
    return reply.code(201).send(created);
  });

  app.delete(path, async (req, reply) => {
    const removed = await store.count();
    await store.clear();
    req.log.info({ path, removed }, 'Store cleared');
    return reply.code(204).send();
  });
}
