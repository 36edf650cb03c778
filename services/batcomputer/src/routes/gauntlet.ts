import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../contracts/appContext';
import { characterSchema, intParam, stoneSpecSchema } from '../schemas';
import { parseInput } from '../validation';
import { registerRecordRoutes } from './records';

const stoneParams = z.object({ stone_id: intParam });

/** The Collector's side of the API: Infinity Stones and the characters chasing them. */
export async function registerGauntletRoutes(app: FastifyInstance, ctx: AppContext) {
  app.get('/stones/:stone_id', async (req) => {
    const { stone_id } = parseInput(stoneParams, req.params);
    return { stone_id, status: 'Located', details: ctx.stones.get(stone_id) };
  });

  app.post('/stones', async (req) => {
    const spec = parseInput(stoneSpecSchema, req.body);
    ctx.stones.assertNameAvailable(spec.name);
    return { message: `Stone '${spec.name}' would be added to the archive (simulation).`, received_data: spec };
  });

  await registerRecordRoutes(app, {
    path: '/characters',
    listKey: 'characters',
    label: 'Character',
    store: ctx.characters,
    schema: characterSchema,
    pagination: ctx.guards.pagination,
  });
}
