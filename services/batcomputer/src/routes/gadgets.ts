import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../contracts/appContext';
import { gadgetSpecSchema, intParam } from '../schemas';
import { parseInput } from '../validation';

const gadgetParams = z.object({ gadget_id: intParam });

export async function registerGadgetRoutes(app: FastifyInstance, ctx: AppContext) {
  app.get('/gadgets/:gadget_id', async (req) => {
    const { gadget_id } = parseInput(gadgetParams, req.params);
    return { gadget_id, status: 'Located in inventory', details: ctx.gadgets.get(gadget_id) };
  });

  // The catalog is fixed: a new spec is only checked against it, never stored.
  app.post('/gadgets', async (req) => {
    const spec = parseInput(gadgetSpecSchema, req.body);
    ctx.gadgets.assertNameAvailable(spec.name);
    req.log.info({ name: spec.name }, 'Gadget spec received');
    return { message: `Gadget spec '${spec.name}' would be created (simulation).`, received_data: spec };
  });
}
