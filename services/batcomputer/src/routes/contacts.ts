import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../contracts/appContext';
import { contactSchema } from '../schemas';
import { registerRecordRoutes } from './records';

export async function registerContactRoutes(app: FastifyInstance, ctx: AppContext) {
  await registerRecordRoutes(app, {
    path: '/contacts',
    listKey: 'contacts',
    label: 'Contact',
    store: ctx.contacts,
    schema: contactSchema,
    pagination: ctx.guards.pagination,
  });

  app.get('/contacts/me', async (req) => ctx.guards.currentUser.resolve(req));
}
