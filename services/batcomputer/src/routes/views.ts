import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../contracts/appContext';
import { archiveStatus, inventoryStatus } from '../status';
import { TEMPLATES } from '../views/dashboard';

export async function registerViewRoutes(app: FastifyInstance, ctx: AppContext) {
  app.get('/batcave-display', async (_req, reply) =>
    ctx.dashboards.render(reply, TEMPLATES.batcave, {
      page_title: 'Batcave Main Display',
      heading: 'Welcome to the Batcave',
      status_data: inventoryStatus(ctx.gadgets),
      gadgets: ctx.gadgets.entries(),
    }),
  );

  app.get('/contacts-view', async (_req, reply) =>
    ctx.dashboards.render(reply, TEMPLATES.contacts, {
      page_title: 'Contact Database',
      heading: 'Registered Contacts',
      contacts: await ctx.contacts.list(),
    }),
  );

  app.get('/home', async (_req, reply) =>
    ctx.dashboards.render(reply, TEMPLATES.gauntlet, {
      page_title: 'Knowhere Hub',
      heading: "Welcome to the Collector's Archive!",
      status_data: archiveStatus(ctx.stones),
      stones: ctx.stones.entries(),
    }),
  );

  app.get('/characters-view', async (_req, reply) =>
    ctx.dashboards.render(reply, TEMPLATES.characters, {
      page_title: 'Character Database',
      heading: 'Registered Characters',
      characters: await ctx.characters.list(),
    }),
  );
}
