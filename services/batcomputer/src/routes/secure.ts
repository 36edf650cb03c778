import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../contracts/appContext';
import { ServerError } from '../errors';
import { titleCase } from '../text';

export async function registerSecureRoutes(app: FastifyInstance, ctx: AppContext) {
  app.get('/gcpd-files', async (req) => {
    const user = await ctx.guards.verifiedUser.resolve(req);
    return { message: 'Access granted to secure GCPD files.', accessed_by: user };
  });

  app.get('/batcave/control-panel', async (req) => {
    const admin = await ctx.guards.adminUser.resolve(req);
    return { message: `Welcome to the Batcave Control Panel, ${titleCase(admin.username)}!` };
  });

  app.get('/batcomputer-logs', async (req) =>
    ctx.sessions.withSession((session) => {
      session.data.log_entry_1 = 'Accessed gadget inventory.';
      req.log.info({ session: session.id }, 'Reading logs');
      // copied: the session is marked closed once this callback returns
      return {
        message: 'Log data accessed using DB session',
        session_details: { ...session, data: { ...session.data } },
      };
    }),
  );

  app.get('/batcomputer-logs-error', async (req) =>
    ctx.sessions.withSession((session) => {
      session.data.log_entry_error = 'Attempting risky operation...';
      req.log.warn({ session: session.id, data: session.data }, 'Risky operation on the Batcomputer core');
      throw new ServerError('Batcomputer core meltdown simulated!');
    }),
  );
}
