import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../contracts/appContext';
import { BadGatewayError, HttpError, NotFoundError, ServiceUnavailableError } from '../errors';
import { intParam } from '../schemas';
import { UpstreamStatusError, UpstreamUnavailableError } from '../upstream/intelFeed';
import { parseInput } from '../validation';

const postsQuery = z.object({
  limit: intParam.default('5'),
  user_id: intParam.optional(),
});

const contactParams = z.object({ contact_id: intParam });

export async function registerIntelRoutes(app: FastifyInstance, ctx: AppContext) {
  app.get('/fetch-posts', async (req) => {
    const { limit, user_id } = parseInput(postsQuery, req.query);
    try {
      const { params, posts } = await ctx.intelFeed.fetchPosts({ limit, userId: user_id });
      return {
        message: `Successfully fetched ${posts.length} intel reports (posts) from external source`,
        source: 'JSONPlaceholder API (Simulated Intel Feed)',
        filter_params_sent: params,
        reports: posts,
      };
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) {
        req.log.warn({ err, url: err.url }, 'Intel feed unreachable');
        throw new ServiceUnavailableError(`External intel feed request failed: ${err.message}`);
      }
      if (err instanceof UpstreamStatusError) {
        req.log.warn({ url: err.url, status: err.status }, 'Intel feed returned an error');
        throw new HttpError(err.status, `External intel feed error: ${err.body}`);
      }
      throw err;
    }
  });

  app.get('/fetch-contacts/:contact_id', async (req) => {
    const { contact_id } = parseInput(contactParams, req.params);
    try {
      const contact = await ctx.intelFeed.fetchUser(contact_id);
      return {
        message: `Successfully fetched contact ${contact_id}`,
        source: 'JSONPlaceholder API (Simulated Contact DB)',
        contact_data: contact,
      };
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) {
        req.log.warn({ err, url: err.url }, 'Contact database unreachable');
        throw new ServiceUnavailableError(`External contact database request failed: ${err.message}`);
      }
      if (err instanceof UpstreamStatusError) {
        if (err.status === 404) {
          throw new NotFoundError(`Contact with ID ${contact_id} not found in external source.`);
        }
        throw new BadGatewayError(`External contact database returned status ${err.status}: ${err.body}`);
      }
      throw err;
    }
  });
}
