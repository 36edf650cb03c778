import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../contracts/appContext';
import { intParam } from '../schemas';
import { inventoryStatus } from '../status';
import { titleCase } from '../text';
import { parseInput } from '../validation';

// ---------- Schemas ----------
const locationParams = z.object({ location_name: z.string().min(1) });

const locationDetailsQuery = z.object({
  min_threat_level: intParam.default('0'),
});

const rogueCaseParams = z.object({
  rogue_name: z.string().min(1),
  case_id: intParam,
});

const searchQuery = z.object({
  keyword: z.string().optional(),
  limit: intParam.default('10'),
});

const filterQuery = z.object({
  min_utility: intParam.default('0'),
  max_utility: intParam.optional(),
});

const ITEM_COUNT = 500;

// gadgets without a rating count as 0
const DEFAULT_UTILITY = 0;

// ---------- Routes ----------
export async function registerRootRoutes(app: FastifyInstance, ctx: AppContext) {
  app.get('/', async () => {
    return { message: 'Welcome to the Batcomputer API Interface. Try /batcave-display for HTML view.' };
  });

  app.get('/status', async () => inventoryStatus(ctx.gadgets));

  app.get('/locations/:location_name', async (req) => {
    const { location_name } = parseInput(locationParams, req.params);
    req.log.info({ location_name }, 'Scanning location');
    return { message: `Scanning location: ${titleCase(location_name)}` };
  });

  app.get('/locations/:location_name/details', async (req) => {
    const { location_name } = parseInput(locationParams, req.params);
    const { min_threat_level } = parseInput(locationDetailsQuery, req.query);
    const location = titleCase(location_name);
    return {
      location,
      filter_min_threat: min_threat_level,
      data: `Intel report for ${location} with threat level > ${min_threat_level} would go here.`,
    };
  });

  app.get('/rogues/:rogue_name/cases/:case_id', async (req) => {
    const { rogue_name, case_id } = parseInput(rogueCaseParams, req.params);
    return { rogue: titleCase(rogue_name), case_id, status: 'Case file found' };
  });

  app.get('/search-database', async (req) => {
    const { keyword, limit } = parseInput(searchQuery, req.query);
    if (!keyword) {
      return { message: "Provide a 'keyword' query parameter to search the database.", results_limit: limit };
    }
    return { searching_for_keyword: keyword, results_limit: limit, results: [] };
  });

  app.get('/filter-gadgets', async (req) => {
    const { min_utility, max_utility } = parseInput(filterQuery, req.query);
    const results = ctx.gadgets.entries().filter((gadget) => {
      const utility = gadget.utility_level ?? DEFAULT_UTILITY;
      return utility >= min_utility && (max_utility === undefined || utility <= max_utility);
    });
    return {
      filtering_gadgets_by: {
        min_utility,
        max_utility: max_utility ?? 'No upper limit',
      },
      results,
    };
  });

  app.get('/items', async (req) => {
    const { skip, limit } = await ctx.guards.pagination.resolve(req);
    const items: string[] = [];
    for (let i = skip + 1; i <= Math.min(ITEM_COUNT, skip + limit); i += 1) items.push(`item_${i}`);
    return { skip, limit, items };
  });
}
