import Fastify from 'fastify';
import cors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import fastifyView from '@fastify/view';
import handlebars from 'handlebars';
import { config, type AppConfig } from './config';
import type { AppContext } from './contracts/appContext';
import { HttpError, ValidationError } from './errors';
import { createIdentityGuards, simulatedCurrentUser, type CurrentUserProvider } from './guards/identity';
import { SessionPool } from './guards/session';
import { backgroundTasksPlugin } from './plugins/backgroundTasks';
import { responseHeaders } from './plugins/responseHeaders';
import { registerContactRoutes } from './routes/contacts';
import { registerGadgetRoutes } from './routes/gadgets';
import { registerGauntletRoutes } from './routes/gauntlet';
import { registerIntelRoutes } from './routes/intel';
import { registerRootRoutes } from './routes/root';
import { registerSecureRoutes } from './routes/secure';
import { registerTaskRoutes } from './routes/tasks';
import { registerViewRoutes } from './routes/views';
import type { Character, Contact } from './schemas';
import { createGadgetCatalog, createStoneCatalog } from './storage/catalogs';
import { MemoryRecordStore } from './storage/memoryRecordStore';
import { IntelFeedClient } from './upstream/intelFeed';
import { DashboardRenderer } from './views/dashboard';

export interface BuildAppOptions extends Partial<AppConfig> {
  /** Pino logging; off unless asked for. */
  logger?: boolean;
  currentUser?: CurrentUserProvider;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const { logger = false, currentUser = simulatedCurrentUser, ...overrides } = options;
  const settings: AppConfig = { ...config, ...overrides };

  const app = Fastify({ logger: logger ? { level: settings.logLevel } : false });

  const ctx: AppContext = {
    config: settings,
    gadgets: createGadgetCatalog(),
    stones: createStoneCatalog(),
    contacts: new MemoryRecordStore<Contact>({ label: 'Contact' }),
    characters: new MemoryRecordStore<Character>({ label: 'Character' }),
    guards: createIdentityGuards({
      apiKeySecret: settings.apiKeySecret,
      adminUsername: settings.adminUsername,
      currentUser,
    }),
    sessions: new SessionPool(app.log.child({ component: 'sessions' })),
    intelFeed: new IntelFeedClient(settings.intelFeed),
    dashboards: new DashboardRenderer(settings.templatesDir),
    jobs: {
      log: app.log.child({ component: 'jobs' }),
      delayMs: settings.tasks.delayMs,
      activityLogDir: settings.activityLogDir,
    },
  };

  // --- Middleware ---
  await app.register(responseHeaders, { version: settings.version });
  await app.register(cors, {
    origin: settings.corsOrigins,
    credentials: true,
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  });
  await app.register(fastifyStatic, { root: settings.staticDir, prefix: '/static/' });
  await app.register(fastifyView, { engine: { handlebars }, root: settings.templatesDir });
  await app.register(backgroundTasksPlugin, { capacity: settings.tasks.capacity });

  // --- Errors ---
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ValidationError) {
      return reply.code(err.statusCode).send({ detail: err.detail, errors: err.errors });
    }
    if (err instanceof HttpError) {
      if (err.statusCode >= 500) req.log.error({ err }, err.detail);
      return reply.code(err.statusCode).send({ detail: err.detail });
    }
    // framework errors such as malformed JSON bodies keep their 4xx status
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ detail: err.message });
    }
    req.log.error({ err }, 'Unhandled error');
    return reply.code(500).send({ detail: 'Internal server error' });
  });

  app.setNotFoundHandler((_req, reply) => reply.code(404).send({ detail: 'Not Found' }));

  // --- Routes ---
  await registerRootRoutes(app, ctx);
  await registerGadgetRoutes(app, ctx);
  await registerContactRoutes(app, ctx);
  await registerSecureRoutes(app, ctx);
  await registerTaskRoutes(app, ctx);
  await registerIntelRoutes(app, ctx);
  await registerGauntletRoutes(app, ctx);
  await registerViewRoutes(app, ctx);

  return app;
}
