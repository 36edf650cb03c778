import fp from 'fastify-plugin';
import type { FastifyRequest } from 'fastify';
import { BackgroundTasks, TaskRunner } from '../tasks/backgroundTasks';

declare module 'fastify' {
  interface FastifyInstance {
    taskRunner: TaskRunner;
    backgroundTasks(req: FastifyRequest): BackgroundTasks;
  }
}

export interface BackgroundTasksPluginOptions {
  capacity: number;
}

/**
 * Gives every request its own `BackgroundTasks`. Jobs run after a successful
 * response is sent; error responses and aborted requests drop them.
 */
export const backgroundTasksPlugin = fp<BackgroundTasksPluginOptions>(
  async (app, opts) => {
    const runner = new TaskRunner(opts.capacity, app.log.child({ component: 'tasks' }));
    const perRequest = new WeakMap<FastifyRequest, BackgroundTasks>();

    app.decorate('taskRunner', runner);
    app.decorate('backgroundTasks', (req: FastifyRequest) => {
      let tasks = perRequest.get(req);
      if (!tasks) {
        tasks = new BackgroundTasks(runner);
        perRequest.set(req, tasks);
      }
      return tasks;
    });

    app.addHook('onResponse', async (req, reply) => {
      const tasks = perRequest.get(req);
      if (!tasks) return;
      if (reply.statusCode < 400) tasks.commit();
      else tasks.discard();
    });

    app.addHook('onRequestAbort', async (req) => {
      perRequest.get(req)?.discard();
    });

    app.addHook('onClose', async () => {
      await runner.drain();
    });
  },
  { name: 'background-tasks' },
);
