import path from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import Fastify from 'fastify';
import { BackgroundTasks, TaskRunner } from '../src/tasks/backgroundTasks';
import { ACTIVITY_LOG_FILE, logActivity } from '../src/tasks/jobs';
import { BadRequestError, ServiceUnavailableError } from '../src/errors';
import { buildTestApp, injectWithTiming, type AppInstance } from './helpers';

const silentLog = Fastify({ logger: false }).log;

describe('TaskRunner', () => {
  it('runs nothing until commit, then runs jobs in order', async () => {
    const runner = new TaskRunner(5, silentLog);
    const tasks = new BackgroundTasks(runner);
    const order: string[] = [];

    tasks.add('first', (label: string) => {
      order.push(label);
    }, 'one');
    tasks.add('second', async (label: string) => {
      order.push(label);
    }, 'two');

    expect(tasks.size).toBe(2);
    expect(runner.stats().reserved).toBe(2);
    expect(order).toEqual([]);

    tasks.commit();
    await runner.drain();

    expect(order).toEqual(['one', 'two']);
    expect(runner.stats()).toEqual({ completed: 2, failed: 0, queued: 0, reserved: 0, running: false });
  });

  it('logs and counts a failing job, then keeps going', async () => {
    const log = Fastify({ logger: false }).log;
    const errorSpy = vi.spyOn(log, 'error');
    const runner = new TaskRunner(5, log);
    const tasks = new BackgroundTasks(runner);
    const after = vi.fn();

    tasks.add('explodes', async () => {
      throw new Error('batmobile out of fuel');
    });
    tasks.add('after', after);
    tasks.commit();
    await runner.drain();

    expect(after).toHaveBeenCalledTimes(1);
    expect(runner.stats().failed).toBe(1);
    expect(runner.stats().completed).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.objectContaining({ job: 'explodes' }), 'Background job failed');
    errorSpy.mockRestore();
  });

  it('refuses work beyond capacity and frees slots on discard', async () => {
    const runner = new TaskRunner(1, silentLog);
    const tasks = new BackgroundTasks(runner);
    const job = vi.fn();

    tasks.add('only', job);
    expect(() => tasks.add('overflow', job)).toThrow(ServiceUnavailableError);
    expect(() => tasks.add('overflow', job)).toThrow('Background task queue is full.');

    tasks.discard();
    expect(runner.stats().reserved).toBe(0);
    await runner.drain();
    expect(job).not.toHaveBeenCalled();

    const retry = new BackgroundTasks(runner);
    expect(() => retry.add('again', job)).not.toThrow();
    retry.discard();
  });
});

describe('background jobs over HTTP', () => {
  let app: AppInstance;
  let logDir: string;

  beforeEach(async () => {
    logDir = await mkdtemp(path.join(tmpdir(), 'batcomputer-tasks-'));
    app = await buildTestApp({ activityLogDir: logDir, tasks: { capacity: 2, delayMs: 0 } });
  });

  afterEach(async () => {
    await app.close();
    await rm(logDir, { recursive: true, force: true });
  });

  it('appends to the activity log after responding', async () => {
    const { res } = await injectWithTiming(app, 'POST /log-activity', {
      method: 'POST',
      url: '/log-activity/bruce@wayne.enterprises?activity_description=Patrolled%20Gotham',
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: 'Activity logging initiated for bruce@wayne.enterprises.' });

    await app.taskRunner.drain();
    const written = await readFile(path.join(logDir, ACTIVITY_LOG_FILE), 'utf8');
    expect(written).toBe('User bruce@wayne.enterprises activity: Patrolled Gotham\n');
  });

  it('uses the default activity description', async () => {
    await app.inject({ method: 'POST', url: '/log-activity/alfred@wayne.enterprises' });
    await app.inject({ method: 'POST', url: '/log-activity/alfred@wayne.enterprises' });
    await app.taskRunner.drain();

    const written = await readFile(path.join(logDir, ACTIVITY_LOG_FILE), 'utf8');
    expect(written).toBe(
      'User alfred@wayne.enterprises activity: Generic activity logged.\n'.repeat(2),
    );
  });

  it('422 for an invalid email, with nothing scheduled', async () => {
    const { res } = await injectWithTiming(app, 'POST /log-activity (bad email)', {
      method: 'POST',
      url: '/log-activity/not-an-email',
    });
    expect(res.statusCode).toBe(422);
    expect(app.taskRunner.stats().reserved).toBe(0);
  });

  it('queues intel report compilation', async () => {
    const { res } = await injectWithTiming(app, 'POST /request-intel-report', {
      method: 'POST',
      url: '/request-intel-report',
      payload: { recipient_email: 'gordon@gcpd.gov', report_name: 'Arkham Breakout' },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      message: "Intel report 'Arkham Breakout' compilation requested for gordon@gcpd.gov. Alfred is on it.",
    });

    await app.taskRunner.drain();
    expect(app.taskRunner.stats().completed).toBe(1);
  });

  it('422 for a malformed intel report request', async () => {
    const { res } = await injectWithTiming(app, 'POST /request-intel-report (bad body)', {
      method: 'POST',
      url: '/request-intel-report',
      payload: { recipient_email: 'nope', report_name: 'X' },
    });
    expect(res.statusCode).toBe(422);
    expect(res.json().detail).toBe('Request validation failed');
  });

  it('drops jobs of a request that ends in an error', async () => {
    const job = vi.fn();
    app.post('/test/fails-after-scheduling', async (req) => {
      app.backgroundTasks(req).add('never', job);
      throw new BadRequestError('changed my mind');
    });

    const res = await app.inject({ method: 'POST', url: '/test/fails-after-scheduling' });
    expect(res.statusCode).toBe(400);

    await app.taskRunner.drain();
    expect(job).not.toHaveBeenCalled();
    expect(app.taskRunner.stats()).toMatchObject({ completed: 0, reserved: 0, queued: 0 });
  });

  it('a failing job does not change the response', async () => {
    app.post('/test/failing-job', async (req) => {
      app.backgroundTasks(req).add('boom', () => {
        throw new Error('boom');
      });
      return { ok: true };
    });

    const res = await app.inject({ method: 'POST', url: '/test/failing-job' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });

    await app.taskRunner.drain();
    expect(app.taskRunner.stats().failed).toBe(1);
  });

  it('503 when the queue is full', async () => {
    const job = vi.fn();
    app.post('/test/greedy', async (req) => {
      const tasks = app.backgroundTasks(req);
      for (let i = 0; i < 3; i += 1) tasks.add(`job-${i}`, job);
      return { ok: true };
    });

    const res = await app.inject({ method: 'POST', url: '/test/greedy' });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ detail: 'Background task queue is full.' });

    await app.taskRunner.drain();
    expect(job).not.toHaveBeenCalled();
  });
});

describe('logActivity', () => {
  it('creates the log directory when missing', async () => {
    const root = await mkdtemp(path.join(tmpdir(), 'batcomputer-jobs-'));
    const nested = path.join(root, 'deep', 'logs');
    await logActivity({ log: silentLog, delayMs: 0, activityLogDir: nested }, 'lucius@wayne.enterprises', 'Upgraded suit');

    const written = await readFile(path.join(nested, ACTIVITY_LOG_FILE), 'utf8');
    expect(written).toBe('User lucius@wayne.enterprises activity: Upgraded suit\n');
    await rm(root, { recursive: true, force: true });
  });
});
