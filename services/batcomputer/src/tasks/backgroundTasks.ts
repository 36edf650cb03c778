import type { FastifyBaseLogger } from 'fastify';
import { ServiceUnavailableError } from '../errors';

export type Job<A extends unknown[] = unknown[]> = (...args: A) => Promise<void> | void;

interface QueuedJob {
  name: string;
  run: () => Promise<void> | void;
}

export interface TaskRunnerStats {
  completed: number;
  failed: number;
  queued: number;
  reserved: number;
  running: boolean;
}

/**
 * Bounded queue of deferred jobs, consumed by a single worker loop in
 * submission order. Capacity covers queued jobs plus jobs reserved by
 * requests whose response has not been sent yet.
 *
 * Job failures never reach the client; they are logged and counted.
 */
export class TaskRunner {
  private readonly queue: QueuedJob[] = [];
  private reserved = 0;
  private running = false;
  private completed = 0;
  private failed = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly capacity: number,
    private readonly log: FastifyBaseLogger,
  ) {}

  /** Claims a slot; throws `ServiceUnavailableError` when the queue is full. */
  reserve(): void {
    if (this.reserved + this.queue.length >= this.capacity) {
      throw new ServiceUnavailableError('Background task queue is full.');
    }
    this.reserved += 1;
  }

  /** Gives back slots whose jobs will never be submitted. */
  release(count: number): void {
    this.reserved = Math.max(0, this.reserved - count);
    this.notifyIfIdle();
  }

  submit(jobs: QueuedJob[]): void {
    this.reserved = Math.max(0, this.reserved - jobs.length);
    this.queue.push(...jobs);
    if (this.queue.length === 0) {
      this.notifyIfIdle();
      return;
    }
    this.pump();
  }

  stats(): TaskRunnerStats {
    return {
      completed: this.completed,
      failed: this.failed,
      queued: this.queue.length,
      reserved: this.reserved,
      running: this.running,
    };
  }

  /** Resolves once nothing is reserved, queued or running. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    if (this.running) return;
    this.running = true;
    this.work().catch((err) => {
      this.log.error({ err }, 'Background worker stopped unexpectedly');
    });
  }

  private async work(): Promise<void> {
    try {
      let job = this.queue.shift();
      while (job) {
        try {
          await job.run();
          this.completed += 1;
          this.log.debug({ job: job.name }, 'Background job finished');
        } catch (err) {
          this.failed += 1;
          this.log.error({ err, job: job.name }, 'Background job failed');
        }
        job = this.queue.shift();
      }
    } finally {
      this.running = false;
      this.notifyIfIdle();
    }
  }

  private isIdle(): boolean {
    return !this.running && this.queue.length === 0 && this.reserved === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

/**
 * Jobs scheduled while handling one request. They are handed to the runner
 * only after the response has gone out (`commit`), or dropped (`discard`).
 */
export class BackgroundTasks {
  private readonly jobs: QueuedJob[] = [];

  constructor(private readonly runner: TaskRunner) {}

  get size(): number {
    return this.jobs.length;
  }

  add<A extends unknown[]>(name: string, job: Job<A>, ...args: A): void {
    this.runner.reserve();
    this.jobs.push({ name, run: () => job(...args) });
  }

  commit(): void {
    if (this.jobs.length === 0) return;
    this.runner.submit(this.jobs.splice(0));
  }

  discard(): void {
    if (this.jobs.length === 0) return;
    this.runner.release(this.jobs.splice(0).length);
  }
}
