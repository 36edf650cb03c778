import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';

export interface DbSession {
  id: string;
  status: 'connected' | 'closed';
  data: Record<string, string>;
}

/** Simulated DB sessions: opened per call, always closed, even when the callback throws. */
export class SessionPool {
  private readonly open = new Set<string>();

  constructor(private readonly log: FastifyBaseLogger) {}

  get active(): number {
    return this.open.size;
  }

  async withSession<R>(fn: (session: DbSession) => Promise<R> | R): Promise<R> {
    const session: DbSession = { id: randomUUID(), status: 'connected', data: {} };
    this.open.add(session.id);
    this.log.info({ session: session.id }, 'DB session opened');
    try {
      return await fn(session);
    } finally {
      session.status = 'closed';
      this.open.delete(session.id);
      this.log.info({ session: session.id }, 'DB session closed');
    }
  }
}
