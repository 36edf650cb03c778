import type { FastifyRequest } from 'fastify';

/**
 * One capability check: takes what the previous stage produced and either
 * returns a derived value or throws an `HttpError` to short-circuit the request.
 */
export type Stage<In, Out> = (input: In, req: FastifyRequest) => Out | Promise<Out>;

/**
 * Ordered list of stages composed left to right.
 *
 * ```ts
 * const verifiedUser = GuardChain.from(extractHeader('X-API-Key')).then(verifyApiKey(secret));
 * const user = await verifiedUser.resolve(req);
 * ```
 */
export class GuardChain<T> {
  private constructor(
    private readonly run: (req: FastifyRequest) => Promise<T>,
    readonly stages: readonly string[],
  ) {}

  static from<T>(first: Stage<void, T>, name = first.name || 'stage'): GuardChain<T> {
    return new GuardChain(async (req) => first(undefined, req), [name]);
  }

  then<U>(next: Stage<T, U>, name = next.name || 'stage'): GuardChain<U> {
    return new GuardChain(async (req) => next(await this.run(req), req), [...this.stages, name]);
  }

  resolve(req: FastifyRequest): Promise<T> {
    return this.run(req);
  }
}
