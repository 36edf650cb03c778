import { z } from 'zod';
import { errorMessage } from '../errors';

export interface IntelFeedOptions {
  baseUrl: string;
  timeoutMs: number;
}

/** The feed could not be reached (DNS, refused connection, timeout). */
export class UpstreamUnavailableError extends Error {
  constructor(readonly url: string, cause: unknown) {
    super(errorMessage(cause), { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/** The feed answered with a non-2xx status. */
export class UpstreamStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Upstream ${url} returned ${status}`);
    this.name = 'UpstreamStatusError';
  }
}

const postsSchema = z.array(z.record(z.unknown()));
const userSchema = z.record(z.unknown());

export type IntelPost = z.infer<typeof postsSchema>[number];
export type IntelUser = z.infer<typeof userSchema>;

export interface PostsQuery {
  limit: number;
  userId?: number;
}

export interface PostsResult {
  params: Record<string, number>;
  posts: IntelPost[];
}

/**
 * Client for a JSONPlaceholder-style service, standing in for an external
 * intel feed and contact database.
 */
export class IntelFeedClient {
  constructor(private readonly options: IntelFeedOptions) {}

  async fetchPosts(query: PostsQuery): Promise<PostsResult> {
    const params: Record<string, number> = { _limit: query.limit };
    if (query.userId !== undefined) params.userId = query.userId;

    const payload = await this.getJson('/posts', params);
    return { params, posts: this.validate(postsSchema, payload, '/posts') };
  }

  async fetchUser(id: number): Promise<IntelUser> {
    const payload = await this.getJson(`/users/${id}`);
    return this.validate(userSchema, payload, `/users/${id}`);
  }

  private async getJson(pathname: string, params: Record<string, number> = {}): Promise<unknown> {
    const url = new URL(`${this.options.baseUrl.replace(/\/+$/, '')}${pathname}`);
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, String(value));

    let res: Response;
    try {
      res = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamUnavailableError(url.toString(), err);
    }

    if (!res.ok) {
      throw new UpstreamStatusError(url.toString(), res.status, await safeErrorBody(res));
    }
    try {
      return await res.json();
    } catch {
      throw new UpstreamStatusError(url.toString(), 502, 'malformed payload');
    }
  }

  private validate<S extends z.ZodTypeAny>(schema: S, payload: unknown, pathname: string): z.output<S> {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamStatusError(`${this.options.baseUrl}${pathname}`, 502, 'malformed payload');
    }
    return parsed.data;
  }
}

async function safeErrorBody(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return '';
  }
}
