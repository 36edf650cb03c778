import type { InjectOptions, LightMyRequestResponse } from 'fastify';
import { buildApp, type BuildAppOptions } from '../src/server';

export type AppInstance = Awaited<ReturnType<typeof buildApp>>;

export const TEST_API_KEY = 'test-secret';
export const TEST_VERSION = '9.9.9-test';

/** Pins the settings tests assert on, whatever the local .env says. */
export function buildTestApp(options: BuildAppOptions = {}) {
  return buildApp({
    apiKeySecret: TEST_API_KEY,
    adminUsername: 'batman',
    version: TEST_VERSION,
    ...options,
  });
}

export async function injectWithTiming(
  app: AppInstance,
  label: string,
  opts: InjectOptions,
): Promise<{ res: LightMyRequestResponse; ms: number }> {
  const start = performance.now();
  const res = await app.inject(opts);
  const ms = performance.now() - start;
  console.log(`[timings] ${label}: ${ms.toFixed(3)}ms`);
  return { res, ms };
}
