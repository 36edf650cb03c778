import type { z } from 'zod';
import { ValidationError } from './errors';

export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new ValidationError(parsed.error.flatten());
  return parsed.data;
}
