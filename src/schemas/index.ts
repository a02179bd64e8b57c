import type { z } from 'zod';
import { validationError } from '../common/errors';

/** Parses a request payload, turning schema failures into `invalid-argument`. */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw validationError(parsed.error);
  return parsed.data;
}

export * from './user';
export * from './qa';
export * from './lesson';
export * from './analytics';
