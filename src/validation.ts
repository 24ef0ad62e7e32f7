import type { z } from 'zod';

import { InvalidArgumentError } from './errors.js';

/** Parses caller input, turning the first zod issue into an InvalidArgumentError. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw InvalidArgumentError.fromZod(result.error);
  }
  return result.data;
}
