import type { Schema } from '../resolvers/types.js';
import { invalidArgument } from '../errors.js';

/**
 * Validate caller input against a zod schema, raising INVALID_ARGUMENT on the first issue
 */
export function parseArgument<T>(schema: Schema<T>, value: unknown, name: string): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const where = issue.path.length > 0 ? `${name}.${issue.path.join('.')}` : name;
  throw invalidArgument(where, issue.message);
}
