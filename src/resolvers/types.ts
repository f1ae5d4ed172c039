/**
 * Resolver Types
 *
 * Providers never talk to fetch directly. They ask a resolver for a path and
 * hand it the zod schema the response must satisfy.
 */

import type { z } from 'zod';

/**
 * Any zod schema producing T, whatever its input shape
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ResourceResolver {
  /** Base address that relative paths resolve against */
  readonly baseUrl: string;

  /**
   * Fetch and validate a resource
   * @throws QuoteError NOT_FOUND, PROVIDER_UNAVAILABLE or INVALID_RESPONSE
   */
  resolve<T>(path: string, schema: Schema<T>): Promise<T>;

  /**
   * Like resolve(), but a missing resource yields null
   */
  tryResolve<T>(path: string, schema: Schema<T>): Promise<T | null>;
}

export interface StreamResolver extends ResourceResolver {
  /** Raw body bytes, for binary resources such as images */
  resolveBytes(path: string): Promise<Uint8Array>;
}

/**
 * Append a query string to a path, respecting any query already present
 */
export function applyQuery(path: string, query: string): string {
  if (query.length === 0) return path;
  return `${path}${path.includes('?') ? '&' : '?'}${query}`;
}
