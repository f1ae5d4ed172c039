/**
 * Shared fixtures for the unit tests
 */

import { Quote } from '../core/quote.js';
import { QuoteError, QuoteErrorCode } from '../errors.js';
import type { RandomNumberGenerator } from '../core/random.js';
import type { Schema, StreamResolver } from '../resolvers/types.js';

export function makeQuote(id: string | number, tags: string[] = [], value = `Quote ${id}`): Quote {
  return new Quote({ id, value, author: 'Test Author', source: 'test-source', tags });
}

/**
 * Random source that replays the given values, clamped into the requested range
 */
export function scriptedRandom(...values: number[]): RandomNumberGenerator & { calls: Array<[number, number]> } {
  let position = 0;
  const calls: Array<[number, number]> = [];

  return {
    calls,
    nextInt(min: number, max: number): number {
      calls.push([min, max]);
      const value = values.length > 0 ? values[position % values.length] ?? min : min;
      position++;
      return Math.min(Math.max(value, min), max - 1);
    },
  };
}

/**
 * Run `fn` and return the QuoteError it raised, failing the test otherwise
 */
export function captureQuoteError(fn: () => unknown): QuoteError {
  try {
    fn();
  } catch (error) {
    if (error instanceof QuoteError) return error;
    throw error;
  }
  throw new Error('expected a QuoteError to be thrown');
}

export async function captureQuoteErrorAsync(fn: () => Promise<unknown>): Promise<QuoteError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof QuoteError) return error;
    throw error;
  }
  throw new Error('expected a QuoteError to be thrown');
}

/**
 * In-process resolver serving canned bodies by exact path. Bodies still go
 * through the caller's schema, so models are validated as in production.
 */
export class FakeResolver implements StreamResolver {
  readonly baseUrl = 'https://fake.test/';
  readonly requests: string[] = [];
  private readonly bodies = new Map<string, unknown>();
  private readonly binaries = new Map<string, Uint8Array>();

  on(path: string, body: unknown): this {
    this.bodies.set(path, body);
    return this;
  }

  onBytes(path: string, data: Uint8Array): this {
    this.binaries.set(path, data);
    return this;
  }

  async resolve<T>(path: string, schema: Schema<T>): Promise<T> {
    const value = await this.tryResolve(path, schema);
    if (value === null) {
      throw new QuoteError(QuoteErrorCode.NOT_FOUND, `Resource not found: ${path}`);
    }
    return value;
  }

  async tryResolve<T>(path: string, schema: Schema<T>): Promise<T | null> {
    this.requests.push(path);
    if (!this.bodies.has(path)) return null;
    return schema.parse(this.bodies.get(path));
  }

  async resolveBytes(path: string): Promise<Uint8Array> {
    this.requests.push(path);
    const data = this.binaries.get(path);
    if (!data) {
      throw new QuoteError(QuoteErrorCode.NOT_FOUND, `Resource not found: ${path}`);
    }
    return data;
  }
}
