/**
 * HTTP Resolver
 *
 * fetch-based ResourceResolver. Each request carries the configured
 * User-Agent and timeout and is timed through withTiming, so upstream
 * latency and failures show up in getStats().
 *
 * Usage:
 *   const resolver = new HttpResolver({ baseUrl: QUOTABLE.apiPage, name: 'quotable' });
 *   const quote = await resolver.resolve('random', QuoteModelSchema);
 */

import { DEFAULT_HTTP_CONFIG, type HttpConfig } from '../config/http.js';
import { QuoteError, QuoteErrorCode, invalidArgument, nullOrEmpty } from '../errors.js';
import { withTiming } from '../utils/logger.js';
import type { Schema, StreamResolver } from './types.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpResolverOptions {
  baseUrl: string;
  /** Label used for timing metrics, e.g. "quotable" */
  name?: string;
  /** Defaults to the global fetch, looked up per request */
  fetchFn?: FetchFn;
  config?: HttpConfig;
}

const ABSOLUTE_URL = /^https?:\/\//i;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class HttpResolver implements StreamResolver {
  readonly baseUrl: string;
  readonly name: string;
  private readonly fetchFn: FetchFn | undefined;
  private readonly config: HttpConfig;

  constructor(options: HttpResolverOptions) {
    if (!options.baseUrl || !ABSOLUTE_URL.test(options.baseUrl)) {
      throw invalidArgument('baseUrl', 'must be an absolute http(s) URL');
    }

    this.baseUrl = options.baseUrl;
    this.name = options.name ?? new URL(options.baseUrl).hostname;
    this.fetchFn = options.fetchFn;
    this.config = options.config ?? DEFAULT_HTTP_CONFIG;
  }

  /**
   * Absolute URL for a path; "" is the base itself
   */
  resolveUrl(path: string): string {
    if (path === '') return this.baseUrl;
    if (path.trim().length === 0) {
      throw nullOrEmpty('path');
    }
    if (ABSOLUTE_URL.test(path)) return path;

    const base = this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`;
    return new URL(path.replace(/^\/+/, ''), base).toString();
  }

  async resolve<T>(path: string, schema: Schema<T>): Promise<T> {
    const url = this.resolveUrl(path);
    const response = await this.get(url, false);
    return this.parse(url, response, schema);
  }

  async tryResolve<T>(path: string, schema: Schema<T>): Promise<T | null> {
    const url = this.resolveUrl(path);
    const response = await this.get(url, true);
    if (response === null) return null;
    return this.parse(url, response, schema);
  }

  async resolveBytes(path: string): Promise<Uint8Array> {
    const url = this.resolveUrl(path);
    const response = await this.get(url, false);
    return new Uint8Array(await response.arrayBuffer());
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private get(url: string, allowMissing: true): Promise<Response | null>;
  private get(url: string, allowMissing: false): Promise<Response>;
  private async get(url: string, allowMissing: boolean): Promise<Response | null> {
    const { result } = await withTiming(`${this.name}.get`, { url }, async () => {
      const response = await this.send(url);

      if (response.status === 404) {
        if (allowMissing) return null;
        throw new QuoteError(QuoteErrorCode.NOT_FOUND, `Resource not found: ${url}`, undefined, {
          url,
          status: 404,
        });
      }

      if (!response.ok) {
        throw new QuoteError(
          QuoteErrorCode.PROVIDER_UNAVAILABLE,
          `${this.name} returned ${response.status} for ${url}`,
          'The upstream API may be down; try again later',
          { url, status: response.status },
        );
      }

      return response;
    });

    return result;
  }

  private async send(url: string): Promise<Response> {
    const fetchFn = this.fetchFn ?? globalThis.fetch;

    try {
      return await fetchFn(url, {
        headers: {
          Accept: 'application/json',
          'User-Agent': this.config.userAgent,
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new QuoteError(
        QuoteErrorCode.PROVIDER_UNAVAILABLE,
        timedOut
          ? `Request to ${url} timed out after ${this.config.timeoutMs}ms`
          : `Request to ${url} failed: ${describeError(error)}`,
        timedOut ? 'Raise QUOTES_HTTP_TIMEOUT_MS or try again later' : undefined,
        { url },
      );
    }
  }

  private async parse<T>(url: string, response: Response, schema: Schema<T>): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new QuoteError(
        QuoteErrorCode.INVALID_RESPONSE,
        `${this.name} sent malformed JSON for ${url}: ${describeError(error)}`,
        undefined,
        { url },
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new QuoteError(
        QuoteErrorCode.INVALID_RESPONSE,
        `${this.name} sent an unexpected response for ${url}: ${where}${issue?.message ?? 'invalid'}`,
        undefined,
        { url },
      );
    }

    return parsed.data;
  }
}
