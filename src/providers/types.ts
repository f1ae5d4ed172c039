/**
 * Provider Types
 *
 * Options shared by every built-in provider's generator factory.
 */

import type { IQuoteCache } from '../cache/types.js';
import type { HttpConfig } from '../config/http.js';
import type { IQuote } from '../core/quote.js';
import type { Possibility, RandomNumberGenerator } from '../core/random.js';
import type { FetchFn } from '../resolvers/http-resolver.js';
import type { ResourceResolver } from '../resolvers/types.js';

export interface ProviderOptions {
  /** Replaces the default HttpResolver entirely */
  resolver?: ResourceResolver;
  /** Used by the default HttpResolver */
  fetchFn?: FetchFn;
  config?: HttpConfig;
  random?: RandomNumberGenerator;
}

export interface GeneratorOptions<T extends IQuote> extends ProviderOptions {
  cache?: IQuoteCache<T>;
  possibility?: Possibility;
}
