/**
 * Cache Types
 *
 * The capability set shared by QuoteCache and BlockableQuoteCache. Generators
 * depend on this interface, never on a concrete cache.
 */

import type { IdLike } from '../core/id.js';
import type { EqualityComparer, IQuote } from '../core/quote.js';
import type { RandomNumberGenerator } from '../core/random.js';

export type TagFilter = readonly (string | null | undefined)[] | null;

export interface IQuoteCache<T extends IQuote> extends Iterable<T> {
  /**
   * Insert a quote; an existing id is only overwritten when `replace` is set
   * @returns true when the cache changed
   */
  cacheQuote(quote: T, replace?: boolean): boolean;

  /**
   * Insert many quotes, skipping null entries and ids already present
   * @returns how many quotes were applied
   */
  cacheQuotes(quotes: Iterable<T | null | undefined>, replace?: boolean): number;

  getCached(): T[];
  getCached(tag: string): T[];
  getCached(tags: TagFilter): T[];

  isCached(idOrQuote: IdLike | T): boolean;

  getQuote(id: IdLike): T;
  tryGetQuote(id: IdLike): T | undefined;

  getRandomQuote(remove?: boolean): T;
  tryGetRandomQuote(tag: string, remove?: boolean): T | undefined;

  removeQuote(idOrQuote: IdLike | T): boolean;
  takeQuote(id: IdLike): T | undefined;

  removeQuotes(tag: string): boolean;
  takeQuotes(tag: string): T[] | undefined;

  clear(): void;

  readonly count: number;
  readonly isEmpty: boolean;
}

export interface QuoteCacheOptions<T extends IQuote> {
  /** Value equality for `isCached(quote)` and `removeQuote(quote)` */
  comparer?: EqualityComparer<T>;
  random?: RandomNumberGenerator;
}

export interface BlockableCacheOptions {
  /** Clear the wrapped cache when blocking (default true) */
  preserveState?: boolean;
  /** Raise INVALID_OPERATION on blocked mutations instead of ignoring them (default false) */
  throwIfBlocked?: boolean;
}
