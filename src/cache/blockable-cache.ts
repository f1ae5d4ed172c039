/**
 * Blockable Quote Cache
 *
 * Wraps an existing cache and gates every mutation behind a block flag.
 * Reads always go straight to the wrapped cache.
 *
 * Blocking with `preserveState` (the default) clears the wrapped cache; the
 * caller repopulates it after `unblock()`.
 */

import type { IdLike } from '../core/id.js';
import type { IQuote } from '../core/quote.js';
import { invalidOperation } from '../errors.js';
import { QuoteCache } from './quote-cache.js';
import type { BlockableCacheOptions, IQuoteCache, TagFilter } from './types.js';

const BLOCKED_MESSAGE = 'Blocked cache cannot be modified';

export class BlockableQuoteCache<T extends IQuote> implements IQuoteCache<T> {
  readonly cache: IQuoteCache<T>;
  throwIfBlocked: boolean;

  private blocked = false;
  private _preserveState: boolean;

  constructor(cache: IQuoteCache<T> = new QuoteCache<T>(), options: BlockableCacheOptions = {}) {
    this.cache = cache;
    this._preserveState = options.preserveState ?? true;
    this.throwIfBlocked = options.throwIfBlocked ?? false;
  }

  get isBlocked(): boolean {
    return this.blocked;
  }

  get preserveState(): boolean {
    return this._preserveState;
  }

  set preserveState(value: boolean) {
    const wasPreserving = this._preserveState;
    this._preserveState = value;
    if (wasPreserving && !value && this.blocked) {
      this.forceClear();
    }
  }

  block(): void {
    this.blocked = true;
    if (this._preserveState) {
      this.forceClear();
    }
  }

  unblock(): void {
    this.blocked = false;
  }

  /**
   * Clear the wrapped cache whether or not it is blocked
   */
  forceClear(): void {
    this.cache.clear();
  }

  /**
   * True when a mutation may proceed; throws instead of returning false when configured to
   */
  private allowMutation(): boolean {
    if (!this.blocked) return true;
    if (this.throwIfBlocked) {
      throw invalidOperation(BLOCKED_MESSAGE, 'Call unblock() before modifying the cache');
    }
    return false;
  }

  // ==========================================================================
  // Gated mutations
  // ==========================================================================

  cacheQuote(quote: T, replace = false): boolean {
    return this.allowMutation() ? this.cache.cacheQuote(quote, replace) : false;
  }

  cacheQuotes(quotes: Iterable<T | null | undefined>, replace = false): number {
    return this.allowMutation() ? this.cache.cacheQuotes(quotes, replace) : 0;
  }

  removeQuote(idOrQuote: IdLike | T): boolean {
    return this.allowMutation() ? this.cache.removeQuote(idOrQuote) : false;
  }

  takeQuote(id: IdLike): T | undefined {
    return this.allowMutation() ? this.cache.takeQuote(id) : undefined;
  }

  removeQuotes(tag: string): boolean {
    return this.allowMutation() ? this.cache.removeQuotes(tag) : false;
  }

  takeQuotes(tag: string): T[] | undefined {
    return this.allowMutation() ? this.cache.takeQuotes(tag) : undefined;
  }

  clear(): void {
    if (this.allowMutation()) {
      this.cache.clear();
    }
  }

  getRandomQuote(remove = false): T {
    const allowRemoval = remove && this.allowMutation();
    return this.cache.getRandomQuote(allowRemoval);
  }

  tryGetRandomQuote(tag: string, remove = false): T | undefined {
    const allowRemoval = remove && this.allowMutation();
    return this.cache.tryGetRandomQuote(tag, allowRemoval);
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  getCached(): T[];
  getCached(tag: string): T[];
  getCached(tags: TagFilter): T[];
  getCached(filter?: string | TagFilter): T[] {
    if (filter === undefined) return this.cache.getCached();
    if (typeof filter === 'string') return this.cache.getCached(filter);
    return this.cache.getCached(filter);
  }

  isCached(idOrQuote: IdLike | T): boolean {
    return this.cache.isCached(idOrQuote);
  }

  getQuote(id: IdLike): T {
    return this.cache.getQuote(id);
  }

  tryGetQuote(id: IdLike): T | undefined {
    return this.cache.tryGetQuote(id);
  }

  get count(): number {
    return this.cache.count;
  }

  get isEmpty(): boolean {
    return this.cache.isEmpty;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.cache[Symbol.iterator]();
  }
}
