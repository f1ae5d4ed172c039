/**
 * Quote Cache Module
 *
 * In-memory store of quotes keyed by id, with a tag index kept in step.
 *
 * Every method runs to completion synchronously, so the store and the index
 * are never observed out of sync and a random pick always sees the count it
 * selects from.
 *
 * Usage:
 *   const cache = new QuoteCache<Quote>();
 *   cache.cacheQuote(quote);
 *   const wisdom = cache.tryGetRandomQuote('wisdom');
 */

import { Id, idKey, type IdLike } from '../core/id.js';
import { structuralComparer, type EqualityComparer, type IQuote } from '../core/quote.js';
import { mathRandom, type RandomNumberGenerator } from '../core/random.js';
import { invalidOperation, isNonBlank, notFound, nullArgument, nullOrEmpty } from '../errors.js';
import { TagIndex } from './tag-index.js';
import type { IQuoteCache, QuoteCacheOptions, TagFilter } from './types.js';

function isIdLike(value: unknown): value is IdLike {
  return typeof value === 'string' || typeof value === 'number' || value instanceof Id;
}

function requireTag(tag: string): void {
  if (!isNonBlank(tag)) {
    throw nullOrEmpty('tag');
  }
}

export class QuoteCache<T extends IQuote> implements IQuoteCache<T> {
  private store = new Map<string, T>();
  private tags = new TagIndex();
  private readonly comparer: EqualityComparer<T>;
  private readonly random: RandomNumberGenerator;

  constructor(options: QuoteCacheOptions<T> = {}) {
    this.comparer = options.comparer ?? structuralComparer;
    this.random = options.random ?? mathRandom;
  }

  // ==========================================================================
  // Insertion
  // ==========================================================================

  cacheQuote(quote: T, replace = false): boolean {
    if (quote === null || quote === undefined) {
      throw nullArgument('quote');
    }

    const key = quote.id.value;
    const existing = this.store.get(key);

    if (existing) {
      if (!replace) return false;
      this.tags.remove(key, existing.tags);
    }

    this.store.set(key, quote);
    this.tags.add(key, quote.tags);
    return true;
  }

  cacheQuotes(quotes: Iterable<T | null | undefined>, replace = false): number {
    if (quotes === null || quotes === undefined) {
      throw nullArgument('quotes');
    }

    let applied = 0;
    for (const quote of quotes) {
      if (quote && this.cacheQuote(quote, replace)) {
        applied++;
      }
    }
    return applied;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  getCached(): T[];
  getCached(tag: string): T[];
  getCached(tags: TagFilter): T[];
  getCached(filter?: string | TagFilter): T[] {
    if (filter === undefined) {
      return [...this.store.values()];
    }

    if (typeof filter === 'string') {
      requireTag(filter);
      return this.resolve(this.tags.lookup(filter));
    }

    return this.resolve(this.tags.lookupAny(filter));
  }

  isCached(idOrQuote: IdLike | T): boolean {
    if (idOrQuote === null || idOrQuote === undefined) {
      throw nullArgument('id');
    }

    if (isIdLike(idOrQuote)) {
      return this.store.has(idKey(idOrQuote));
    }

    const stored = this.store.get(idOrQuote.id.value);
    return (
      stored !== undefined &&
      this.comparer.hash(stored) === this.comparer.hash(idOrQuote) &&
      this.comparer.equals(stored, idOrQuote)
    );
  }

  getQuote(id: IdLike): T {
    const key = idKey(id);

    if (this.store.size === 0) {
      throw invalidOperation('Cache is empty', 'Cache quotes before looking them up by id');
    }

    const quote = this.store.get(key);
    if (!quote) {
      throw notFound(`No cached quote with id ${key}`, { id: key });
    }
    return quote;
  }

  tryGetQuote(id: IdLike): T | undefined {
    return this.store.get(idKey(id));
  }

  getRandomQuote(remove = false): T {
    if (this.store.size === 0) {
      throw invalidOperation('Cache is empty', 'Cache quotes before requesting a random one');
    }

    const quote = this.pick([...this.store.values()]);
    if (remove) {
      this.delete(quote.id.value);
    }
    return quote;
  }

  tryGetRandomQuote(tag: string, remove = false): T | undefined {
    requireTag(tag);

    const candidates = this.resolve(this.tags.lookup(tag));
    if (candidates.length === 0) return undefined;

    const quote = this.pick(candidates);
    if (remove) {
      this.delete(quote.id.value);
    }
    return quote;
  }

  // ==========================================================================
  // Removal
  // ==========================================================================

  removeQuote(idOrQuote: IdLike | T): boolean {
    if (idOrQuote === null || idOrQuote === undefined) {
      throw nullArgument('id');
    }

    if (isIdLike(idOrQuote)) {
      return this.delete(idKey(idOrQuote)) !== undefined;
    }

    if (!this.isCached(idOrQuote)) return false;
    return this.delete(idOrQuote.id.value) !== undefined;
  }

  takeQuote(id: IdLike): T | undefined {
    return this.delete(idKey(id));
  }

  removeQuotes(tag: string): boolean {
    return this.takeQuotes(tag) !== undefined;
  }

  takeQuotes(tag: string): T[] | undefined {
    requireTag(tag);

    if (this.store.size === 0 || !this.tags.has(tag)) {
      return undefined;
    }

    // copy first: deleting shrinks the bucket being walked
    const ids = [...this.tags.lookup(tag)];
    const removed: T[] = [];
    for (const id of ids) {
      const quote = this.delete(id);
      if (quote) removed.push(quote);
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
    this.tags.clear();
  }

  get count(): number {
    return this.store.size;
  }

  get isEmpty(): boolean {
    return this.store.size === 0;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.getCached()[Symbol.iterator]();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private resolve(ids: Iterable<string>): T[] {
    const quotes: T[] = [];
    for (const id of ids) {
      const quote = this.store.get(id);
      if (quote) quotes.push(quote);
    }
    return quotes;
  }

  private pick(candidates: T[]): T {
    const index = this.random.nextInt(0, candidates.length);
    const quote = candidates[index];
    if (quote === undefined) {
      throw invalidOperation(`Random index ${index} is outside [0, ${candidates.length})`);
    }
    return quote;
  }

  private delete(key: string): T | undefined {
    const quote = this.store.get(key);
    if (!quote) return undefined;

    this.store.delete(key);
    this.tags.remove(key, quote.tags);
    return quote;
  }
}
