/**
 * Cached Quote Generator
 *
 * Combines a provider's download strategy with a blockable cache. Every
 * download is cached (unless the cache is blocked), and `which` decides per
 * call whether to read the cache, hit the API, or let a Possibility choose.
 *
 * Usage:
 *   const generator = new CachedQuoteGenerator({
 *     apiName: 'quotable',
 *     source: QUOTABLE.apiPage,
 *     downloader: new QuotableDownloader(service),
 *   });
 *   const quote = await generator.getRandomQuote();
 */

import { BlockableQuoteCache } from '../cache/blockable-cache.js';
import { QuoteCache } from '../cache/quote-cache.js';
import type { IQuoteCache, TagFilter } from '../cache/types.js';
import type { IQuote } from '../core/quote.js';
import { Possibility, mathRandom, type RandomNumberGenerator } from '../core/random.js';
import { isNonBlank, nullArgument, nullOrEmpty } from '../errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { QuoteDownloader, QuoteGenerator, QuoteInclude } from './types.js';

export interface CachedQuoteGeneratorOptions<T extends IQuote> {
  apiName: string;
  source: string;
  downloader: QuoteDownloader<T>;
  /** Wrapped in a BlockableQuoteCache unless it already is one */
  cache?: IQuoteCache<T>;
  possibility?: Possibility;
  random?: RandomNumberGenerator;
}

function requireTag(tag: string): void {
  if (!isNonBlank(tag)) {
    throw nullOrEmpty('tag');
  }
}

export class CachedQuoteGenerator<T extends IQuote> implements QuoteGenerator<T> {
  readonly apiName: string;
  readonly source: string;
  readonly cache: BlockableQuoteCache<T>;
  readonly possibility: Possibility;
  readonly downloader: QuoteDownloader<T>;

  private readonly log: ReturnType<typeof createChildLogger>;

  constructor(options: CachedQuoteGeneratorOptions<T>) {
    if (!isNonBlank(options.apiName)) throw nullOrEmpty('apiName');
    if (!isNonBlank(options.source)) throw nullOrEmpty('source');
    if (!options.downloader) throw nullArgument('downloader');

    const random = options.random ?? mathRandom;

    this.apiName = options.apiName;
    this.source = options.source;
    this.downloader = options.downloader;
    this.possibility = options.possibility ?? new Possibility(random);
    this.cache = CachedQuoteGenerator.toBlockable(options.cache ?? new QuoteCache<T>({ random }));
    this.log = createChildLogger({ provider: options.apiName });
  }

  private static toBlockable<Q extends IQuote>(cache: IQuoteCache<Q>): BlockableQuoteCache<Q> {
    return cache instanceof BlockableQuoteCache ? cache : new BlockableQuoteCache(cache);
  }

  // ==========================================================================
  // Random quotes
  // ==========================================================================

  async getRandomQuote(which: QuoteInclude = 'all'): Promise<T> {
    if (which === 'cached' || (which === 'all' && !this.shouldDownload())) {
      this.log.debug({ which }, 'Serving random quote from cache');
      return this.cache.getRandomQuote();
    }

    this.log.debug({ which }, 'Downloading random quote');
    const quote = await this.downloader.randomQuote();
    this.store(quote);
    return quote;
  }

  async getRandomQuoteWithTag(tag: string, which: QuoteInclude = 'all'): Promise<T | null> {
    requireTag(tag);

    if (which === 'cached') {
      return this.cache.tryGetRandomQuote(tag) ?? null;
    }

    if (which === 'all' && !this.shouldDownload()) {
      const cached = this.cache.tryGetRandomQuote(tag);
      if (cached) {
        this.log.debug({ tag }, 'Serving tagged quote from cache');
        return cached;
      }
    }

    this.log.debug({ tag, which }, 'Downloading tagged quote');
    const quote = await this.downloader.randomQuoteWithTag(tag);
    if (quote) this.store(quote);
    return quote;
  }

  async getRandomQuoteWithTags(tags: TagFilter, which: QuoteInclude = 'all'): Promise<T | null> {
    if (which === 'cached') {
      return this.fromCache(tags);
    }

    if (which === 'all' && !this.shouldDownload()) {
      const cached = this.fromCache(tags);
      if (cached) {
        this.log.debug({ tags: tags?.join(',') }, 'Serving tagged quote from cache');
        return cached;
      }
    }

    this.log.debug({ tags: tags?.join(','), which }, 'Downloading tagged quote');
    const quote = await this.downloader.randomQuoteWithTags(tags);
    if (quote) this.store(quote);
    return quote;
  }

  // ==========================================================================
  // Enumeration
  // ==========================================================================

  async getAllQuotes(which: QuoteInclude = 'all'): Promise<T[]> {
    switch (which) {
      case 'cached':
        return this.cache.getCached();
      case 'download':
        return this.downloader.allQuotes();
      case 'all':
        return [...this.cache.getCached(), ...(await this.downloader.allQuotes())];
    }
  }

  async getAllQuotesWithTag(tag: string, which: QuoteInclude = 'all'): Promise<T[]> {
    requireTag(tag);

    switch (which) {
      case 'cached':
        return this.cache.getCached(tag);
      case 'download':
        return this.downloader.allQuotesWithTag(tag);
      case 'all':
        return [...this.cache.getCached(tag), ...(await this.downloader.allQuotesWithTag(tag))];
    }
  }

  async getAllQuotesWithTags(tags: TagFilter, which: QuoteInclude = 'all'): Promise<T[]> {
    switch (which) {
      case 'cached':
        return this.cache.getCached(tags);
      case 'download':
        return this.downloader.allQuotesWithTags(tags);
      case 'all':
        return [...this.cache.getCached(tags), ...(await this.downloader.allQuotesWithTags(tags))];
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private shouldDownload(): boolean {
    return this.cache.isEmpty || this.possibility.determine();
  }

  /** First tag, in order, that has a cached quote */
  private fromCache(tags: TagFilter): T | null {
    for (const tag of tags ?? []) {
      if (!isNonBlank(tag)) continue;
      const quote = this.cache.tryGetRandomQuote(tag);
      if (quote) return quote;
    }
    return null;
  }

  private store(quote: T): void {
    if (!this.cache.isBlocked) {
      this.cache.cacheQuote(quote);
    }
  }
}
