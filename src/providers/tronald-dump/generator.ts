/**
 * Tronald Dump generator
 *
 * The archive can only be listed through tag search, ten quotes per page.
 * A random tagged quote is a random quote from a random page; enumerating
 * everything is not possible.
 */

import pLimit from 'p-limit';
import type { TagFilter } from '../../cache/types.js';
import { TRONALD_DUMP } from '../../config/apis.js';
import { DEFAULT_HTTP_CONFIG } from '../../config/http.js';
import { mathRandom, type RandomNumberGenerator } from '../../core/random.js';
import { isNonBlank, nullOrEmpty } from '../../errors.js';
import { CachedQuoteGenerator } from '../../generators/cached-generator.js';
import { nonBlankTags, pickTag, uniqueById, unsupportedOperation } from '../../generators/downloader.js';
import type { QuoteDownloader } from '../../generators/types.js';
import { createChildLogger } from '../../utils/logger.js';
import type { GeneratorOptions } from '../types.js';
import type { TronaldDumpQuote } from './quote.js';
import { TronaldDumpService } from './service.js';

const log = createChildLogger({ provider: TRONALD_DUMP.apiName });

export interface TronaldDumpDownloaderOptions {
  random?: RandomNumberGenerator;
  /** Pages fetched in parallel during tag enumeration */
  concurrency?: number;
}

export class TronaldDumpDownloader implements QuoteDownloader<TronaldDumpQuote> {
  private readonly random: RandomNumberGenerator;
  private readonly concurrency: number;

  constructor(
    readonly service: TronaldDumpService,
    options: TronaldDumpDownloaderOptions = {},
  ) {
    this.random = options.random ?? mathRandom;
    this.concurrency = options.concurrency ?? DEFAULT_HTTP_CONFIG.concurrency;
  }

  async randomQuote(): Promise<TronaldDumpQuote> {
    return this.service.converter.convertQuoteModel(await this.service.getRandomQuote());
  }

  async randomQuoteWithTag(tag: string): Promise<TronaldDumpQuote | null> {
    if (!isNonBlank(tag)) {
      throw nullOrEmpty('tag');
    }

    let result = await this.service.searchQuotes({ tag });
    if (result.count === 0) {
      log.debug({ tag }, 'No quote with tag');
      return null;
    }

    const pages = this.service.converter.countPages(result);
    if (pages > 1) {
      const page = this.random.nextInt(0, pages);
      if (page > 0) {
        result = await this.service.searchQuotes({ tag, page });
      }
    }

    const quotes = result._embedded.quotes;
    if (quotes.length === 0) {
      return null;
    }
    return this.service.converter.convertQuoteModel(quotes[this.random.nextInt(0, quotes.length)]);
  }

  randomQuoteWithTags(tags: TagFilter): Promise<TronaldDumpQuote | null> {
    const tag = pickTag(tags, this.random);
    if (tag === null) {
      return Promise.resolve(null);
    }
    return this.randomQuoteWithTag(tag);
  }

  async allQuotes(): Promise<TronaldDumpQuote[]> {
    return unsupportedOperation(TRONALD_DUMP.apiName, 'quote enumeration');
  }

  /**
   * Every page of the tag's search results
   */
  async allQuotesWithTag(tag: string): Promise<TronaldDumpQuote[]> {
    if (!isNonBlank(tag)) {
      throw nullOrEmpty('tag');
    }

    const first = await this.service.searchQuotes({ tag });
    if (first.count === 0) {
      return [];
    }

    const remaining: number[] = [];
    for (let page = 1; page < this.service.converter.countPages(first); page++) {
      remaining.push(page);
    }

    const queue = pLimit(this.concurrency);
    const rest = await Promise.all(remaining.map((page) => queue(() => this.service.searchQuotes({ tag, page }))));

    const quotes = [first, ...rest].flatMap((result) => this.service.converter.enumerateQuotes(result._embedded));
    return uniqueById(quotes);
  }

  async allQuotesWithTags(tags: TagFilter): Promise<TronaldDumpQuote[]> {
    const quotes: TronaldDumpQuote[] = [];
    for (const tag of nonBlankTags(tags)) {
      quotes.push(...(await this.allQuotesWithTag(tag)));
    }
    return uniqueById(quotes);
  }
}

export interface TronaldDumpGeneratorOptions extends GeneratorOptions<TronaldDumpQuote> {
  service?: TronaldDumpService;
}

export function createTronaldDumpGenerator(
  options: TronaldDumpGeneratorOptions = {},
): CachedQuoteGenerator<TronaldDumpQuote> {
  const service = options.service ?? new TronaldDumpService(options);

  return new CachedQuoteGenerator<TronaldDumpQuote>({
    apiName: TRONALD_DUMP.apiName,
    source: TRONALD_DUMP.apiPage,
    downloader: new TronaldDumpDownloader(service, {
      random: options.random,
      concurrency: options.config?.concurrency,
    }),
    cache: options.cache,
    possibility: options.possibility,
    random: options.random,
  });
}
