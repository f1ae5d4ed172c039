/**
 * Quotable generator
 *
 * Random quotes come from /random. Enumeration reads the first page of
 * /quotes at the maximum page size, then fetches the remaining pages with
 * at most `concurrency` requests in flight.
 */

import pLimit from 'p-limit';
import type { TagFilter } from '../../cache/types.js';
import { QUOTABLE } from '../../config/apis.js';
import { DEFAULT_HTTP_CONFIG } from '../../config/http.js';
import { mathRandom, type RandomNumberGenerator } from '../../core/random.js';
import { QuoteErrorCode, isNonBlank, isQuoteError, nullOrEmpty } from '../../errors.js';
import { CachedQuoteGenerator } from '../../generators/cached-generator.js';
import { nonBlankTags, pickTag, uniqueById } from '../../generators/downloader.js';
import type { QuoteDownloader } from '../../generators/types.js';
import { createChildLogger } from '../../utils/logger.js';
import type { GeneratorOptions } from '../types.js';
import type { QuoteModel } from './models.js';
import type { QuotableQuote } from './quote.js';
import type { QuoteListSearchInput } from './search.js';
import { QuotableService } from './service.js';
import { TagExpression } from './tag-expression.js';

const log = createChildLogger({ provider: QUOTABLE.apiName });

export interface QuotableDownloaderOptions {
  random?: RandomNumberGenerator;
  /** Pages fetched in parallel during enumeration */
  concurrency?: number;
}

export class QuotableDownloader implements QuoteDownloader<QuotableQuote> {
  private readonly random: RandomNumberGenerator;
  private readonly concurrency: number;

  constructor(
    readonly service: QuotableService,
    options: QuotableDownloaderOptions = {},
  ) {
    this.random = options.random ?? mathRandom;
    this.concurrency = options.concurrency ?? DEFAULT_HTTP_CONFIG.concurrency;
  }

  async randomQuote(): Promise<QuotableQuote> {
    return this.convert(await this.service.getRandomQuote());
  }

  async randomQuoteWithTag(tag: string): Promise<QuotableQuote | null> {
    if (!isNonBlank(tag)) {
      throw nullOrEmpty('tag');
    }

    try {
      return this.convert(await this.service.getRandomQuote({ tags: TagExpression.tag(tag) }));
    } catch (error) {
      if (isQuoteError(error, QuoteErrorCode.NOT_FOUND)) {
        log.debug({ tag }, 'No quote with tag');
        return null;
      }
      throw error;
    }
  }

  randomQuoteWithTags(tags: TagFilter): Promise<QuotableQuote | null> {
    const tag = pickTag(tags, this.random);
    if (tag === null) {
      return Promise.resolve(null);
    }
    return this.randomQuoteWithTag(tag);
  }

  allQuotes(): Promise<QuotableQuote[]> {
    return this.allPages({});
  }

  async allQuotesWithTag(tag: string): Promise<QuotableQuote[]> {
    if (!isNonBlank(tag)) {
      throw nullOrEmpty('tag');
    }
    return this.allPages({ tags: TagExpression.tag(tag) });
  }

  /**
   * Union of every tag's quotes, first occurrence of each id kept
   */
  async allQuotesWithTags(tags: TagFilter): Promise<QuotableQuote[]> {
    const quotes: QuotableQuote[] = [];
    for (const tag of nonBlankTags(tags)) {
      quotes.push(...(await this.allQuotesWithTag(tag)));
    }
    return uniqueById(quotes);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async allPages(search: QuoteListSearchInput): Promise<QuotableQuote[]> {
    const limit = QUOTABLE.resultsPerPageMax;
    const first = await this.service.getQuotes({ ...search, page: 1, limit });

    const remaining: number[] = [];
    for (let page = 2; page <= first.totalPages; page++) {
      remaining.push(page);
    }

    const queue = pLimit(this.concurrency);
    const rest = await Promise.all(
      remaining.map((page) => queue(() => this.service.getQuotes({ ...search, page, limit }))),
    );

    log.debug({ pages: first.totalPages, totalCount: first.totalCount }, 'Enumerated quotable quotes');

    const models: QuoteModel[] = [first, ...rest].flatMap((result) => result.results);
    return uniqueById(models.map((model) => this.convert(model)));
  }

  private convert(model: QuoteModel): QuotableQuote {
    return this.service.converter.convertQuoteModel(model);
  }
}

export interface QuotableGeneratorOptions extends GeneratorOptions<QuotableQuote> {
  service?: QuotableService;
}

export function createQuotableGenerator(
  options: QuotableGeneratorOptions = {},
): CachedQuoteGenerator<QuotableQuote> {
  const service = options.service ?? new QuotableService(options);

  return new CachedQuoteGenerator<QuotableQuote>({
    apiName: QUOTABLE.apiName,
    source: QUOTABLE.gitHubPage,
    downloader: new QuotableDownloader(service, {
      random: options.random,
      concurrency: options.config?.concurrency,
    }),
    cache: options.cache,
    possibility: options.possibility,
    random: options.random,
  });
}
