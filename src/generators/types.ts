/**
 * Generator Types
 */

import type { TagFilter } from '../cache/types.js';
import type { IQuote } from '../core/quote.js';

/**
 * Where a generator may take quotes from
 *
 * - all: cached quotes or fresh downloads, chosen per call
 * - cached: only what is already in the cache
 * - download: always ask the upstream API
 */
export type QuoteInclude = 'all' | 'cached' | 'download';

/**
 * Provider-specific download strategy composed into CachedQuoteGenerator
 */
export interface QuoteDownloader<T extends IQuote> {
  randomQuote(): Promise<T>;
  /** null when the API has nothing for this tag or does not support tags */
  randomQuoteWithTag(tag: string): Promise<T | null>;
  randomQuoteWithTags(tags: TagFilter): Promise<T | null>;
  allQuotes(): Promise<T[]>;
  allQuotesWithTag(tag: string): Promise<T[]>;
  allQuotesWithTags(tags: TagFilter): Promise<T[]>;
}

export interface QuoteGenerator<T extends IQuote = IQuote> {
  /** Registry key, e.g. "quotable" */
  readonly apiName: string;
  /** Base address of the upstream API */
  readonly source: string;

  getRandomQuote(which?: QuoteInclude): Promise<T>;
  getRandomQuoteWithTag(tag: string, which?: QuoteInclude): Promise<T | null>;
  getRandomQuoteWithTags(tags: TagFilter, which?: QuoteInclude): Promise<T | null>;

  getAllQuotes(which?: QuoteInclude): Promise<T[]>;
  getAllQuotesWithTag(tag: string, which?: QuoteInclude): Promise<T[]>;
  getAllQuotesWithTags(tags: TagFilter, which?: QuoteInclude): Promise<T[]>;
}

/**
 * A quote together with the API it came from
 */
export interface SourcedQuote {
  apiName: string;
  quote: IQuote;
}
