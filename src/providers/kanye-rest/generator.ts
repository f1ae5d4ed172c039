/**
 * kanye.rest generator
 *
 * kanye.rest has no tags: tagged lookups download nothing and return
 * null or an empty list.
 */

import type { TagFilter } from '../../cache/types.js';
import { KANYE_REST } from '../../config/apis.js';
import { CachedQuoteGenerator } from '../../generators/cached-generator.js';
import type { QuoteDownloader } from '../../generators/types.js';
import { createChildLogger } from '../../utils/logger.js';
import type { GeneratorOptions } from '../types.js';
import type { KanyeRestQuote } from './quote.js';
import { KanyeRestService } from './service.js';

const log = createChildLogger({ provider: KANYE_REST.apiName });

export class KanyeRestDownloader implements QuoteDownloader<KanyeRestQuote> {
  constructor(readonly service: KanyeRestService) {}

  randomQuote(): Promise<KanyeRestQuote> {
    return this.service.getRandomQuote();
  }

  async randomQuoteWithTag(tag: string): Promise<KanyeRestQuote | null> {
    log.debug({ tag }, 'kanye.rest does not support tags');
    return null;
  }

  async randomQuoteWithTags(_tags: TagFilter): Promise<KanyeRestQuote | null> {
    log.debug('kanye.rest does not support tags');
    return null;
  }

  allQuotes(): Promise<KanyeRestQuote[]> {
    return this.service.getAllQuotes();
  }

  async allQuotesWithTag(tag: string): Promise<KanyeRestQuote[]> {
    log.debug({ tag }, 'kanye.rest does not support tags');
    return [];
  }

  async allQuotesWithTags(_tags: TagFilter): Promise<KanyeRestQuote[]> {
    log.debug('kanye.rest does not support tags');
    return [];
  }
}

export interface KanyeRestGeneratorOptions extends GeneratorOptions<KanyeRestQuote> {
  service?: KanyeRestService;
}

export function createKanyeRestGenerator(
  options: KanyeRestGeneratorOptions = {},
): CachedQuoteGenerator<KanyeRestQuote> {
  const service = options.service ?? new KanyeRestService(options);

  return new CachedQuoteGenerator<KanyeRestQuote>({
    apiName: KANYE_REST.apiName,
    source: KANYE_REST.mainPage,
    downloader: new KanyeRestDownloader(service),
    cache: options.cache,
    possibility: options.possibility,
    random: options.random,
  });
}
