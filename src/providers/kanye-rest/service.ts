/**
 * kanye.rest Service
 *
 * Two resources: the random-quote endpoint at the API root and a static
 * JSON database holding every quote.
 *
 * @see https://kanye.rest
 */

import { KANYE_REST } from '../../config/apis.js';
import { isNonBlank } from '../../errors.js';
import { uniqueById } from '../../generators/downloader.js';
import type { ResourceResolver } from '../../resolvers/types.js';
import { resolverFor } from '../resolver.js';
import type { ProviderOptions } from '../types.js';
import { KanyeRestDatabaseSchema, KanyeRestResponseSchema } from './models.js';
import { KanyeRestQuote } from './quote.js';

export class KanyeRestService {
  readonly resolver: ResourceResolver;

  constructor(options: ProviderOptions = {}) {
    this.resolver = resolverFor(KANYE_REST.apiPage, KANYE_REST.apiName, options);
  }

  async getRandomQuote(): Promise<KanyeRestQuote> {
    const response = await this.resolver.resolve(KANYE_REST.apiPage, KanyeRestResponseSchema);
    return new KanyeRestQuote(response.quote);
  }

  /**
   * Every quote in the database, once each
   */
  async getAllQuotes(): Promise<KanyeRestQuote[]> {
    const texts = await this.resolver.resolve(KANYE_REST.database, KanyeRestDatabaseSchema);
    return uniqueById(texts.filter(isNonBlank).map((text) => new KanyeRestQuote(text)));
  }
}
