/**
 * Tronald Dump Service
 *
 * @see https://docs.tronalddump.io/
 */

import { TRONALD_DUMP } from '../../config/apis.js';
import { invalidOperation, isNonBlank, notFound, nullOrEmpty } from '../../errors.js';
import { applyQuery, type ResourceResolver, type Schema } from '../../resolvers/types.js';
import { parseArgument } from '../../utils/validate.js';
import { isStreamResolver, resolverFor } from '../resolver.js';
import type { ProviderOptions } from '../types.js';
import { TronaldDumpModelConverter } from './converter.js';
import {
  AuthorModelSchema,
  QuoteModelSchema,
  QuoteSearchResultSchema,
  QuoteSourceModelSchema,
  TagModelSchema,
  TagSearchResultSchema,
  type AuthorModel,
  type QuoteModel,
  type QuoteSearchResult,
  type QuoteSourceModel,
  type TagModel,
  type TagSearchResult,
} from './models.js';
import { QuoteSearchSchema, type QuoteSearchInput } from './search.js';

export class TronaldDumpService {
  readonly resolver: ResourceResolver;
  readonly converter: TronaldDumpModelConverter;

  constructor(options: ProviderOptions = {}, converter = new TronaldDumpModelConverter()) {
    this.resolver = resolverFor(TRONALD_DUMP.apiPage, TRONALD_DUMP.apiName, options);
    this.converter = converter;
  }

  getRandomQuote(): Promise<QuoteModel> {
    return this.resolver.resolve('random/quote', QuoteModelSchema);
  }

  getQuote(id: string): Promise<QuoteModel> {
    return this.findById('quote', id, QuoteModelSchema, `Quote with id '${id}' does not exist`);
  }

  getAuthor(id: string): Promise<AuthorModel> {
    return this.findById('author', id, AuthorModelSchema, `Quote author with id '${id}' does not exist`);
  }

  getSource(id: string): Promise<QuoteSourceModel> {
    return this.findById('quote-source', id, QuoteSourceModelSchema, `Quote source with id '${id}' does not exist`);
  }

  getTag(tag: string): Promise<TagModel> {
    return this.findById('tag', tag, TagModelSchema, `Unknown tag: '${tag}'`);
  }

  getAvailableTags(): Promise<TagSearchResult> {
    return this.resolver.resolve('tag', TagSearchResultSchema);
  }

  searchQuotes(search: QuoteSearchInput): Promise<QuoteSearchResult> {
    const parsed = parseArgument(QuoteSearchSchema, search, 'search');
    return this.resolver.resolve(
      applyQuery('search/quote', this.converter.getSearchQuery(parsed)),
      QuoteSearchResultSchema,
    );
  }

  /**
   * Raw bytes of a random meme image
   * @throws QuoteError INVALID_OPERATION when the resolver cannot read binary resources
   */
  async getRandomMeme(): Promise<Uint8Array> {
    if (!isStreamResolver(this.resolver)) {
      throw invalidOperation(
        'The configured resolver cannot fetch binary resources',
        'Use an HttpResolver or another StreamResolver',
      );
    }
    return this.resolver.resolveBytes('random/meme');
  }

  private async findById<T>(resource: string, id: string, schema: Schema<T>, missing: string): Promise<T> {
    if (!isNonBlank(id)) {
      throw nullOrEmpty('id');
    }

    const model = await this.resolver.tryResolve(`${resource}/${encodeURIComponent(id)}`, schema);
    if (model === null) {
      throw notFound(missing, { [resource]: id });
    }
    return model;
  }
}
