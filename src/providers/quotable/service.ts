/**
 * Quotable Service
 *
 * Every endpoint of the Quotable API. Returns the raw response models;
 * QuotableModelConverter turns quotes into QuotableQuote.
 *
 * @see https://github.com/lukePeavey/quotable/blob/master/README.md
 */

import { QUOTABLE } from '../../config/apis.js';
import { isNonBlank, notFound, nullOrEmpty } from '../../errors.js';
import { applyQuery, type ResourceResolver } from '../../resolvers/types.js';
import { parseArgument } from '../../utils/validate.js';
import { resolverFor } from '../resolver.js';
import type { ProviderOptions } from '../types.js';
import { QuotableModelConverter } from './converter.js';
import {
  AuthorModelSchema,
  AuthorSearchResultSchema,
  QuoteModelSchema,
  QuoteSearchResultSchema,
  TagListSchema,
  type AuthorModel,
  type AuthorSearchResult,
  type QuoteModel,
  type QuoteSearchResult,
  type TagModel,
} from './models.js';
import {
  AuthorNameSearchSchema,
  AuthorSearchSchema,
  QuoteContentSearchSchema,
  QuoteListSearchSchema,
  QuoteSearchSchema,
  TagSearchSchema,
  type AuthorNameSearchInput,
  type AuthorSearchInput,
  type QuoteContentSearchInput,
  type QuoteListSearchInput,
  type QuoteSearchInput,
  type TagSearchInput,
} from './search.js';

export class QuotableService {
  readonly resolver: ResourceResolver;
  readonly converter: QuotableModelConverter;

  constructor(options: ProviderOptions = {}, converter = new QuotableModelConverter()) {
    this.resolver = resolverFor(QUOTABLE.apiPage, QUOTABLE.apiName, options);
    this.converter = converter;
  }

  // ==========================================================================
  // Quotes
  // ==========================================================================

  async getQuote(id: string): Promise<QuoteModel> {
    if (!isNonBlank(id)) {
      throw nullOrEmpty('id');
    }

    const model = await this.resolver.tryResolve(`quotes/${encodeURIComponent(id)}`, QuoteModelSchema);
    if (model === null) {
      throw notFound(`Quote with id '${id}' does not exist`, { id });
    }
    return model;
  }

  /**
   * A random quote, optionally restricted by length, tags and authors
   * @throws QuoteError NOT_FOUND when nothing matches the search
   */
  async getRandomQuote(search: QuoteSearchInput = {}): Promise<QuoteModel> {
    const parsed = parseArgument(QuoteSearchSchema, search, 'search');
    const path = applyQuery('random', this.converter.getQuoteSearchQuery(parsed));

    const model = await this.resolver.tryResolve(path, QuoteModelSchema);
    if (model === null) {
      throw notFound('Could not find any matching quote', { path });
    }
    return model;
  }

  /**
   * One page of quotes
   */
  getQuotes(search: QuoteListSearchInput = {}): Promise<QuoteSearchResult> {
    const parsed = parseArgument(QuoteListSearchSchema, search, 'search');
    return this.resolver.resolve(applyQuery('quotes', this.converter.getQuoteListQuery(parsed)), QuoteSearchResultSchema);
  }

  searchQuotes(search: QuoteContentSearchInput): Promise<QuoteSearchResult> {
    const parsed = parseArgument(QuoteContentSearchSchema, search, 'search');
    return this.resolver.resolve(
      applyQuery('search/quotes', this.converter.getQuoteContentQuery(parsed)),
      QuoteSearchResultSchema,
    );
  }

  // ==========================================================================
  // Authors
  // ==========================================================================

  async getAuthor(slug: string): Promise<AuthorModel> {
    if (!isNonBlank(slug)) {
      throw nullOrEmpty('slug');
    }

    const model = await this.resolver.tryResolve(`authors/slug/${encodeURIComponent(slug)}`, AuthorModelSchema);
    if (model === null) {
      throw notFound(`Author with slug '${slug}' does not exist`, { slug });
    }
    return model;
  }

  getAuthors(search: AuthorSearchInput = {}): Promise<AuthorSearchResult> {
    const parsed = parseArgument(AuthorSearchSchema, search, 'search');
    return this.resolver.resolve(
      applyQuery('authors', this.converter.getAuthorSearchQuery(parsed)),
      AuthorSearchResultSchema,
    );
  }

  searchAuthors(search: AuthorNameSearchInput): Promise<AuthorSearchResult> {
    const parsed = parseArgument(AuthorNameSearchSchema, search, 'search');
    return this.resolver.resolve(
      applyQuery('search/authors', this.converter.getAuthorNameQuery(parsed)),
      AuthorSearchResultSchema,
    );
  }

  // ==========================================================================
  // Tags
  // ==========================================================================

  getTags(search: TagSearchInput = {}): Promise<TagModel[]> {
    const parsed = parseArgument(TagSearchSchema, search, 'search');
    return this.resolver.resolve(applyQuery('tags', this.converter.getTagSearchQuery(parsed)), TagListSchema);
  }
}
