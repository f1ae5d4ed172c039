/**
 * Quotable Model Converter
 *
 * Maps response models onto QuotableQuote and renders every search input
 * as the query string the API expects.
 */

import { QUOTABLE } from '../../config/apis.js';
import type { QuoteModel } from './models.js';
import { QuotableQuote } from './quote.js';
import {
  defaultSortOrder,
  type AuthorNameSearch,
  type AuthorSearch,
  type QuoteContentSearch,
  type QuoteListSearch,
  type QuoteSearch,
  type QuoteSortBy,
  type SortBy,
  type SortOrder,
  type TagSearch,
} from './search.js';

/** Joins alternatives in a single query parameter */
const OR = '|';

function parseDate(text: string): Date | null {
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

function setSort(params: URLSearchParams, sortBy: QuoteSortBy | SortBy | undefined, order: SortOrder | undefined): void {
  if (sortBy === undefined) {
    if (order !== undefined) params.set('order', order);
    return;
  }
  params.set('sortBy', sortBy);
  params.set('order', order ?? defaultSortOrder(sortBy));
}

function setPaging(params: URLSearchParams, search: { page: number; limit: number }): void {
  params.set('limit', String(search.limit));
  params.set('page', String(search.page));
}

export class QuotableModelConverter {
  convertQuoteModel(model: QuoteModel): QuotableQuote {
    return new QuotableQuote({
      id: model._id,
      value: model.content,
      author: model.author,
      authorSlug: model.authorSlug,
      length: model.length,
      source: `${QUOTABLE.apiPage}quotes/${model._id}`,
      date: parseDate(model.dateAdded),
      dateModified: parseDate(model.dateModified),
      tags: model.tags,
    });
  }

  /**
   * minLength, maxLength, tags, author; minLength only when above zero
   */
  getQuoteSearchQuery(search: QuoteSearch): string {
    return this.quoteFilterParams(search).toString();
  }

  getQuoteListQuery(search: QuoteListSearch): string {
    const params = this.quoteFilterParams(search);
    setSort(params, search.sortBy, search.order);
    setPaging(params, search);
    return params.toString();
  }

  getAuthorSearchQuery(search: AuthorSearch): string {
    const params = new URLSearchParams();
    if (search.slugs.length > 0) {
      params.set('slug', search.slugs.join(OR));
    }
    setSort(params, search.sortBy, search.order);
    setPaging(params, search);
    return params.toString();
  }

  getTagSearchQuery(search: TagSearch): string {
    const params = new URLSearchParams();
    setSort(params, search.sortBy, search.order);
    return params.toString();
  }

  getQuoteContentQuery(search: QuoteContentSearch): string {
    const params = new URLSearchParams({
      query: search.query,
      fields: search.fields.join(','),
      fuzzyMaxEdits: String(search.fuzzyMaxEdits),
      fuzzyMaxExpansions: String(search.fuzzyMaxExpansions),
    });
    setPaging(params, search);
    return params.toString();
  }

  getAuthorNameQuery(search: AuthorNameSearch): string {
    const params = new URLSearchParams({
      query: search.query,
      autocomplete: String(search.autocomplete),
      matchThreshold: String(search.matchThreshold),
    });
    setPaging(params, search);
    return params.toString();
  }

  private quoteFilterParams(search: QuoteSearch): URLSearchParams {
    const params = new URLSearchParams();
    if (search.minLength > 0) {
      params.set('minLength', String(search.minLength));
    }
    if (search.maxLength !== undefined) {
      params.set('maxLength', String(search.maxLength));
    }
    if (search.tags !== undefined) {
      params.set('tags', search.tags.toString());
    }
    if (search.authors.length > 0) {
      params.set('author', search.authors.join(OR));
    }
    return params;
  }
}
