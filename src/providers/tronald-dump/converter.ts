/**
 * Tronald Dump Model Converter
 */

import { TRONALD_DUMP } from '../../config/apis.js';
import type { Paged, QuoteListModel, QuoteModel } from './models.js';
import { TronaldDumpQuote } from './quote.js';
import type { QuoteSearch } from './search.js';

function parseDate(text: string | null | undefined): Date | null {
  if (!text) return null;
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

export class TronaldDumpModelConverter {
  /**
   * Source is the first embedded source URL, falling back to the quote's own link
   */
  convertQuoteModel(model: QuoteModel): TronaldDumpQuote {
    const source = model._embedded.source[0]?.url ?? model._links?.self.href ?? '';

    return new TronaldDumpQuote({
      id: model.quote_id,
      value: model.value,
      source,
      date: parseDate(model.appeared_at),
      createdAt: parseDate(model.created_at),
      updatedAt: parseDate(model.updated_at),
      tags: model.tags,
    });
  }

  enumerateQuotes(list: QuoteListModel): TronaldDumpQuote[] {
    return list.quotes.map((model) => this.convertQuoteModel(model));
  }

  countPages(result: Paged): number {
    return Math.ceil(result.total / TRONALD_DUMP.maxItemsPerPage);
  }

  /**
   * query, tag and page; page only when past the first
   */
  getSearchQuery(search: QuoteSearch): string {
    const params = new URLSearchParams();
    if (search.query !== undefined) {
      params.set('query', search.query);
    }
    if (search.tag !== undefined) {
      params.set('tag', search.tag);
    }
    if (search.page > 0) {
      params.set('page', String(search.page));
    }
    return params.toString();
  }
}
