import { Quote, type QuoteInit } from '../../core/quote.js';

export interface QuotableQuoteInit extends QuoteInit {
  authorSlug: string;
  length: number;
  dateModified?: Date | null;
}

/**
 * A quote from Quotable. `author` is the display name; `authorSlug` is the
 * key the API filters and looks authors up by.
 */
export class QuotableQuote extends Quote {
  readonly authorSlug: string;
  readonly length: number;
  readonly dateModified: Date | null;

  constructor(init: QuotableQuoteInit) {
    super(init);
    this.authorSlug = init.authorSlug;
    this.length = init.length;
    this.dateModified = init.dateModified ? new Date(init.dateModified.getTime()) : null;
    Object.freeze(this);
  }
}
