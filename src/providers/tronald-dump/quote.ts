import { TRONALD_DUMP } from '../../config/apis.js';
import { Quote, type QuoteInit } from '../../core/quote.js';

export interface TronaldDumpQuoteInit extends Omit<QuoteInit, 'author'> {
  createdAt?: Date | null;
  updatedAt?: Date | null;
}

/**
 * A Tronald Dump quote. `date` is when the quote appeared; `createdAt` and
 * `updatedAt` track the archive entry itself.
 */
export class TronaldDumpQuote extends Quote {
  readonly createdAt: Date | null;
  readonly updatedAt: Date | null;

  constructor(init: TronaldDumpQuoteInit) {
    super({ ...init, author: TRONALD_DUMP.author });
    this.createdAt = init.createdAt ? new Date(init.createdAt.getTime()) : null;
    this.updatedAt = init.updatedAt ? new Date(init.updatedAt.getTime()) : this.createdAt;
    Object.freeze(this);
  }
}
